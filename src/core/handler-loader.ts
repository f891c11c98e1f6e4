/**
 * Loads capability handlers from a host-supplied module.
 *
 * The module must export `registerCapabilityHandlers(registry)`, which may
 * be async. Relative paths resolve against the given base directory.
 */

import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { HandlerModuleError, describeError } from '../types/errors.js';
import { handlerModuleExportError } from '../utils/error-messages.js';
import { logger } from '../utils/logger.js';
import type { CapabilityRegistry } from './capability-registry.js';

const log = logger.registry;

export const HANDLER_REGISTRATION_EXPORT = 'registerCapabilityHandlers';

export type CapabilityHandlerRegistrar = (registry: CapabilityRegistry) => void | Promise<void>;

function isRegistrar(value: unknown): value is CapabilityHandlerRegistrar {
  return typeof value === 'function';
}

/**
 * Turn a module specifier into something import() accepts. Bare package
 * names are passed through.
 */
export function resolveHandlerModule(specifier: string, baseDir: string = process.cwd()): string {
  if (isAbsolute(specifier)) {
    return pathToFileURL(specifier).href;
  }
  if (specifier.startsWith('./') || specifier.startsWith('../')) {
    return pathToFileURL(resolve(baseDir, specifier)).href;
  }
  return specifier;
}

export async function loadCapabilityHandlers(
  specifier: string,
  registry: CapabilityRegistry,
  baseDir?: string
): Promise<string[]> {
  const target = resolveHandlerModule(specifier, baseDir);

  let loaded: unknown;
  try {
    loaded = await import(target);
  } catch (error) {
    throw new HandlerModuleError(
      specifier,
      `Failed to load handlers module "${specifier}": ${describeError(error)}`
    );
  }

  const register: unknown =
    typeof loaded === 'object' && loaded !== null && 'registerCapabilityHandlers' in loaded
      ? loaded.registerCapabilityHandlers
      : undefined;
  if (!isRegistrar(register)) {
    throw new HandlerModuleError(
      specifier,
      handlerModuleExportError(specifier, HANDLER_REGISTRATION_EXPORT)
    );
  }

  await register(registry);
  const registered = registry.registeredCapabilities();
  log.info('Capability handlers loaded', { module: specifier, capabilities: registered });
  return registered;
}
