/**
 * Configuration File Loader
 *
 * Loads configuration from .tabintelrc or .tabintelrc.json files.
 * Configuration precedence: Environment Variables > Config File > Defaults
 *
 * Search paths (in order):
 * 1. Current working directory
 * 2. Home directory (~/.tabintelrc)
 *
 * @example
 * // .tabintelrc in project root
 * {
 *   "log": { "level": "debug", "prettyPrint": true },
 *   "hub": {
 *     "maxConcurrentTasks": 8,
 *     "enabledCapabilities": ["webAnalysis", "performance", "security"],
 *     "handlersModule": "./handlers.js"
 *   }
 * }
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  capabilitySchema,
  ConfigValidationError,
  hubEnvConfigSchema,
  logConfigSchema,
  logLevelSchema,
  type HubConfig,
  type LogConfig,
  type PersistedSettings,
} from './config-schemas.js';
import { logger } from './logger.js';

const log = logger.create('ConfigLoader');

// ============================================
// CONFIG FILE SCHEMA
// ============================================

/**
 * Schema for configuration file contents.
 * All fields are optional - missing fields use defaults or env vars.
 */
export const configFileSchema = z
  .object({
    log: z
      .object({
        level: logLevelSchema.optional(),
        prettyPrint: z.boolean().optional(),
      })
      .optional(),

    hub: z
      .object({
        enabledCapabilities: z.array(capabilitySchema).optional(),
        autoOptimization: z.boolean().optional(),
        predictiveBrowsing: z.boolean().optional(),
        learningMode: z.boolean().optional(),
        confidenceThreshold: z.number().min(0).max(1).optional(),
        maxConcurrentTasks: z.number().int().min(1).max(20).optional(),
        settingsPath: z.string().optional(),
        handlersModule: z.string().optional(),
      })
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================
// FILE SEARCH
// ============================================

/**
 * Names of config files to search for (in priority order).
 */
export const CONFIG_FILE_NAMES = ['.tabintelrc', '.tabintelrc.json', 'tabintelrc.json'];

function getSearchPaths(): string[] {
  const paths: string[] = [process.cwd()];

  try {
    const home = homedir();
    if (home && !paths.includes(home)) {
      paths.push(home);
    }
  } catch (error) {
    log.debug('Home directory unavailable', { error: String(error) });
  }

  return paths;
}

function findConfigFile(): string | null {
  const searchPaths = getSearchPaths();

  for (const dir of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        log.debug('Found config file', { path: filePath });
        return filePath;
      }
    }
  }

  log.debug('No config file found', { searchPaths, fileNames: CONFIG_FILE_NAMES });
  return null;
}

// ============================================
// FILE LOADING
// ============================================

/**
 * Load and parse a config file. Comments (// and /* *\/) are allowed.
 * An unreadable or invalid file yields an empty config.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  try {
    const content = readFileSync(filePath, 'utf-8');

    const stripped = content
      .replace(/\/\*[\s\S]*?\*\//g, '')
      .replace(/^\s*\/\/.*$/gm, '');

    const parsed: unknown = JSON.parse(stripped);
    const result = configFileSchema.safeParse(parsed);

    if (!result.success) {
      log.warn('Config file validation failed', {
        path: filePath,
        errors: result.error.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      });
      return {};
    }

    log.info('Loaded config file', {
      path: filePath,
      sections: Object.entries(result.data)
        .filter(([, value]) => value !== undefined)
        .map(([key]) => key),
    });

    return result.data;
  } catch (error) {
    if (error instanceof SyntaxError) {
      log.warn('Config file has invalid JSON', {
        path: filePath,
        error: error.message,
      });
    } else {
      log.warn('Failed to read config file', {
        path: filePath,
        error: String(error),
      });
    }
    return {};
  }
}

// ============================================
// CACHED CONFIG
// ============================================

let cachedConfigFile: ConfigFile | null = null;

/**
 * Get the loaded config file (cached after first load).
 */
export function getConfigFile(): ConfigFile {
  if (!cachedConfigFile) {
    const filePath = findConfigFile();
    cachedConfigFile = filePath ? loadConfigFile(filePath) : {};
  }
  return cachedConfigFile;
}

// ============================================
// MERGE HELPERS
// ============================================

function boolToEnvString(value: boolean | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value ? 'true' : 'false';
}

function numToEnvString(value: number | undefined): string | undefined {
  if (value === undefined) return undefined;
  return String(value);
}

function arrayToEnvString(value: string[] | undefined): string | undefined {
  if (value === undefined || value.length === 0) return undefined;
  return value.join(',');
}

// ============================================
// MERGED CONFIG FUNCTIONS
// ============================================

/**
 * Get merged log configuration.
 * Config file values are used unless overridden by environment variables.
 */
export function getMergedLogConfig(
  env: NodeJS.ProcessEnv = process.env,
  file: ConfigFile = getConfigFile()
): LogConfig {
  const section = file.log ?? {};

  const merged = {
    level: env.LOG_LEVEL ?? section.level,
    prettyPrint: env.LOG_PRETTY ?? boolToEnvString(section.prettyPrint),
  };

  const result = logConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigValidationError('log', result.error);
  }
  return result.data;
}

/**
 * Get merged hub configuration. Fields left undefined fall back to the
 * hub's defaults or to the persisted settings.
 */
export function getMergedHubConfig(
  env: NodeJS.ProcessEnv = process.env,
  file: ConfigFile = getConfigFile()
): HubConfig {
  const section = file.hub ?? {};

  const merged = {
    enabledCapabilities:
      env.TAB_INTEL_ENABLED_CAPABILITIES ?? arrayToEnvString(section.enabledCapabilities),
    autoOptimization:
      env.TAB_INTEL_AUTO_OPTIMIZATION ?? boolToEnvString(section.autoOptimization),
    confidenceThreshold:
      env.TAB_INTEL_CONFIDENCE_THRESHOLD ?? numToEnvString(section.confidenceThreshold),
    maxConcurrentTasks:
      env.TAB_INTEL_MAX_CONCURRENT_TASKS ?? numToEnvString(section.maxConcurrentTasks),
    settingsPath: env.TAB_INTEL_SETTINGS_PATH ?? section.settingsPath,
    handlersModule: env.TAB_INTEL_HANDLERS_MODULE ?? section.handlersModule,
  };

  const result = hubEnvConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigValidationError('hub', result.error);
  }

  const data = result.data;
  const settings: PersistedSettings = {};
  if (data.enabledCapabilities !== undefined) settings.enabledCapabilities = data.enabledCapabilities;
  if (data.autoOptimization !== undefined) settings.autoOptimization = data.autoOptimization;
  if (data.confidenceThreshold !== undefined) {
    settings.confidenceThreshold = data.confidenceThreshold;
  }
  if (data.maxConcurrentTasks !== undefined) settings.maxConcurrentTasks = data.maxConcurrentTasks;
  if (section.predictiveBrowsing !== undefined) {
    settings.predictiveBrowsing = section.predictiveBrowsing;
  }
  if (section.learningMode !== undefined) settings.learningMode = section.learningMode;

  return {
    settings,
    settingsPath: data.settingsPath,
    handlersModule: data.handlersModule,
  };
}

// ============================================
// UTILITY FUNCTIONS
// ============================================

/**
 * Generate a sample .tabintelrc file with all available options.
 */
export function generateSampleConfig(): string {
  const sample = {
    log: {
      level: 'info',
      prettyPrint: false,
    },
    hub: {
      enabledCapabilities: [
        'webAnalysis',
        'automation',
        'aiInteraction',
        'performance',
        'security',
        'accessibility',
      ],
      autoOptimization: true,
      predictiveBrowsing: true,
      learningMode: true,
      confidenceThreshold: 0.7,
      maxConcurrentTasks: 5,
      settingsPath: './data/intelligence-settings.json',
      handlersModule: './handlers.js',
    },
  };

  return JSON.stringify(sample, null, 2);
}
