/**
 * Capability Registry
 *
 * Maps each capability tag to the externally supplied handler that does the
 * actual work. The dispatcher only ever looks handlers up here, so adding a
 * capability is a registration, not a code change.
 */

import type { CapabilityHandler, IntelligenceCapability } from '../types/intelligence.js';
import { logger } from '../utils/logger.js';

const log = logger.registry;

export class CapabilityRegistry {
  private handlers: Map<IntelligenceCapability, CapabilityHandler> = new Map();

  /**
   * Register a handler, replacing any existing one for the capability
   */
  register(capability: IntelligenceCapability, handler: CapabilityHandler): void {
    const replaced = this.handlers.has(capability);
    this.handlers.set(capability, handler);
    log.debug(replaced ? 'Handler replaced' : 'Handler registered', { capability });
  }

  unregister(capability: IntelligenceCapability): boolean {
    const removed = this.handlers.delete(capability);
    if (removed) {
      log.debug('Handler unregistered', { capability });
    }
    return removed;
  }

  get(capability: IntelligenceCapability): CapabilityHandler | undefined {
    return this.handlers.get(capability);
  }

  has(capability: IntelligenceCapability): boolean {
    return this.handlers.has(capability);
  }

  registeredCapabilities(): IntelligenceCapability[] {
    return Array.from(this.handlers.keys());
  }
}
