/**
 * Error taxonomy for the intelligence hub
 *
 * Only admission-time problems are thrown to callers. Handler failures,
 * timeouts and tab teardown are recorded on the task itself and reach
 * subscribers through its terminal status and error text.
 */

import type { IntelligenceCapability } from './intelligence.js';

export type HubErrorCode =
  | 'CAPABILITY_DISABLED'
  | 'INVALID_TASK'
  | 'DUPLICATE_TASK'
  | 'HUB_SHUT_DOWN'
  | 'HANDLER_MODULE_INVALID';

/** Error text stamped on a task the reaper force-cancels */
export const TASK_TIMEOUT_ERROR = 'Task timeout';

/** Error text stamped on running tasks cancelled by cleanupTab */
export const TAB_CLOSED_ERROR = 'Tab closed';

export class HubError extends Error {
  constructor(
    public readonly code: HubErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'HubError';
  }
}

/**
 * queueTask was called for a capability that is not in the enabled set
 */
export class CapabilityDisabledError extends HubError {
  constructor(public readonly capability: IntelligenceCapability) {
    super('CAPABILITY_DISABLED', `Capability ${capability} is not enabled`);
    this.name = 'CapabilityDisabledError';
  }
}

export class TaskValidationError extends HubError {
  constructor(public readonly issues: string[]) {
    super('INVALID_TASK', `Invalid task request:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'TaskValidationError';
  }
}

export class DuplicateTaskError extends HubError {
  constructor(public readonly taskId: string) {
    super('DUPLICATE_TASK', `Task ${taskId} is already queued or running`);
    this.name = 'DuplicateTaskError';
  }
}

export class HubShutdownError extends HubError {
  constructor() {
    super('HUB_SHUT_DOWN', 'Intelligence hub has been shut down');
    this.name = 'HubShutdownError';
  }
}

export class HandlerModuleError extends HubError {
  constructor(
    public readonly specifier: string,
    message: string
  ) {
    super('HANDLER_MODULE_INVALID', message);
    this.name = 'HandlerModuleError';
  }
}

export function isHubError(value: unknown): value is HubError {
  return value instanceof HubError;
}

/**
 * Text recorded on a task for a rejected handler
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim().length > 0 ? error.message : error.name;
  }
  if (typeof error === 'string' && error.trim().length > 0) {
    return error;
  }
  return String(error);
}
