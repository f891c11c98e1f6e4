/**
 * Stuck-Task Reaper
 *
 * Periodically force-cancels running tasks that have overrun twice their
 * estimated duration. The hub aborts the reaped task's handler and frees its
 * concurrency slot.
 */

import { TASK_TIMEOUT_ERROR } from '../types/errors.js';
import type { IntelligenceTask } from '../types/intelligence.js';
import { logger } from '../utils/logger.js';
import { STUCK_TASK_MULTIPLIER } from '../utils/timeouts.js';
import type { TaskStore } from './task-store.js';

const log = logger.reaper;

export interface StuckTaskReaperOptions {
  store: TaskStore;
  intervalMs: number;
  /** Estimate assumed for tasks that declare none */
  defaultEstimateMs: number;
  now: () => number;
  onReaped: (task: IntelligenceTask) => void;
}

/**
 * Allowed running time before a task counts as stuck
 */
export function stuckTaskLimit(task: IntelligenceTask, defaultEstimateMs: number): number {
  return STUCK_TASK_MULTIPLIER * (task.estimatedDurationMs ?? defaultEstimateMs);
}

export class StuckTaskReaper {
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly options: StuckTaskReaperOptions) {}

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.sweep();
    }, this.options.intervalMs);
    this.timer.unref();
    log.debug('Reaper started', { intervalMs: this.options.intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get active(): boolean {
    return this.timer !== null;
  }

  /**
   * Cancel every overrunning task. Returns the cancelled records.
   */
  sweep(): IntelligenceTask[] {
    const { store, now, defaultEstimateMs } = this.options;
    const current = now();
    const reaped: IntelligenceTask[] = [];

    for (const task of store.list({ status: 'running' })) {
      if (task.startedAt === undefined) continue;
      const elapsed = current - task.startedAt;
      const limit = stuckTaskLimit(task, defaultEstimateMs);
      if (elapsed <= limit) continue;

      const cancelled = store.markCancelled(task.id, TASK_TIMEOUT_ERROR);
      if (!cancelled) continue;

      log.warn('Task timed out', {
        taskId: task.id,
        tabId: task.tabId,
        capability: task.capability,
        elapsedMs: elapsed,
        limitMs: limit,
      });
      reaped.push(cancelled);
      this.options.onReaped(cancelled);
    }

    return reaped;
  }
}
