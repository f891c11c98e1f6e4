/**
 * Task Store
 *
 * The single authoritative table of tasks for one hub. Records are
 * immutable; each transition replaces the stored record and returns it.
 * Terminal tasks stay queryable for a retention window and are then purged.
 */

import { DuplicateTaskError, TaskValidationError } from '../types/errors.js';
import {
  isTerminalStatus,
  type IntelligenceTask,
  type TaskData,
  type TaskStatus,
} from '../types/intelligence.js';
import { logger } from '../utils/logger.js';
import { TIMINGS } from '../utils/timeouts.js';

const log = logger.taskStore;

export function isTaskTransitionAllowed(from: TaskStatus, to: TaskStatus): boolean {
  if (from === 'pending') return to === 'running' || to === 'cancelled';
  if (from === 'running') return to === 'completed' || to === 'failed' || to === 'cancelled';
  return false;
}

export interface TaskStoreOptions {
  retentionMs?: number;
  now?: () => number;
}

export interface TaskQuery {
  tabId?: string;
  status?: TaskStatus | readonly TaskStatus[];
}

export class TaskStore {
  private tasks: Map<string, IntelligenceTask> = new Map();
  private purgeTimers: Map<string, NodeJS.Timeout> = new Map();
  private readonly retentionMs: number;
  private readonly now: () => number;

  constructor(options: TaskStoreOptions = {}) {
    this.retentionMs = options.retentionMs ?? TIMINGS.TASK_RETENTION;
    this.now = options.now ?? Date.now;
  }

  /**
   * Insert a new pending task. A terminal task with the same id is replaced.
   */
  insert(task: IntelligenceTask): IntelligenceTask {
    if (task.status !== 'pending') {
      throw new TaskValidationError([`status: new tasks must be pending, got ${task.status}`]);
    }
    const existing = this.tasks.get(task.id);
    if (existing && !isTerminalStatus(existing.status)) {
      throw new DuplicateTaskError(task.id);
    }
    if (existing) {
      this.cancelPurge(task.id);
      log.debug('Replacing finished task', { taskId: task.id, previousStatus: existing.status });
    }
    this.tasks.set(task.id, task);
    return task;
  }

  get(taskId: string): IntelligenceTask | undefined {
    return this.tasks.get(taskId);
  }


  /**
   * Tasks in insertion order, optionally filtered
   */
  list(query: TaskQuery = {}): IntelligenceTask[] {
    const statuses =
      query.status === undefined
        ? undefined
        : typeof query.status === 'string'
          ? [query.status]
          : query.status;
    const result: IntelligenceTask[] = [];
    for (const task of this.tasks.values()) {
      if (query.tabId !== undefined && task.tabId !== query.tabId) continue;
      if (statuses && !statuses.includes(task.status)) continue;
      result.push(task);
    }
    return result;
  }

  countByStatus(status: TaskStatus): number {
    let count = 0;
    for (const task of this.tasks.values()) {
      if (task.status === status) count++;
    }
    return count;
  }

  get size(): number {
    return this.tasks.size;
  }

  // ============================================
  // TRANSITIONS
  // ============================================

  markRunning(taskId: string): IntelligenceTask | undefined {
    return this.transition(taskId, 'running', () => ({ startedAt: this.now() }));
  }

  /**
   * Record handler progress. Clamped to [0, 1] and never decreases.
   */
  reportProgress(taskId: string, progress: number): IntelligenceTask | undefined {
    const task = this.tasks.get(taskId);
    if (!task || task.status !== 'running' || !Number.isFinite(progress)) {
      return undefined;
    }
    const clamped = Math.min(1, Math.max(0, progress));
    if (clamped <= task.progress) {
      return task;
    }
    const updated: IntelligenceTask = { ...task, progress: clamped };
    this.tasks.set(taskId, updated);
    return updated;
  }

  markCompleted(taskId: string, result: TaskData): IntelligenceTask | undefined {
    return this.transition(taskId, 'completed', (task) => ({
      completedAt: this.now(),
      progress: 1,
      result: { ...task.result, ...result },
    }));
  }

  markFailed(taskId: string, error: string): IntelligenceTask | undefined {
    return this.transition(taskId, 'failed', () => ({ completedAt: this.now(), error }));
  }

  /**
   * Cancel a pending or running task. A task that never ran gets its
   * startedAt stamped with the cancellation time.
   */
  markCancelled(taskId: string, error?: string): IntelligenceTask | undefined {
    return this.transition(taskId, 'cancelled', (task) => {
      const now = this.now();
      return {
        startedAt: task.startedAt ?? now,
        completedAt: now,
        ...(error !== undefined ? { error } : {}),
      };
    });
  }

  /**
   * Drop every task and pending purge timer
   */
  clear(): void {
    for (const timer of this.purgeTimers.values()) {
      clearTimeout(timer);
    }
    this.purgeTimers.clear();
    this.tasks.clear();
  }

  private transition(
    taskId: string,
    to: TaskStatus,
    patch: (task: IntelligenceTask) => Partial<IntelligenceTask>
  ): IntelligenceTask | undefined {
    const task = this.tasks.get(taskId);
    if (!task) {
      return undefined;
    }
    if (!isTaskTransitionAllowed(task.status, to)) {
      log.debug('Transition rejected', { taskId, from: task.status, to });
      return undefined;
    }
    const updated: IntelligenceTask = { ...task, ...patch(task), status: to };
    this.tasks.set(taskId, updated);
    if (isTerminalStatus(to)) {
      this.schedulePurge(taskId);
    }
    return updated;
  }

  private schedulePurge(taskId: string): void {
    this.cancelPurge(taskId);
    const timer = setTimeout(() => {
      this.purgeTimers.delete(taskId);
      const task = this.tasks.get(taskId);
      if (task && isTerminalStatus(task.status)) {
        this.tasks.delete(taskId);
        log.debug('Purged finished task', { taskId, status: task.status });
      }
    }, this.retentionMs);
    timer.unref();
    this.purgeTimers.set(taskId, timer);
  }

  private cancelPurge(taskId: string): void {
    const timer = this.purgeTimers.get(taskId);
    if (timer) {
      clearTimeout(timer);
      this.purgeTimers.delete(taskId);
    }
  }
}
