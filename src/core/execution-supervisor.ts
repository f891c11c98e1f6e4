/**
 * Execution Supervisor
 *
 * Runs one dispatched task through its capability handler and records the
 * outcome. Handler failures are captured on the task and never escape.
 * An outcome that arrives after the task was cancelled is discarded.
 */

import { describeError } from '../types/errors.js';
import {
  isTaskData,
  type IntelligenceTask,
  type TaskData,
} from '../types/intelligence.js';
import { handlerMissingError } from '../utils/error-messages.js';
import { logger } from '../utils/logger.js';
import type { CapabilityRegistry } from './capability-registry.js';
import type { HubStatistics } from './hub-statistics.js';
import type { TaskStore } from './task-store.js';

const log = logger.supervisor;

export interface ExecutionSupervisorDeps {
  store: TaskStore;
  registry: CapabilityRegistry;
  statistics: HubStatistics;
  /** Delivers a changed task to its tab's subscribers */
  publish: (task: IntelligenceTask) => void;
  /** Called once for every task that completes */
  onCompleted: (task: IntelligenceTask) => void;
  renderTargetFor: (tabId: string) => unknown;
}

export class ExecutionSupervisor {
  constructor(private readonly deps: ExecutionSupervisorDeps) {}

  /**
   * Execute a dispatched task. Resolves once the task is finished or the
   * handler's late outcome has been discarded.
   */
  async run(taskId: string, signal: AbortSignal): Promise<void> {
    const { store, registry } = this.deps;

    const queued = store.get(taskId);
    if (!queued || queued.status !== 'pending') {
      log.debug('Dispatch skipped', { taskId, status: queued?.status });
      return;
    }

    const task = store.markRunning(taskId);
    if (!task) {
      return;
    }
    this.deps.publish(task);

    const handler = registry.get(task.capability);
    if (!handler) {
      this.fail(task, handlerMissingError(task.capability, registry.registeredCapabilities()));
      return;
    }

    let output: unknown;
    try {
      output = await handler(task.tabId, task.parameters, {
        taskId,
        signal,
        renderTarget: this.deps.renderTargetFor(task.tabId),
        reportProgress: (progress) => this.progress(taskId, progress, signal),
      });
    } catch (error) {
      if (this.isStale(taskId, signal)) {
        log.debug('Ignoring failure of cancelled task', { taskId, error: describeError(error) });
        return;
      }
      this.fail(task, describeError(error));
      return;
    }

    if (this.isStale(taskId, signal)) {
      log.debug('Ignoring result of cancelled task', { taskId });
      return;
    }

    this.complete(task, isTaskData(output) ? output : {});
  }

  private complete(task: IntelligenceTask, result: TaskData): void {
    const completed = this.deps.store.markCompleted(task.id, result);
    if (!completed) {
      return;
    }
    const executionTimeMs = (completed.completedAt ?? 0) - (completed.startedAt ?? 0);
    this.deps.statistics.recordCompleted(completed.capability, executionTimeMs);
    log.info('Task completed', {
      taskId: completed.id,
      tabId: completed.tabId,
      capability: completed.capability,
      durationMs: executionTimeMs,
    });
    this.deps.publish(completed);
    this.deps.onCompleted(completed);
  }

  private fail(task: IntelligenceTask, error: string): void {
    const failed = this.deps.store.markFailed(task.id, error);
    if (!failed) {
      return;
    }
    this.deps.statistics.recordFailed();
    log.warn('Task failed', {
      taskId: failed.id,
      tabId: failed.tabId,
      capability: failed.capability,
      error,
    });
    this.deps.publish(failed);
  }

  private progress(taskId: string, progress: number, signal: AbortSignal): void {
    if (signal.aborted) {
      return;
    }
    const before = this.deps.store.get(taskId);
    const after = this.deps.store.reportProgress(taskId, progress);
    if (after && before && after.progress !== before.progress) {
      this.deps.publish(after);
    }
  }

  private isStale(taskId: string, signal: AbortSignal): boolean {
    return signal.aborted || this.deps.store.get(taskId)?.status !== 'running';
  }
}
