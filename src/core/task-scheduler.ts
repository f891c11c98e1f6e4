/**
 * Task Scheduler
 *
 * Turns admitted tasks into dispatches:
 * 1. Each task waits out its priority's start delay.
 * 2. It then joins the ready queue, ordered by priority and admission order.
 * 3. Whenever a concurrency slot is free, the head of the queue is dispatched.
 *
 * The scheduler owns the slot held by every dispatched task together with the
 * AbortController handed to its handler. A slot is released exactly once,
 * either when the execution settles or when the task is aborted.
 */

import type { IntelligenceTask, TaskPriority } from '../types/intelligence.js';
import { logger } from '../utils/logger.js';
import { ConcurrencyLimiter } from './concurrency-limiter.js';
import { ReadyQueue } from './ready-queue.js';

const log = logger.scheduler;

/**
 * Runs one dispatched task. The returned promise settles when the task's
 * execution is over.
 */
export type TaskExecutor = (taskId: string, signal: AbortSignal) => Promise<void>;

export interface TaskSchedulerOptions {
  startDelays: Readonly<Record<TaskPriority, number>>;
  maxConcurrent: number;
  execute: TaskExecutor;
}

interface DelayedTask {
  timer: NodeJS.Timeout;
  priority: TaskPriority;
  sequence: number;
}

export class TaskScheduler {
  private readonly startDelays: Readonly<Record<TaskPriority, number>>;
  private readonly execute: TaskExecutor;
  private readonly limiter: ConcurrencyLimiter;
  private readonly ready = new ReadyQueue();
  private delayed: Map<string, DelayedTask> = new Map();
  private running: Map<string, AbortController> = new Map();
  private sequence = 0;
  private stopped = false;

  constructor(options: TaskSchedulerOptions) {
    this.startDelays = options.startDelays;
    this.execute = options.execute;
    this.limiter = new ConcurrencyLimiter(options.maxConcurrent);
  }

  /**
   * Start the priority delay for a newly admitted task
   */
  schedule(task: Pick<IntelligenceTask, 'id' | 'priority'>): void {
    if (this.stopped) {
      log.warn('Schedule ignored after shutdown', { taskId: task.id });
      return;
    }
    const sequence = this.sequence++;
    const delay = this.startDelays[task.priority];
    const timer = setTimeout(() => {
      this.delayed.delete(task.id);
      this.ready.push({ taskId: task.id, priority: task.priority, sequence });
      this.pump();
    }, delay);
    this.delayed.set(task.id, { timer, priority: task.priority, sequence });
    log.debug('Task scheduled', { taskId: task.id, priority: task.priority, delayMs: delay });
  }

  /**
   * Withdraw a task that has not been dispatched yet
   */
  cancel(taskId: string): boolean {
    const delayed = this.delayed.get(taskId);
    if (delayed) {
      clearTimeout(delayed.timer);
      this.delayed.delete(taskId);
      return true;
    }
    return this.ready.remove(taskId);
  }

  /**
   * Abort a dispatched task's handler and free its slot now
   */
  abort(taskId: string, reason: string): boolean {
    const controller = this.running.get(taskId);
    if (!controller) {
      return false;
    }
    controller.abort(new Error(reason));
    this.releaseSlot(taskId, controller);
    return true;
  }

  /**
   * Change the concurrency cap. Growing it dispatches waiting tasks at once.
   */
  setMaxConcurrent(value: number): number {
    const applied = this.limiter.resize(value);
    this.pump();
    return applied;
  }

  get maxConcurrent(): number {
    return this.limiter.limit;
  }

  /** Tasks holding a slot */
  get runningCount(): number {
    return this.limiter.inUse;
  }

  /** Tasks still in their start delay or waiting for a slot */
  get queuedCount(): number {
    return this.delayed.size + this.ready.size;
  }

  /**
   * Drop all waiting work and abort every running handler
   */
  shutdown(reason: string): void {
    this.stopped = true;
    for (const { timer } of this.delayed.values()) {
      clearTimeout(timer);
    }
    this.delayed.clear();
    this.ready.clear();
    for (const [taskId, controller] of Array.from(this.running)) {
      controller.abort(new Error(reason));
      this.releaseSlot(taskId, controller);
    }
  }

  private pump(): void {
    while (!this.stopped && this.ready.size > 0 && this.limiter.tryAcquire()) {
      const entry = this.ready.pop();
      if (!entry) {
        this.limiter.release();
        break;
      }
      this.dispatch(entry.taskId);
    }
  }

  private dispatch(taskId: string): void {
    const controller = new AbortController();
    this.running.set(taskId, controller);
    log.debug('Task dispatched', { taskId, running: this.running.size, limit: this.limiter.limit });

    let execution: Promise<void>;
    try {
      execution = this.execute(taskId, controller.signal);
    } catch (error) {
      execution = Promise.reject(error);
    }

    void execution
      .catch((error: unknown) => {
        log.error('Task execution threw', { taskId, error });
      })
      .finally(() => {
        this.releaseSlot(taskId, controller);
      });
  }

  private releaseSlot(taskId: string, controller: AbortController): void {
    if (this.running.get(taskId) !== controller) {
      return;
    }
    this.running.delete(taskId);
    this.limiter.release();
    this.pump();
  }
}
