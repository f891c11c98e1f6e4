/**
 * Central Timing Configuration
 *
 * All scheduling intervals and delays used by the hub live here so the
 * scheduler, reaper and insight sweep agree on them.
 *
 * Timing categories:
 * - START_DELAY: per-priority stagger before a task becomes ready
 * - REAPER: stuck-task sweep period and limits
 * - RETENTION: how long terminal tasks stay queryable
 * - SWEEP: periodic insight and auto-optimization runs
 */

import type { TaskPriority } from '../types/intelligence.js';

/**
 * Delay before a newly admitted task joins the ready queue
 */
export const PRIORITY_START_DELAYS: Readonly<Record<TaskPriority, number>> = {
  critical: 0,
  high: 100,
  medium: 500,
  low: 2000,
  idle: 10000,
};

/**
 * Default timing values in milliseconds
 */
export const TIMINGS = {
  /** Period of the stuck-task sweep */
  REAPER_INTERVAL: 10_000,

  /** Estimate used when a running task declares none */
  DEFAULT_TASK_ESTIMATE: 5 * 60_000,

  /** Terminal tasks are purged this long after finishing */
  TASK_RETENTION: 5 * 60_000,

  /** Period of the aggregate insight rules */
  INSIGHT_SWEEP_INTERVAL: 2 * 60_000,

  /** Period of the auto-optimization sweep */
  AUTO_OPTIMIZATION_INTERVAL: 5 * 60_000,
} as const;

/** A running task is stuck once it exceeds its estimate by this factor */
export const STUCK_TASK_MULTIPLIER = 2;

export type TimingKey = keyof typeof TIMINGS;

/**
 * Resolved timing for one hub instance
 */
export interface HubTiming {
  startDelays: Readonly<Record<TaskPriority, number>>;
  reaperIntervalMs: number;
  defaultTaskEstimateMs: number;
  taskRetentionMs: number;
  insightSweepIntervalMs: number;
  autoOptimizationIntervalMs: number;
}

export type HubTimingOverrides = Partial<Omit<HubTiming, 'startDelays'>> & {
  startDelays?: Partial<Record<TaskPriority, number>>;
};

export function getTiming(key: TimingKey, override?: number): number {
  return override ?? TIMINGS[key];
}

/**
 * Create a timing configuration from optional overrides
 */
export function resolveHubTiming(overrides: HubTimingOverrides = {}): HubTiming {
  return {
    startDelays: { ...PRIORITY_START_DELAYS, ...overrides.startDelays },
    reaperIntervalMs: getTiming('REAPER_INTERVAL', overrides.reaperIntervalMs),
    defaultTaskEstimateMs: getTiming('DEFAULT_TASK_ESTIMATE', overrides.defaultTaskEstimateMs),
    taskRetentionMs: getTiming('TASK_RETENTION', overrides.taskRetentionMs),
    insightSweepIntervalMs: getTiming('INSIGHT_SWEEP_INTERVAL', overrides.insightSweepIntervalMs),
    autoOptimizationIntervalMs: getTiming(
      'AUTO_OPTIMIZATION_INTERVAL',
      overrides.autoOptimizationIntervalMs
    ),
  };
}
