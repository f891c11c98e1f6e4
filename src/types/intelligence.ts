/**
 * Intelligence Hub Types
 *
 * Records shared by the scheduler, the execution supervisor, the reaper and
 * the insight pipeline. Tasks and insights are treated as immutable: every
 * state change produces a new record.
 */

/**
 * Schedulable categories of work, each bound to one handler
 */
export const CAPABILITIES = [
  'webAnalysis',
  'automation',
  'aiInteraction',
  'performance',
  'security',
  'accessibility',
  'learning',
  'prediction',
  'personalization',
  'collaboration',
] as const;

export type IntelligenceCapability = (typeof CAPABILITIES)[number];

/**
 * Priorities, highest first
 */
export const TASK_PRIORITIES = ['critical', 'high', 'medium', 'low', 'idle'] as const;

export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export const TASK_STATUSES = [
  'pending',
  'running',
  'completed',
  'failed',
  'cancelled',
  'paused',
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export type TerminalTaskStatus = 'completed' | 'failed' | 'cancelled';

export function isTerminalStatus(status: TaskStatus): status is TerminalTaskStatus {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

/**
 * String-keyed payload used for task parameters, results and insight data
 */
export type TaskData = Record<string, unknown>;

export function isTaskData(value: unknown): value is TaskData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface IntelligenceTask {
  readonly id: string;
  /** Browsing context the task operates on */
  readonly tabId: string;
  readonly name: string;
  readonly description: string;
  readonly capability: IntelligenceCapability;
  readonly priority: TaskPriority;
  readonly status: TaskStatus;
  readonly parameters: Readonly<TaskData>;
  /** Epoch milliseconds */
  readonly createdAt: number;
  readonly startedAt?: number;
  readonly completedAt?: number;
  readonly estimatedDurationMs?: number;
  /** 0.0 - 1.0 */
  readonly progress: number;
  readonly error?: string;
  readonly result: Readonly<TaskData>;
}

/**
 * Input accepted by queueTask
 */
export interface QueueTaskRequest {
  /** Generated from the tab id when omitted */
  id?: string;
  tabId: string;
  name: string;
  description?: string;
  capability: IntelligenceCapability;
  /** Defaults to medium */
  priority?: TaskPriority;
  parameters?: TaskData;
  estimatedDurationMs?: number;
}

export interface IntelligenceInsight {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly category: IntelligenceCapability;
  /** 0.0 - 1.0 */
  readonly confidence: number;
  readonly data: Readonly<TaskData>;
  readonly recommendations: readonly string[];
  readonly generatedAt: number;
  readonly actionable: boolean;
}

/**
 * An insight before the generator assigns its id and timestamp
 */
export type InsightDraft = Omit<IntelligenceInsight, 'id' | 'generatedAt'>;

/**
 * Extra context handed to a capability handler alongside tab and parameters
 */
export interface CapabilityHandlerContext {
  readonly taskId: string;
  /** Aborted when the task is cancelled while running */
  readonly signal: AbortSignal;
  /** Whatever the host passed to registerTab */
  readonly renderTarget: unknown;
  reportProgress(progress: number): void;
}

/**
 * Externally supplied async work for one capability. Fails by rejecting.
 */
export type CapabilityHandler = (
  tabId: string,
  parameters: Readonly<TaskData>,
  context: CapabilityHandlerContext
) => Promise<TaskData>;

export type TaskUpdateListener = (task: IntelligenceTask) => void;

export type InsightListener = (insight: IntelligenceInsight) => void;

/**
 * Mutable settings block, persisted through a SettingsStore
 */
export interface HubSettings {
  enabledCapabilities: IntelligenceCapability[];
  autoOptimization: boolean;
  predictiveBrowsing: boolean;
  learningMode: boolean;
  confidenceThreshold: number;
  maxConcurrentTasks: number;
}

export interface HubStatisticsSnapshot {
  completedTasks: number;
  failedTasks: number;
  cancelledTasks: number;
  totalExecutionTimeMs: number;
  averageExecutionTimeMs: number;
  /** null until at least one task has completed or failed */
  successRate: number | null;
  capabilityUsage: Partial<Record<IntelligenceCapability, number>>;
}

export interface HubStats extends HubStatisticsSnapshot {
  registeredTabs: number;
  activeTasks: number;
  runningTasks: number;
  queuedTasks: number;
  enabledCapabilities: IntelligenceCapability[];
  insights: number;
  configuration: Omit<HubSettings, 'enabledCapabilities'>;
}

/**
 * Result of a natural-language command
 */
export interface CommandOutcome {
  taskId?: string;
  capability: IntelligenceCapability;
  status: TaskStatus | 'rejected';
  message: string;
}
