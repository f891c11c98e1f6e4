/**
 * Intelligence Hub
 *
 * Facade owning every collection of one hub instance: the task store, the
 * scheduler and its concurrency pool, the capability registry, the insight
 * list, the tab table, subscriptions and settings. Nothing is process-wide,
 * so several hubs can run side by side and shutdown() tears one down fully.
 *
 * Lifecycle of a task:
 *   queueTask -> pending -> (priority delay, ready queue, free slot)
 *     -> running -> completed | failed | cancelled
 *
 * Periodic work, started by initialize():
 * - stuck-task reaper
 * - aggregate insight sweep
 * - auto-optimization sweep (when enabled)
 */

import {
  CapabilityDisabledError,
  HubShutdownError,
  TAB_CLOSED_ERROR,
  TASK_TIMEOUT_ERROR,
} from '../types/errors.js';
import {
  isTerminalStatus,
  type CommandOutcome,
  type HubSettings,
  type HubStats,
  type InsightListener,
  type IntelligenceCapability,
  type IntelligenceInsight,
  type IntelligenceTask,
  type QueueTaskRequest,
  type TaskUpdateListener,
} from '../types/intelligence.js';
import {
  ConfigValidationError,
  DEFAULT_HUB_SETTINGS,
  persistedSettingsSchema,
  type PersistedSettings,
} from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';
import { InMemorySettingsStore, type SettingsStore } from '../utils/settings-store.js';
import { resolveHubTiming, type HubTiming, type HubTimingOverrides } from '../utils/timeouts.js';
import { CapabilityRegistry } from './capability-registry.js';
import { interpretCommand } from './command-interpreter.js';
import { clampConcurrency } from './concurrency-limiter.js';
import { ExecutionSupervisor } from './execution-supervisor.js';
import { HubStatistics } from './hub-statistics.js';
import { InsightGenerator } from './insight-generator.js';
import { TaskUpdateNotifier } from './listener-set.js';
import { StuckTaskReaper } from './stuck-task-reaper.js';
import { parseQueueTaskRequest } from './task-request.js';
import { TaskScheduler } from './task-scheduler.js';
import { TaskStore } from './task-store.js';

const log = logger.hub;

/** Key the settings block is stored under */
export const SETTINGS_KEY = 'intelligence_config';

const SHUTDOWN_REASON = 'Intelligence hub has been shut down';

export interface IntelligenceHubOptions {
  registry?: CapabilityRegistry;
  settingsStore?: SettingsStore;
  /** Applied over defaults and over stored settings */
  settings?: PersistedSettings;
  timing?: HubTimingOverrides;
  insightCapacity?: number;
  now?: () => number;
}

interface RegisteredTab {
  renderTarget: unknown;
  registeredAt: number;
}

/**
 * Merge a settings patch into a complete block, clamping numeric ranges
 */
export function applySettingsPatch(base: HubSettings, patch: PersistedSettings): HubSettings {
  const next: HubSettings = { ...base, enabledCapabilities: [...base.enabledCapabilities] };
  if (patch.enabledCapabilities !== undefined) {
    next.enabledCapabilities = Array.from(new Set(patch.enabledCapabilities));
  }
  if (patch.autoOptimization !== undefined) next.autoOptimization = patch.autoOptimization;
  if (patch.predictiveBrowsing !== undefined) next.predictiveBrowsing = patch.predictiveBrowsing;
  if (patch.learningMode !== undefined) next.learningMode = patch.learningMode;
  if (patch.confidenceThreshold !== undefined) {
    next.confidenceThreshold = Math.min(1, Math.max(0, patch.confidenceThreshold));
  }
  if (patch.maxConcurrentTasks !== undefined) {
    next.maxConcurrentTasks = clampConcurrency(patch.maxConcurrentTasks);
  }
  return next;
}

function generateId(timestamp: number): string {
  return `${timestamp}-${Math.random().toString(36).substring(2, 11)}`;
}

export class IntelligenceHub {
  readonly registry: CapabilityRegistry;

  private readonly settingsStore: SettingsStore;
  private readonly overrides: PersistedSettings;
  private readonly timing: HubTiming;
  private readonly now: () => number;

  private settings: HubSettings;
  private readonly store: TaskStore;
  private readonly statistics = new HubStatistics();
  private readonly notifier = new TaskUpdateNotifier<IntelligenceTask>(logger.notifications);
  private readonly insights: InsightGenerator;
  private readonly scheduler: TaskScheduler;
  private readonly supervisor: ExecutionSupervisor;
  private readonly reaper: StuckTaskReaper;
  private tabs: Map<string, RegisteredTab> = new Map();

  private insightSweepTimer: NodeJS.Timeout | null = null;
  private autoOptimizationTimer: NodeJS.Timeout | null = null;
  private initialized = false;
  private closed = false;

  constructor(options: IntelligenceHubOptions = {}) {
    this.registry = options.registry ?? new CapabilityRegistry();
    this.settingsStore = options.settingsStore ?? new InMemorySettingsStore();
    this.overrides = options.settings ?? {};
    this.timing = resolveHubTiming(options.timing);
    this.now = options.now ?? Date.now;
    this.settings = applySettingsPatch(DEFAULT_HUB_SETTINGS, this.overrides);

    this.store = new TaskStore({ retentionMs: this.timing.taskRetentionMs, now: this.now });
    this.insights = new InsightGenerator({
      capacity: options.insightCapacity,
      now: this.now,
    });
    this.supervisor = new ExecutionSupervisor({
      store: this.store,
      registry: this.registry,
      statistics: this.statistics,
      publish: (task) => this.notifier.publish(task),
      onCompleted: (task) => {
        this.insights.fromTask(task);
      },
      renderTargetFor: (tabId) => this.tabs.get(tabId)?.renderTarget,
    });
    this.scheduler = new TaskScheduler({
      startDelays: this.timing.startDelays,
      maxConcurrent: this.settings.maxConcurrentTasks,
      execute: (taskId, signal) => this.supervisor.run(taskId, signal),
    });
    this.reaper = new StuckTaskReaper({
      store: this.store,
      intervalMs: this.timing.reaperIntervalMs,
      defaultEstimateMs: this.timing.defaultTaskEstimateMs,
      now: this.now,
      onReaped: (task) => {
        this.scheduler.abort(task.id, TASK_TIMEOUT_ERROR);
        this.statistics.recordCancelled();
        this.notifier.publish(task);
      },
    });
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  /**
   * Load stored settings and start the periodic sweeps
   */
  async initialize(): Promise<void> {
    if (this.closed) {
      throw new HubShutdownError();
    }
    if (this.initialized) {
      return;
    }

    const stored = await this.loadStoredSettings();
    this.settings = applySettingsPatch(
      applySettingsPatch(DEFAULT_HUB_SETTINGS, stored),
      this.overrides
    );
    this.scheduler.setMaxConcurrent(this.settings.maxConcurrentTasks);

    this.reaper.start();
    this.insightSweepTimer = setInterval(() => {
      this.insights.fromStatistics(this.statistics);
    }, this.timing.insightSweepIntervalMs);
    this.insightSweepTimer.unref();
    this.initialized = true;
    this.syncAutoOptimizationTimer();

    log.info('Intelligence hub initialized', {
      enabledCapabilities: this.settings.enabledCapabilities,
      maxConcurrentTasks: this.settings.maxConcurrentTasks,
      registeredHandlers: this.registry.registeredCapabilities(),
    });
  }

  /**
   * Stop all timers, cancel every unfinished task and drop subscriptions.
   * Later queueTask calls reject with HubShutdownError.
   */
  shutdown(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    this.reaper.stop();
    if (this.insightSweepTimer) {
      clearInterval(this.insightSweepTimer);
      this.insightSweepTimer = null;
    }
    this.stopAutoOptimizationTimer();

    for (const task of this.store.list({ status: ['pending', 'running'] })) {
      this.scheduler.cancel(task.id);
      const cancelled = this.store.markCancelled(task.id, SHUTDOWN_REASON);
      if (cancelled) {
        this.notifier.publish(cancelled);
      }
    }
    this.scheduler.shutdown(SHUTDOWN_REASON);

    this.notifier.clear();
    this.insights.dispose();
    this.tabs.clear();
    this.store.clear();
    log.info('Intelligence hub shut down');
  }

  get isShutDown(): boolean {
    return this.closed;
  }

  // ============================================
  // TABS
  // ============================================

  /**
   * Remember a tab and queue its initial analysis, security scan and
   * performance analysis. Returns the ids of the queued tasks.
   */
  async registerTab(tabId: string, renderTarget?: unknown): Promise<string[]> {
    if (this.closed) {
      throw new HubShutdownError();
    }
    const existing = this.tabs.get(tabId);
    if (existing) {
      existing.renderTarget = renderTarget;
      log.debug('Tab already registered', { tabId });
      return [];
    }
    this.tabs.set(tabId, { renderTarget, registeredAt: this.now() });
    log.info('Tab registered', { tabId });

    const initial: QueueTaskRequest[] = [
      {
        id: `${tabId}_initial_analysis`,
        tabId,
        name: 'Initial Page Analysis',
        description: 'Analyze page content and structure',
        capability: 'webAnalysis',
        priority: 'high',
        parameters: { analysisType: 'comprehensive' },
        estimatedDurationMs: 5000,
      },
      {
        id: `${tabId}_security_scan`,
        tabId,
        name: 'Security Scan',
        description: 'Scan page for security threats',
        capability: 'security',
        priority: 'high',
        parameters: { scanType: 'full' },
        estimatedDurationMs: 3000,
      },
      {
        id: `${tabId}_performance_analysis`,
        tabId,
        name: 'Performance Analysis',
        description: 'Analyze page performance metrics',
        capability: 'performance',
        priority: 'medium',
        parameters: { metrics: ['coreWebVitals', 'loadTime', 'resourceUsage'] },
        estimatedDurationMs: 2000,
      },
    ];

    const queued: string[] = [];
    for (const request of initial) {
      if (!this.isCapabilityEnabled(request.capability)) {
        log.info('Skipping initial task for disabled capability', {
          tabId,
          capability: request.capability,
        });
        continue;
      }
      queued.push(await this.queueTask(request));
    }
    return queued;
  }

  /**
   * Cancel the tab's unfinished tasks, forget it and drop its subscribers
   */
  cleanupTab(tabId: string): void {
    for (const task of this.store.list({ tabId, status: ['pending', 'running'] })) {
      if (task.status === 'pending') {
        this.cancelTask(task.id);
        continue;
      }
      const cancelled = this.store.markCancelled(task.id, TAB_CLOSED_ERROR);
      if (cancelled) {
        this.scheduler.abort(task.id, TAB_CLOSED_ERROR);
        this.statistics.recordCancelled();
        this.notifier.publish(cancelled);
      }
    }
    this.tabs.delete(tabId);
    this.notifier.closeTab(tabId);
    log.info('Tab cleaned up', { tabId });
  }

  getRegisteredTabs(): string[] {
    return Array.from(this.tabs.keys());
  }

  // ============================================
  // TASKS
  // ============================================

  /**
   * Admit a task. Resolves with its id as soon as it is stored, before it
   * runs.
   */
  async queueTask(input: QueueTaskRequest): Promise<string> {
    if (this.closed) {
      throw new HubShutdownError();
    }
    const request = parseQueueTaskRequest(input);
    if (!this.isCapabilityEnabled(request.capability)) {
      throw new CapabilityDisabledError(request.capability);
    }

    const task: IntelligenceTask = {
      id: request.id ?? `${request.tabId}_${request.capability}_${generateId(this.now())}`,
      tabId: request.tabId,
      name: request.name,
      description: request.description ?? '',
      capability: request.capability,
      priority: request.priority ?? 'medium',
      status: 'pending',
      parameters: { ...request.parameters },
      createdAt: this.now(),
      estimatedDurationMs: request.estimatedDurationMs,
      progress: 0,
      result: {},
    };

    this.store.insert(task);
    log.debug('Task queued', {
      taskId: task.id,
      tabId: task.tabId,
      capability: task.capability,
      priority: task.priority,
    });
    this.notifier.publish(task);
    this.scheduler.schedule(task);
    return task.id;
  }

  /**
   * Cancel a task that has not started. Returns false for any other task.
   */
  cancelTask(taskId: string): boolean {
    const task = this.store.get(taskId);
    if (!task || task.status !== 'pending') {
      return false;
    }
    this.scheduler.cancel(taskId);
    const cancelled = this.store.markCancelled(taskId);
    if (!cancelled) {
      return false;
    }
    this.statistics.recordCancelled();
    log.info('Task cancelled', { taskId, tabId: task.tabId });
    this.notifier.publish(cancelled);
    return true;
  }

  getTask(taskId: string): IntelligenceTask | undefined {
    return this.store.get(taskId);
  }

  /**
   * Pending and running tasks, optionally for one tab
   */
  getActiveTasks(tabId?: string): IntelligenceTask[] {
    return this.store.list({ tabId, status: ['pending', 'running'] });
  }

  /**
   * Map a free-text command to a capability, run it as a high priority task
   * and wait for the outcome
   */
  async processCommand(tabId: string, command: string): Promise<CommandOutcome> {
    const capability = interpretCommand(command);
    const taskId = `${tabId}_command_${generateId(this.now())}`;

    let unsubscribe: () => void = () => undefined;
    const finished = new Promise<IntelligenceTask>((resolve) => {
      unsubscribe = this.notifier.subscribe(tabId, (task) => {
        if (task.id === taskId && isTerminalStatus(task.status)) {
          resolve(task);
        }
      });
    });

    try {
      await this.queueTask({
        id: taskId,
        tabId,
        name: 'User Command',
        description: command,
        capability,
        priority: 'high',
        parameters: { instruction: command },
        estimatedDurationMs: 10000,
      });
    } catch (error) {
      unsubscribe();
      if (error instanceof CapabilityDisabledError) {
        return { capability, status: 'rejected', message: error.message };
      }
      throw error;
    }

    try {
      const task = await finished;
      return { taskId, capability, status: task.status, message: describeOutcome(task) };
    } finally {
      unsubscribe();
    }
  }

  /**
   * Queue a low-priority performance pass for every registered tab
   */
  async runAutoOptimization(): Promise<string[]> {
    if (this.closed || !this.settings.autoOptimization) {
      return [];
    }
    if (!this.isCapabilityEnabled('performance')) {
      log.debug('Auto-optimization skipped, performance capability disabled');
      return [];
    }

    const queued: string[] = [];
    for (const tabId of this.tabs.keys()) {
      try {
        queued.push(
          await this.queueTask({
            id: `${tabId}_auto_optimization_${generateId(this.now())}`,
            tabId,
            name: 'Auto Optimization',
            description: 'Automatically optimize page performance',
            capability: 'performance',
            priority: 'low',
            parameters: { autoOptimize: true },
            estimatedDurationMs: 3000,
          })
        );
      } catch (error) {
        log.warn('Auto-optimization not queued', { tabId, error: String(error) });
      }
    }
    return queued;
  }

  // ============================================
  // INSIGHTS & SUBSCRIPTIONS
  // ============================================

  getInsights(category?: IntelligenceCapability): IntelligenceInsight[] {
    return this.insights.list(category);
  }

  /**
   * Run the aggregate insight rules now
   */
  generateAggregateInsights(): IntelligenceInsight[] {
    return this.insights.fromStatistics(this.statistics);
  }

  subscribeToTab(tabId: string, listener: TaskUpdateListener): () => void {
    return this.notifier.subscribe(tabId, listener);
  }

  subscribeToInsights(listener: InsightListener): () => void {
    return this.insights.subscribe(listener);
  }

  /**
   * Cancel running tasks that overran their estimate now
   */
  reapStuckTasks(): IntelligenceTask[] {
    return this.reaper.sweep();
  }

  // ============================================
  // SETTINGS
  // ============================================

  getSettings(): HubSettings {
    return { ...this.settings, enabledCapabilities: [...this.settings.enabledCapabilities] };
  }

  isCapabilityEnabled(capability: IntelligenceCapability): boolean {
    return this.settings.enabledCapabilities.includes(capability);
  }

  /**
   * Apply and persist a settings change. Numbers are clamped to range.
   */
  async configure(patch: Partial<HubSettings>): Promise<HubSettings> {
    const parsed = persistedSettingsSchema.safeParse(patch);
    if (!parsed.success) {
      throw new ConfigValidationError('settings', parsed.error);
    }
    this.settings = applySettingsPatch(this.settings, parsed.data);
    this.scheduler.setMaxConcurrent(this.settings.maxConcurrentTasks);
    this.syncAutoOptimizationTimer();
    log.info('Settings updated', { changed: Object.keys(parsed.data) });
    await this.persistSettings();
    return this.getSettings();
  }

  async setCapabilityEnabled(
    capability: IntelligenceCapability,
    enabled: boolean
  ): Promise<HubSettings> {
    const current = this.settings.enabledCapabilities.filter((c) => c !== capability);
    return this.configure({
      enabledCapabilities: enabled ? [...current, capability] : current,
    });
  }

  // ============================================
  // STATS
  // ============================================

  getStats(): HubStats {
    const { enabledCapabilities, ...configuration } = this.getSettings();
    const running = this.scheduler.runningCount;
    const pending = this.scheduler.queuedCount;
    return {
      ...this.statistics.snapshot(),
      registeredTabs: this.tabs.size,
      activeTasks: running + pending,
      runningTasks: running,
      queuedTasks: pending,
      enabledCapabilities,
      insights: this.insights.size,
      configuration,
    };
  }

  // ============================================
  // INTERNALS
  // ============================================

  private async loadStoredSettings(): Promise<PersistedSettings> {
    let raw: string | undefined;
    try {
      raw = await this.settingsStore.get(SETTINGS_KEY);
    } catch (error) {
      log.warn('Failed to read stored settings, using defaults', { error: String(error) });
      return {};
    }
    if (raw === undefined) {
      return {};
    }

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      log.warn('Stored settings are not valid JSON, ignoring them', { error: String(error) });
      return {};
    }

    const parsed = persistedSettingsSchema.safeParse(value);
    if (!parsed.success) {
      log.warn('Stored settings failed validation, ignoring them', {
        errors: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return {};
    }
    return parsed.data;
  }

  private async persistSettings(): Promise<void> {
    try {
      await this.settingsStore.set(SETTINGS_KEY, JSON.stringify(this.settings));
    } catch (error) {
      log.error('Failed to persist settings', { error });
      throw error;
    }
  }

  private syncAutoOptimizationTimer(): void {
    const wanted = this.initialized && !this.closed && this.settings.autoOptimization;
    if (wanted && !this.autoOptimizationTimer) {
      this.autoOptimizationTimer = setInterval(() => {
        this.runAutoOptimization().catch((error: unknown) => {
          log.error('Auto-optimization sweep failed', { error });
        });
      }, this.timing.autoOptimizationIntervalMs);
      this.autoOptimizationTimer.unref();
    } else if (!wanted) {
      this.stopAutoOptimizationTimer();
    }
  }

  private stopAutoOptimizationTimer(): void {
    if (this.autoOptimizationTimer) {
      clearInterval(this.autoOptimizationTimer);
      this.autoOptimizationTimer = null;
    }
  }
}

function describeOutcome(task: IntelligenceTask): string {
  switch (task.status) {
    case 'completed': {
      const message = task.result.message;
      return `Command executed successfully: ${typeof message === 'string' ? message : 'Done'}`;
    }
    case 'failed':
      return `Command failed: ${task.error ?? 'Unknown error'}`;
    default:
      return `Command cancelled: ${task.error ?? 'Cancelled'}`;
  }
}
