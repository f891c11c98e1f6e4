/**
 * Tab Intelligence Hub
 *
 * Schedules long-running intelligence tasks (web analysis, automation, AI
 * interaction, performance, security, accessibility and more) against
 * browsing contexts, bounded by a concurrency cap, and turns their results
 * into insights.
 *
 * @example
 * ```ts
 * import { IntelligenceHub } from 'tab-intelligence-hub';
 *
 * const hub = new IntelligenceHub();
 * hub.registry.register('performance', async (tabId) => ({ coreWebVitalsScore: 0.5 }));
 * await hub.initialize();
 * hub.subscribeToInsights((insight) => console.log(insight.title));
 * await hub.registerTab('tab-1');
 * ```
 */

// Hub
export {
  IntelligenceHub,
  applySettingsPatch,
  SETTINGS_KEY,
  type IntelligenceHubOptions,
} from './core/intelligence-hub.js';
export { CapabilityRegistry } from './core/capability-registry.js';
export {
  loadCapabilityHandlers,
  resolveHandlerModule,
  HANDLER_REGISTRATION_EXPORT,
  type CapabilityHandlerRegistrar,
} from './core/handler-loader.js';
export { interpretCommand, COMMAND_KEYWORDS } from './core/command-interpreter.js';
export { TaskStore, isTaskTransitionAllowed, type TaskQuery } from './core/task-store.js';
export { TaskScheduler, type TaskExecutor } from './core/task-scheduler.js';
export { ConcurrencyLimiter, clampConcurrency } from './core/concurrency-limiter.js';
export { ReadyQueue, priorityRank, type ReadyEntry } from './core/ready-queue.js';
export { HubStatistics } from './core/hub-statistics.js';
export { InsightGenerator, DEFAULT_INSIGHT_CAPACITY } from './core/insight-generator.js';
export { insightsForTask, insightsForStatistics } from './core/insight-rules.js';
export { StuckTaskReaper } from './core/stuck-task-reaper.js';
export { parseQueueTaskRequest, queueTaskRequestSchema } from './core/task-request.js';

// Types
export * from './types/intelligence.js';
export * from './types/errors.js';

// Settings & configuration
export {
  InMemorySettingsStore,
  JsonFileSettingsStore,
  type SettingsStore,
} from './utils/settings-store.js';
export {
  DEFAULT_HUB_SETTINGS,
  ConfigValidationError,
  type PersistedSettings,
} from './utils/config-schemas.js';
export { getMergedHubConfig, getMergedLogConfig } from './utils/config-loader.js';
export { PRIORITY_START_DELAYS, TIMINGS, type HubTimingOverrides } from './utils/timeouts.js';
export { configureLogger, type LoggerConfig } from './utils/logger.js';

// MCP
export { createHubMcpServer, type HubServerOptions } from './mcp/hub-server.js';
