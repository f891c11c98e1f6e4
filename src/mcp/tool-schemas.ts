/**
 * MCP Tool Schemas
 *
 * Tool definitions for the hub's MCP server.
 * Separated from the server for maintainability.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { CAPABILITIES, TASK_PRIORITIES } from '../types/intelligence.js';

const capabilityProperty = {
  type: 'string',
  enum: [...CAPABILITIES],
  description: 'Capability that performs the work',
};

export const registerTabSchema: Tool = {
  name: 'register_tab',
  description: `Register a browsing context with the hub.

Queues the initial analysis for the tab:
- Initial Page Analysis (webAnalysis, high priority)
- Security Scan (security, high priority)
- Performance Analysis (performance, medium priority)

Tasks for disabled capabilities are skipped. Registering a tab twice queues nothing.

Returns: taskIds of the queued tasks.`,
  inputSchema: {
    type: 'object',
    properties: {
      tabId: { type: 'string', description: 'Identifier of the browsing context' },
    },
    required: ['tabId'],
  },
};

export const cleanupTabSchema: Tool = {
  name: 'cleanup_tab',
  description: `Forget a browsing context. Pending tasks are cancelled, running tasks are aborted with the error "Tab closed".`,
  inputSchema: {
    type: 'object',
    properties: {
      tabId: { type: 'string', description: 'Identifier of the browsing context' },
    },
    required: ['tabId'],
  },
};

export const queueTaskSchema: Tool = {
  name: 'queue_task',
  description: `Queue an intelligence task against a tab.

The task starts after its priority's delay (critical 0ms, high 100ms, medium 500ms,
low 2s, idle 10s) as soon as a concurrency slot is free. Higher priority tasks
waiting for a slot always go first.

Fails with CAPABILITY_DISABLED when the capability is not enabled.

Returns: taskId (the task has not run yet).`,
  inputSchema: {
    type: 'object',
    properties: {
      tabId: { type: 'string', description: 'Identifier of the browsing context' },
      name: { type: 'string', description: 'Short task name' },
      capability: capabilityProperty,
      priority: {
        type: 'string',
        enum: [...TASK_PRIORITIES],
        description: 'Task priority (default: medium)',
      },
      description: { type: 'string', description: 'What the task does' },
      parameters: { type: 'object', description: 'Parameters handed to the capability handler' },
      estimatedDurationMs: {
        type: 'number',
        description: 'Expected duration. Tasks running past twice this are cancelled (default: 5 minutes)',
      },
      id: { type: 'string', description: 'Task id (default: generated)' },
    },
    required: ['tabId', 'name', 'capability'],
  },
};

export const cancelTaskSchema: Tool = {
  name: 'cancel_task',
  description: 'Cancel a task that has not started yet. Running and finished tasks are not affected.',
  inputSchema: {
    type: 'object',
    properties: {
      taskId: { type: 'string', description: 'Task to cancel' },
    },
    required: ['taskId'],
  },
};

export const getTaskSchema: Tool = {
  name: 'get_task',
  description: `Get one task by id, including its status, result and error.

Finished tasks stay available for five minutes after they complete, fail or are cancelled.`,
  inputSchema: {
    type: 'object',
    properties: {
      taskId: { type: 'string', description: 'Task to look up' },
    },
    required: ['taskId'],
  },
};

export const processCommandSchema: Tool = {
  name: 'process_command',
  description: `Run a free-text command against a tab and wait for the outcome.

The command is routed by keyword:
- click / fill / automate -> automation
- analyze / understand -> webAnalysis
- optimize / speed -> performance
- secure / safe -> security
- accessible / a11y -> accessibility
- anything else -> aiInteraction`,
  inputSchema: {
    type: 'object',
    properties: {
      tabId: { type: 'string', description: 'Identifier of the browsing context' },
      command: { type: 'string', description: 'Instruction in natural language' },
    },
    required: ['tabId', 'command'],
  },
};

export const getActiveTasksSchema: Tool = {
  name: 'get_active_tasks',
  description: 'List pending and running tasks, optionally for one tab.',
  inputSchema: {
    type: 'object',
    properties: {
      tabId: { type: 'string', description: 'Only tasks of this tab' },
    },
  },
};

export const getInsightsSchema: Tool = {
  name: 'get_insights',
  description: 'List stored insights (at most 50, oldest evicted first), optionally for one category.',
  inputSchema: {
    type: 'object',
    properties: {
      category: { ...capabilityProperty, description: 'Only insights of this category' },
    },
  },
};

export const getIntelligenceStatsSchema: Tool = {
  name: 'get_intelligence_stats',
  description: `Hub statistics: registered tabs, active tasks, completed and failed counts,
execution time, success rate, capability usage, enabled capabilities and configuration.`,
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export const configureIntelligenceSchema: Tool = {
  name: 'configure_intelligence',
  description: `Change hub settings. Omitted fields keep their value. Changes are persisted.

- confidenceThreshold is clamped to 0-1
- maxConcurrentTasks is clamped to 1-20; raising it starts waiting tasks at once`,
  inputSchema: {
    type: 'object',
    properties: {
      enabledCapabilities: {
        type: 'array',
        items: { type: 'string', enum: [...CAPABILITIES] },
        description: 'Full set of enabled capabilities',
      },
      autoOptimization: { type: 'boolean' },
      predictiveBrowsing: { type: 'boolean' },
      learningMode: { type: 'boolean' },
      confidenceThreshold: {
        type: 'number',
        description: 'Stored confidence threshold for hosts acting on insights',
      },
      maxConcurrentTasks: { type: 'number', description: 'Concurrency cap' },
    },
  },
};

/**
 * All tool schemas in listing order
 */
export function getAllToolSchemas(): Tool[] {
  return [
    registerTabSchema,
    cleanupTabSchema,
    queueTaskSchema,
    cancelTaskSchema,
    getTaskSchema,
    processCommandSchema,
    getActiveTasksSchema,
    getInsightsSchema,
    getIntelligenceStatsSchema,
    configureIntelligenceSchema,
  ];
}
