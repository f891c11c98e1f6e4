/**
 * Hub Tool Handlers
 *
 * Handlers for the intelligence hub tools:
 * - register_tab / cleanup_tab
 * - queue_task / cancel_task / get_task / process_command
 * - get_active_tasks / get_insights / get_intelligence_stats
 * - configure_intelligence
 *
 * Arguments arrive untyped from the client and are validated with zod.
 */

import { z } from 'zod';
import type { IntelligenceHub } from '../../core/intelligence-hub.js';
import { queueTaskRequestSchema } from '../../core/task-request.js';
import { capabilitySchema, persistedSettingsSchema } from '../../utils/config-schemas.js';
import { taskNotFoundError } from '../../utils/error-messages.js';
import { jsonResponse, errorResponse, type McpResponse } from '../response-formatters.js';

export type ToolArgs = Record<string, unknown>;

const tabArgsSchema = z.object({ tabId: z.string().min(1) });
const taskIdArgsSchema = z.object({ taskId: z.string().min(1) });
const processCommandArgsSchema = z.object({
  tabId: z.string().min(1),
  command: z.string().min(1),
});
const activeTasksArgsSchema = z.object({ tabId: z.string().min(1).optional() });
const insightsArgsSchema = z.object({ category: capabilitySchema.optional() });

/**
 * Handle register_tab tool call
 */
export async function handleRegisterTab(hub: IntelligenceHub, args: ToolArgs): Promise<McpResponse> {
  const { tabId } = tabArgsSchema.parse(args);
  const taskIds = await hub.registerTab(tabId);
  return jsonResponse({ tabId, taskIds });
}

/**
 * Handle cleanup_tab tool call
 */
export function handleCleanupTab(hub: IntelligenceHub, args: ToolArgs): McpResponse {
  const { tabId } = tabArgsSchema.parse(args);
  hub.cleanupTab(tabId);
  return jsonResponse({ tabId, cleanedUp: true });
}

/**
 * Handle queue_task tool call
 */
export async function handleQueueTask(hub: IntelligenceHub, args: ToolArgs): Promise<McpResponse> {
  const request = queueTaskRequestSchema.parse(args);
  const taskId = await hub.queueTask(request);
  return jsonResponse({ taskId, status: 'pending' });
}

/**
 * Handle cancel_task tool call
 */
export function handleCancelTask(hub: IntelligenceHub, args: ToolArgs): McpResponse {
  const { taskId } = taskIdArgsSchema.parse(args);
  const task = hub.getTask(taskId);
  if (!task) {
    return errorResponse(taskNotFoundError(taskId), 'TASK_NOT_FOUND');
  }
  const cancelled = hub.cancelTask(taskId);
  return jsonResponse({
    taskId,
    cancelled,
    status: hub.getTask(taskId)?.status ?? task.status,
  });
}

/**
 * Handle get_task tool call
 */
export function handleGetTask(hub: IntelligenceHub, args: ToolArgs): McpResponse {
  const { taskId } = taskIdArgsSchema.parse(args);
  const task = hub.getTask(taskId);
  if (!task) {
    return errorResponse(taskNotFoundError(taskId), 'TASK_NOT_FOUND');
  }
  return jsonResponse({ task });
}

/**
 * Handle process_command tool call
 */
export async function handleProcessCommand(
  hub: IntelligenceHub,
  args: ToolArgs
): Promise<McpResponse> {
  const { tabId, command } = processCommandArgsSchema.parse(args);
  const outcome = await hub.processCommand(tabId, command);
  return jsonResponse({ ...outcome });
}

/**
 * Handle get_active_tasks tool call
 */
export function handleGetActiveTasks(hub: IntelligenceHub, args: ToolArgs): McpResponse {
  const { tabId } = activeTasksArgsSchema.parse(args);
  const tasks = hub.getActiveTasks(tabId);
  return jsonResponse({ count: tasks.length, tasks });
}

/**
 * Handle get_insights tool call
 */
export function handleGetInsights(hub: IntelligenceHub, args: ToolArgs): McpResponse {
  const { category } = insightsArgsSchema.parse(args);
  const insights = hub.getInsights(category);
  return jsonResponse({ count: insights.length, insights });
}

/**
 * Handle get_intelligence_stats tool call
 */
export function handleGetIntelligenceStats(hub: IntelligenceHub): McpResponse {
  return jsonResponse({ ...hub.getStats() });
}

/**
 * Handle configure_intelligence tool call
 */
export async function handleConfigureIntelligence(
  hub: IntelligenceHub,
  args: ToolArgs
): Promise<McpResponse> {
  const patch = persistedSettingsSchema.strict().parse(args);
  const settings = await hub.configure(patch);
  return jsonResponse({ settings });
}
