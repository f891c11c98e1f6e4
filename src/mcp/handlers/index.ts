/**
 * MCP Handler Exports
 *
 * Unified exports for all MCP tool handlers.
 */

export {
  handleRegisterTab,
  handleCleanupTab,
  handleQueueTask,
  handleCancelTask,
  handleGetTask,
  handleProcessCommand,
  handleGetActiveTasks,
  handleGetInsights,
  handleGetIntelligenceStats,
  handleConfigureIntelligence,
  type ToolArgs,
} from './hub-handlers.js';
