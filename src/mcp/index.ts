/**
 * MCP Module Exports
 *
 * Unified exports for all MCP-related functionality.
 */

// Server
export { createHubMcpServer, SERVER_NAME, VERSION, type HubServerOptions } from './hub-server.js';

// Response formatters
export {
  jsonResponse,
  errorResponse,
  buildStructuredError,
  RESPONSE_SCHEMA_VERSION,
  type McpResponse,
  type StructuredError,
} from './response-formatters.js';

// Tool schemas
export {
  getAllToolSchemas,
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
} from './tool-schemas.js';

// Tool handlers
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
} from './handlers/index.js';
