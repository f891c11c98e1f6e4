/**
 * Intelligence Hub MCP Server
 *
 * Exposes one IntelligenceHub as MCP tools. Transport-agnostic: the stdio
 * entry point and the tests connect it to their own transport.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { IntelligenceHub } from '../core/intelligence-hub.js';
import { unknownToolError } from '../utils/error-messages.js';
import { logger } from '../utils/logger.js';
import {
  handleCancelTask,
  handleCleanupTab,
  handleConfigureIntelligence,
  handleGetActiveTasks,
  handleGetInsights,
  handleGetIntelligenceStats,
  handleGetTask,
  handleProcessCommand,
  handleQueueTask,
  handleRegisterTab,
  type ToolArgs,
} from './handlers/index.js';
import { errorResponse, type McpResponse } from './response-formatters.js';
import { getAllToolSchemas } from './tool-schemas.js';

export const SERVER_NAME = 'tab-intelligence-hub';
export const VERSION = '0.1.0';

type ToolHandler = (hub: IntelligenceHub, args: ToolArgs) => McpResponse | Promise<McpResponse>;

const TOOL_HANDLERS: Record<string, ToolHandler> = {
  register_tab: handleRegisterTab,
  cleanup_tab: handleCleanupTab,
  queue_task: handleQueueTask,
  cancel_task: handleCancelTask,
  get_task: handleGetTask,
  process_command: handleProcessCommand,
  get_active_tasks: handleGetActiveTasks,
  get_insights: handleGetInsights,
  get_intelligence_stats: (hub) => handleGetIntelligenceStats(hub),
  configure_intelligence: handleConfigureIntelligence,
};

export interface HubServerOptions {
  name?: string;
  version?: string;
}

/**
 * Create an MCP server bound to a hub
 */
export function createHubMcpServer(hub: IntelligenceHub, options: HubServerOptions = {}): Server {
  const tools = getAllToolSchemas();
  const server = new Server(
    {
      name: options.name ?? SERVER_NAME,
      version: options.version ?? VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const handler = Object.hasOwn(TOOL_HANDLERS, name) ? TOOL_HANDLERS[name] : undefined;
    if (!handler) {
      return errorResponse(
        unknownToolError(
          name,
          tools.map((t) => t.name)
        ),
        'UNKNOWN_TOOL'
      );
    }

    try {
      return await handler(hub, args ?? {});
    } catch (error) {
      logger.server.warn('Tool error', { name, error: String(error) });
      return errorResponse(error);
    }
  });

  return server;
}
