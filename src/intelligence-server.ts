#!/usr/bin/env node

/**
 * Tab Intelligence Hub MCP Server
 *
 * Runs one IntelligenceHub over stdio. Capability handlers come from the
 * module named by TAB_INTEL_HANDLERS_MODULE (or hub.handlersModule in
 * .tabintelrc), which must export registerCapabilityHandlers(registry).
 * Settings persist to TAB_INTEL_SETTINGS_PATH when set.
 *
 * Usage with an MCP client:
 * ```json
 * {
 *   "mcpServers": {
 *     "tab-intelligence": {
 *       "command": "tab-intelligence-hub",
 *       "env": { "TAB_INTEL_HANDLERS_MODULE": "/path/to/handlers.js" }
 *     }
 *   }
 * }
 * ```
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadCapabilityHandlers } from './core/handler-loader.js';
import { IntelligenceHub } from './core/intelligence-hub.js';
import { createHubMcpServer, VERSION } from './mcp/hub-server.js';
import { getMergedHubConfig, getMergedLogConfig } from './utils/config-loader.js';
import { configureLogger, logger, logServerShutdown, logServerStart } from './utils/logger.js';
import {
  InMemorySettingsStore,
  JsonFileSettingsStore,
  type SettingsStore,
} from './utils/settings-store.js';

/**
 * Create and start the hub MCP server
 */
async function main(): Promise<void> {
  const logConfig = getMergedLogConfig();
  configureLogger({ level: logConfig.level, prettyPrint: logConfig.prettyPrint });

  const hubConfig = getMergedHubConfig();
  const settingsStore: SettingsStore = hubConfig.settingsPath
    ? new JsonFileSettingsStore(hubConfig.settingsPath)
    : new InMemorySettingsStore();

  const hub = new IntelligenceHub({ settingsStore, settings: hubConfig.settings });
  if (hubConfig.handlersModule) {
    await loadCapabilityHandlers(hubConfig.handlersModule, hub.registry);
  } else {
    logger.server.warn('No handlers module configured, every task will fail', {
      hint: 'Set TAB_INTEL_HANDLERS_MODULE',
    });
  }
  await hub.initialize();

  const server = createHubMcpServer(hub);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logServerStart(VERSION, hub.getSettings().enabledCapabilities);

  const stop = (signal: string) => {
    logServerShutdown(signal);
    hub.shutdown();
    void server
      .close()
      .catch((error: unknown) => {
        logger.server.error('Error closing server', { error });
      })
      .finally(() => {
        process.exit(0);
      });
  };

  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    logger.server.error('Fatal error', { error });
    process.exit(1);
  });
}

export { main as startIntelligenceServer };
