/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Structured metadata for each log entry
 * - Output to stderr (stdout is reserved for the MCP protocol)
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  tabId?: string;
  taskId?: string;
  capability?: string;
  priority?: string;
  operation?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

function envLogLevel(): LogLevel {
  const value = process.env.LOG_LEVEL;
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: envLogLevel(),
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

/**
 * Paths to redact from logs. Task parameters come from hosts and commands
 * and may carry credentials for the page being automated.
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  '*.password',
  '*.secret',
  '*.apiKey',
  '*.api_key',
  '*.token',
  '*.accessToken',
  '*.refreshToken',
  '*.credentials',
  '*.cookie',
  '*.authorization',
  'parameters.password',
  'parameters.token',
  'parameters.credentials',
];

function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'tab-intelligence-hub',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  const destination = config.destination === 'stderr' ? process.stderr : process.stdout;

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  return pino(options, destination);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (useful for testing or runtime changes)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Component-specific logger wrapper
 *
 * Resolves the base logger on every call so configureLogger() takes effect
 * for loggers created at module load.
 */
export class Logger {
  private _logger: PinoLogger | null = null;
  private component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this._logger = parentLogger.child({ component });
    }
  }

  private get logger(): PinoLogger {
    if (this._logger) {
      return this._logger;
    }
    return baseLogger.child({ component: this.component });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component);
    childLogger._logger = this.logger.child(context);
    return childLogger;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  /**
   * Accepts unknown for error since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err =
        context.error instanceof Error
          ? {
              message: context.error.message,
              name: context.error.name,
              stack: context.error.stack,
            }
          : { message: String(context.error) };

      this.logger.error({ ...context, err }, message);
    } else {
      this.logger.error(context || {}, message);
    }
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  hub: new Logger('IntelligenceHub'),
  registry: new Logger('CapabilityRegistry'),
  taskStore: new Logger('TaskStore'),
  scheduler: new Logger('TaskScheduler'),
  supervisor: new Logger('ExecutionSupervisor'),
  reaper: new Logger('StuckTaskReaper'),
  insights: new Logger('InsightGenerator'),
  notifications: new Logger('Notifications'),
  settings: new Logger('Settings'),

  server: new Logger('MCPServer'),

  create: (component: string) => new Logger(component),
};

export function logServerStart(version: string, features: string[]): void {
  logger.server.info('Server starting', {
    version,
    features,
    nodeVersion: process.version,
  });
}

export function logServerShutdown(reason?: string): void {
  logger.server.info('Server shutting down', { reason });
}

export default logger;
