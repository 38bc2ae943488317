/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Structured metadata for each log entry
 * - Header and credential redaction for captured network traffic
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { logConfigSchema, type LogLevel } from './config-schemas.js';

export type { LogLevel };

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  sessionId?: string;
  requestId?: string;
  url?: string;
  domain?: string;
  eventType?: string;
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

/**
 * Defaults come from LOG_LEVEL and LOG_PRETTY. Invalid values fall back to
 * info without pretty printing; validateAllConfigs reports them.
 */
function configFromEnv(): LoggerConfig {
  const parsed = logConfigSchema.safeParse({
    level: process.env.LOG_LEVEL,
    prettyPrint: process.env.LOG_PRETTY,
  });
  const base = parsed.success ? parsed.data : { level: 'info' as const, prettyPrint: false };
  return { ...base, destination: 'stderr' };
}

const DEFAULT_CONFIG: LoggerConfig = configFromEnv();

// Captured requests carry real browser headers and post bodies.
const SENSITIVE_HEADERS = [
  'authorization',
  'Authorization',
  'proxy-authorization',
  'cookie',
  'Cookie',
  'set-cookie',
  'Set-Cookie',
  'x-api-key',
];

const HEADER_CONTAINERS = [
  '*',
  'headers',
  'requestHeaders',
  'responseHeaders',
  'request.headers',
  'response.headers',
];

const SENSITIVE_FIELDS = [
  'password',
  'secret',
  'apiKey',
  'api_key',
  'token',
  'accessToken',
  'access_token',
  'refreshToken',
  'refresh_token',
  'postData',
];

/**
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  ...HEADER_CONTAINERS.flatMap((container) =>
    SENSITIVE_HEADERS.map((header) => `${container}.${header}`)
  ),
  ...SENSITIVE_FIELDS.map((field) => `*.${field}`),
];

/**
 * Create the base Pino logger instance
 */
function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'pagewatch',
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
 * Get the base logger
 */
export function getLogger(): PinoLogger {
  return baseLogger;
}

/**
 * Component-specific logger wrapper
 *
 * Uses a getter to always access the current baseLogger, allowing
 * reconfiguration at runtime via configureLogger().
 */
export class Logger {
  private _logger: PinoLogger | null = null;
  private component: string;

  constructor(component: string) {
    this.component = component;
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
   * Error level. Accepts unknown for `error` since catch blocks provide unknown.
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err = context.error instanceof Error
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
  session: new Logger('TelemetrySession'),
  sessionManager: new Logger('TelemetrySessionManager'),
  eventLog: new Logger('EventLog'),
  console: new Logger('ConsoleMonitor'),
  network: new Logger('NetworkMonitor'),
  performance: new Logger('PerformanceMonitor'),
  instrumentation: new Logger('PageInstrumentation'),

  // Create a custom logger for any component
  create: (component: string) => new Logger(component),
};

export default logger;
