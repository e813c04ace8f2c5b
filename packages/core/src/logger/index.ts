/**
 * Pino logger with credential and identity redaction
 *
 * Features:
 * - Automatic redaction of credentials and principal identities
 * - Run ID binding so one extraction run can be followed
 * - Pretty printing in development
 * - Structured JSON logging in production, silent under test
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

import { createCensor, REDACTION_PATHS } from './redaction.js';

export {
  REDACTION_PATHS,
  redactString,
  redactSql,
  deepRedactObject,
  shouldRedactPath,
} from './redaction.js';

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Log level (default: based on NODE_ENV) */
  level?: string;
  /** Service name for log identification */
  serviceName?: string;
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
  /** Disable redaction (NOT recommended in production) */
  disableRedaction?: boolean;
  /** Additional redaction paths */
  additionalRedactionPaths?: string[];
}

/**
 * Context that can be attached to log entries
 */
export interface LogContext {
  /** Identifier of one extraction run */
  runId?: string;
  /** Pipeline component emitting the entry */
  component?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Get default log level based on environment
 */
function getDefaultLevel(): string {
  const env = process.env.NODE_ENV;
  const envLevel = process.env.LOG_LEVEL;

  if (envLevel) {
    return envLevel;
  }

  switch (env) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

/**
 * Check if running in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
}

/**
 * Create the logger configuration
 */
function createLoggerOptions(config: LoggerConfig = {}): LoggerOptions {
  const {
    level = getDefaultLevel(),
    serviceName = 'auditlineage',
    disableRedaction = false,
    additionalRedactionPaths = [],
  } = config;

  const allRedactionPaths = [...REDACTION_PATHS, ...additionalRedactionPaths];

  const options: LoggerOptions = {
    level,
    name: serviceName,
    timestamp: pino.stdTimeFunctions.isoTime,

    base: {
      service: serviceName,
      env: process.env.NODE_ENV ?? 'development',
    },

    formatters: {
      level: (label) => ({ level: label }),
    },

    messageKey: 'msg',
  };

  if (!disableRedaction) {
    options.redact = {
      paths: allRedactionPaths,
      censor: createCensor,
    };
  }

  return options;
}

/**
 * Create a child logger with context
 */
export function createChildLogger(parent: Logger, context: LogContext): Logger {
  return parent.child(context);
}

/**
 * Create the main logger instance
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const options = createLoggerOptions(config);
  const pretty = config.pretty ?? isDevelopment();

  if (pretty) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
        singleLine: false,
      },
    }) as pino.DestinationStream;
    return pino(options, transport);
  }

  return pino(options);
}

/**
 * Default logger instance
 */
export const logger: Logger = createLogger({
  serviceName: process.env.SERVICE_NAME ?? 'auditlineage',
});

/**
 * Logger for one pipeline component, bound to `{ component }`
 */
export function componentLogger(component: string, parent: Logger = logger): Logger {
  return createChildLogger(parent, { component });
}

export type { Logger, LoggerOptions } from 'pino';
