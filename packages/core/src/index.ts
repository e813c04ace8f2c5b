export {
  createLogger,
  createChildLogger,
  componentLogger,
  logger,
  type Logger,
  type LoggerConfig,
  type LogContext,
} from './logger/index.js';

// Redaction utilities for SQL text and principal identities
export {
  redactString,
  redactSql,
  deepRedactObject,
  REDACTION_PATHS,
  shouldRedactPath,
} from './logger/redaction.js';

export {
  AppError,
  ValidationError,
  ConfigurationError,
  ExternalServiceError,
  SqlParseError,
  toError,
} from './errors.js';

export {
  Ok,
  Err,
  isOk,
  isErr,
  type Result,
} from './types/result.js';

export { TokenBucketRateLimiter, type RateLimiterConfig } from './rate-limiter.js';

export {
  LineageEnvironmentSchema,
  validateEnv,
  loadLineageConfigFromEnv,
  hasEnvVar,
  type LineageEnvironment,
} from './env.js';

// Audit-trail table lineage
export * from './audit-lineage/index.js';
