import { z } from 'zod';

import { parseLineageConfig, type LineageConfig, type LineageConfigInput } from './audit-lineage/config.js';
import { ConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 * Maps LINEAGE_* variables onto the lineage configuration
 */

const booleanFlag = z
  .enum(['true', 'false'])
  .optional()
  .transform((v) => (v === undefined ? undefined : v === 'true'));

const integer = z
  .string()
  .optional()
  .transform((v) => (v ? Number(v) : undefined));

const date = z
  .string()
  .optional()
  .transform((v) => (v ? new Date(v) : undefined));

const list = z
  .string()
  .optional()
  .transform((v) =>
    v
      ? v
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
      : undefined
  );

// Base runtime config
const ServerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

// Lineage extraction config
const LineageEnvSchema = z.object({
  LINEAGE_PROJECT_ID: z.string().optional(),
  /** ISO-8601 start of the extraction window */
  LINEAGE_START_TIME: date,
  /** ISO-8601 end of the extraction window */
  LINEAGE_END_TIME: date,
  LINEAGE_MAX_QUERY_DURATION_MS: integer,
  LINEAGE_RATE_LIMIT: booleanFlag,
  LINEAGE_REQUESTS_PER_MIN: integer,
  LINEAGE_LOG_PAGE_SIZE: integer,
  LINEAGE_INCLUDE_FULL_PAYLOADS: booleanFlag,
  LINEAGE_USE_EXPORTED_AUDIT_METADATA: booleanFlag,
  /** Comma-separated `project.dataset` names */
  LINEAGE_AUDIT_METADATA_DATASETS: list,
  LINEAGE_USE_DATE_SHARDED_AUDIT_LOG_TABLES: booleanFlag,
  LINEAGE_TEMP_TABLE_DATASET_PREFIX: z.string().optional(),
  /** Comma-separated table name regexes */
  LINEAGE_TEMP_TABLE_PATTERNS: list,
  LINEAGE_DATASET_ALLOW: list,
  LINEAGE_DATASET_DENY: list,
  LINEAGE_TABLE_ALLOW: list,
  LINEAGE_TABLE_DENY: list,
  LINEAGE_PLATFORM: z.string().optional(),
  LINEAGE_PLATFORM_INSTANCE: z.string().optional(),
  LINEAGE_ENV: z.string().optional(),
  LINEAGE_UPSTREAM_LINEAGE_IN_REPORT: booleanFlag,
});

export const LineageEnvironmentSchema = ServerEnvSchema.merge(LineageEnvSchema);

export type LineageEnvironment = z.infer<typeof LineageEnvironmentSchema>;

/**
 * Validate environment variables
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): LineageEnvironment {
  const result = LineageEnvironmentSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const issues = Object.entries(errors).map(
      ([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`
    );

    throw new ConfigurationError(
      `Environment validation failed:\n  ${issues.join('\n  ')}`,
      issues
    );
  }

  return result.data;
}

/**
 * Build and validate the lineage configuration from LINEAGE_* variables.
 * Unset variables fall back to the schema defaults.
 */
export function loadLineageConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LineageConfig {
  const vars = validateEnv(env);

  const input: LineageConfigInput = {
    projectId: vars.LINEAGE_PROJECT_ID,
    startTime: vars.LINEAGE_START_TIME,
    endTime: vars.LINEAGE_END_TIME,
    maxQueryDurationMs: vars.LINEAGE_MAX_QUERY_DURATION_MS,
    rateLimit: vars.LINEAGE_RATE_LIMIT,
    requestsPerMin: vars.LINEAGE_REQUESTS_PER_MIN,
    logPageSize: vars.LINEAGE_LOG_PAGE_SIZE,
    includeFullPayloads: vars.LINEAGE_INCLUDE_FULL_PAYLOADS,
    useExportedAuditMetadata: vars.LINEAGE_USE_EXPORTED_AUDIT_METADATA,
    auditMetadataDatasets: vars.LINEAGE_AUDIT_METADATA_DATASETS,
    useDateShardedAuditLogTables: vars.LINEAGE_USE_DATE_SHARDED_AUDIT_LOG_TABLES,
    tempTableDatasetPrefix: vars.LINEAGE_TEMP_TABLE_DATASET_PREFIX,
    tempTablePatterns: vars.LINEAGE_TEMP_TABLE_PATTERNS,
    datasetPattern: {
      allow: vars.LINEAGE_DATASET_ALLOW,
      deny: vars.LINEAGE_DATASET_DENY,
    },
    tablePattern: {
      allow: vars.LINEAGE_TABLE_ALLOW,
      deny: vars.LINEAGE_TABLE_DENY,
    },
    platform: vars.LINEAGE_PLATFORM,
    platformInstance: vars.LINEAGE_PLATFORM_INSTANCE,
    env: vars.LINEAGE_ENV,
    upstreamLineageInReport: vars.LINEAGE_UPSTREAM_LINEAGE_IN_REPORT,
  };

  return parseLineageConfig(input);
}

/**
 * Check if a specific variable is configured
 */
export function hasEnvVar(name: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[name];
  return value !== undefined && value !== '';
}
