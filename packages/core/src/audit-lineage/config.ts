/**
 * Lineage extractor configuration
 *
 * @module core/audit-lineage/config
 */

import { z } from 'zod';

import { ConfigurationError } from '../errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Regex allow/deny lists; a name is allowed when some allow pattern and no
 * deny pattern matches from its start
 */
export const AllowDenyPatternConfigSchema = z.object({
  allow: z.array(z.string()).default(['.*']),
  deny: z.array(z.string()).default([]),
  ignoreCase: z.boolean().default(true),
});
export type AllowDenyPatternConfig = z.infer<typeof AllowDenyPatternConfigSchema>;

export const LineageConfigSchema = z
  .object({
    /** Project the audit logs are read from */
    projectId: z.string().min(1).optional(),
    /** Start of the extraction window (default: 24h before endTime) */
    startTime: z.coerce.date().optional(),
    /** End of the extraction window (default: now) */
    endTime: z.coerce.date().optional(),
    /** Padding applied on both sides of the window for late completion events */
    maxQueryDurationMs: z
      .number()
      .int()
      .nonnegative()
      .default(15 * 60 * 1000),

    /** Gate audit source requests with a token bucket */
    rateLimit: z.boolean().default(false),
    requestsPerMin: z.number().int().positive().default(60),
    logPageSize: z.number().int().positive().default(1000),

    /** Keep the full raw payload on each parsed event (debug only) */
    includeFullPayloads: z.boolean().default(false),

    /** Read exported audit tables instead of the audit log service */
    useExportedAuditMetadata: z.boolean().default(false),
    /** `project.dataset` names holding exported audit logs */
    auditMetadataDatasets: z.array(z.string().min(1)).optional(),
    useDateShardedAuditLogTables: z.boolean().default(false),

    /** Datasets starting with this prefix hold temporary tables */
    tempTableDatasetPrefix: z.string().default('_'),
    /** Table names matching any of these regexes are temporary */
    tempTablePatterns: z.array(z.string()).default([]),

    datasetPattern: AllowDenyPatternConfigSchema.default({}),
    tablePattern: AllowDenyPatternConfigSchema.default({}),

    platform: z.string().min(1).default('bigquery'),
    platformInstance: z.string().min(1).optional(),
    env: z.string().min(1).default('PROD'),

    /** Record resolved upstreams on the extraction report */
    upstreamLineageInReport: z.boolean().default(false),
  })
  .transform((config) => {
    const endTime = config.endTime ?? new Date();
    const startTime = config.startTime ?? new Date(endTime.getTime() - DAY_MS);
    return { ...config, startTime, endTime };
  })
  .refine((config) => config.startTime.getTime() < config.endTime.getTime(), {
    message: 'startTime must be before endTime',
    path: ['startTime'],
  });

export type LineageConfigInput = z.input<typeof LineageConfigSchema>;
export type LineageConfig = z.output<typeof LineageConfigSchema>;

/**
 * Validate extractor configuration
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseLineageConfig(input: LineageConfigInput = {}): LineageConfig {
  const result = LineageConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Lineage configuration is invalid:\n  ${issues.join('\n  ')}`, issues);
  }

  return result.data;
}
