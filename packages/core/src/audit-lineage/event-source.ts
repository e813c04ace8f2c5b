/**
 * Audit Event Source
 *
 * Thin adapter over the two external audit sources: the audit log service
 * (queried with a filter expression) and exported audit log tables
 * (queried with SQL). Both are consumed lazily; an optional token bucket
 * gates each request to respect the service quota.
 *
 * @module core/audit-lineage/event-source
 */

import { ConfigurationError } from '../errors.js';
import { componentLogger, type Logger } from '../logger/index.js';
import { TokenBucketRateLimiter } from '../rate-limiter.js';
import type { LineageConfig } from './config.js';
import type { ExtractionReport } from './report.js';
import type { ExportedAuditRow, RawAuditLogEntry } from './types.js';

// =============================================================================
// PORTS
// =============================================================================

/**
 * Audit log service client
 */
export interface AuditLogSource {
  fetch(filter: string, pageSize: number, maxResults?: number): AsyncIterable<RawAuditLogEntry>;
}

/**
 * Query engine over exported audit log tables
 */
export interface AuditTableClient {
  query(sql: string): AsyncIterable<ExportedAuditRow>;
}

export interface AuditEventSourceDependencies {
  logSource?: AuditLogSource;
  auditTableClient?: AuditTableClient;
  /** Overrides the limiter built from `rateLimit`/`requestsPerMin` */
  rateLimiter?: TokenBucketRateLimiter;
  logger?: Logger;
}

type SourceConfig = Pick<
  LineageConfig,
  | 'startTime'
  | 'endTime'
  | 'maxQueryDurationMs'
  | 'rateLimit'
  | 'requestsPerMin'
  | 'logPageSize'
  | 'auditMetadataDatasets'
  | 'useDateShardedAuditLogTables'
>;

// =============================================================================
// QUERY BUILDING
// =============================================================================

/**
 * `YYYY-MM-DDTHH:mm:ssZ` in UTC
 */
export function formatAuditDateTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * `YYYYMMDD` in UTC, the suffix of date-sharded audit tables
 */
export function formatAuditDateShard(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

/**
 * Filter expression for the audit log service: completed, error-free query
 * jobs that read at least one table or view, inside [start, end)
 */
export function buildLogFilter(startTime: string, endTime: string): string {
  return `resource.type=("bigquery_project")
AND
(
    protoPayload.methodName=
        (
            "google.cloud.bigquery.v2.JobService.Query"
            OR
            "google.cloud.bigquery.v2.JobService.InsertJob"
        )
    AND
    protoPayload.metadata.jobChange.job.jobStatus.jobState="DONE"
    AND NOT protoPayload.metadata.jobChange.job.jobStatus.errorResult:*
    AND (
        protoPayload.metadata.jobChange.job.jobStats.queryStats.referencedTables:*
        OR
        protoPayload.metadata.jobChange.job.jobStats.queryStats.referencedViews:*
    )
    AND (
        protoPayload.metadata.jobChange.job.jobStats.queryStats.referencedTables !~ "projects/.*/datasets/_.*/tables/anon.*"
        AND
        protoPayload.metadata.jobChange.job.jobStats.queryStats.referencedTables !~ "projects/.*/datasets/.*/tables/INFORMATION_SCHEMA.*"
        AND
        protoPayload.metadata.jobChange.job.jobStats.queryStats.referencedTables !~ "projects/.*/datasets/.*/tables/__TABLES__"
        AND
        protoPayload.metadata.jobChange.job.jobConfig.queryConfig.destinationTable !~ "projects/.*/datasets/_.*/tables/anon.*"
    )
)
AND
timestamp >= "${startTime}"
AND
timestamp < "${endTime}"`;
}

/**
 * SQL over an exported audit log dataset (`project.dataset`). Date-sharded
 * tables are narrowed by `_TABLE_SUFFIX` before the timestamp filter.
 */
export function buildAuditMetadataQuery(
  dataset: string,
  useDateShardedTables: boolean,
  start: Date,
  end: Date,
  limit?: number
): string {
  const startTime = formatAuditDateTime(start);
  const endTime = formatAuditDateTime(end);
  const select = `SELECT
    timestamp,
    logName,
    insertId,
    protopayload_auditlog AS protoPayload,
    protopayload_auditlog.metadataJson AS metadata`;

  const from = useDateShardedTables
    ? `FROM
    \`${dataset}.cloudaudit_googleapis_com_data_access_*\`
WHERE
    _TABLE_SUFFIX BETWEEN "${formatAuditDateShard(start)}" AND "${formatAuditDateShard(end)}" AND`
    : `FROM
    \`${dataset}.cloudaudit_googleapis_com_data_access\`
WHERE`;

  const filter = `    timestamp >= "${startTime}"
    AND timestamp < "${endTime}"
    AND protopayload_auditlog.serviceName="bigquery.googleapis.com"
    AND JSON_EXTRACT_SCALAR(protopayload_auditlog.metadataJson, "$.jobChange.job.jobStatus.jobState") = "DONE"
    AND JSON_EXTRACT(protopayload_auditlog.metadataJson, "$.jobChange.job.jobStatus.errorResults") IS NULL
    AND JSON_EXTRACT(protopayload_auditlog.metadataJson, "$.jobChange.job.jobConfig.queryConfig") IS NOT NULL`;

  const limitClause = limit !== undefined ? `\nLIMIT ${limit}` : '';
  return `${select}\n${from}\n${filter}${limitClause};`;
}

// =============================================================================
// SOURCE
// =============================================================================

export class AuditEventSource {
  private readonly config: SourceConfig;
  private readonly report: ExtractionReport;
  private readonly logSource: AuditLogSource | undefined;
  private readonly auditTableClient: AuditTableClient | undefined;
  private readonly rateLimiter: TokenBucketRateLimiter | undefined;
  private readonly logger: Logger;

  constructor(config: SourceConfig, report: ExtractionReport, deps: AuditEventSourceDependencies) {
    this.config = config;
    this.report = report;
    this.logSource = deps.logSource;
    this.auditTableClient = deps.auditTableClient;
    this.logger = deps.logger ?? componentLogger('audit-event-source');
    this.rateLimiter =
      deps.rateLimiter ??
      (config.rateLimit
        ? TokenBucketRateLimiter.perMinute('audit-source', config.requestsPerMin, this.logger)
        : undefined);
  }

  /**
   * Window padded by the maximum query duration on both sides, so that
   * completion events arriving late are still picked up
   */
  private paddedWindow(): { start: Date; end: Date } {
    return {
      start: new Date(this.config.startTime.getTime() - this.config.maxQueryDurationMs),
      end: new Date(this.config.endTime.getTime() + this.config.maxQueryDurationMs),
    };
  }

  private async throttle(): Promise<void> {
    if (this.rateLimiter) {
      await this.rateLimiter.acquire();
    }
  }

  /**
   * Lazily read audit log entries for the configured window
   */
  async *readLogEntries(limit?: number): AsyncGenerator<RawAuditLogEntry> {
    if (!this.logSource) {
      throw new ConfigurationError('No audit log source configured');
    }

    this.report.numTotalLogEntries = 0;
    const window = this.paddedWindow();
    const startTime = formatAuditDateTime(window.start);
    const endTime = formatAuditDateTime(window.end);
    this.report.logEntryStartTime = startTime;
    this.report.logEntryEndTime = endTime;

    const filter = buildLogFilter(startTime, endTime);
    this.logger.info({ startTime, endTime }, 'Start loading audit log entries');

    await this.throttle();
    for await (const entry of this.logSource.fetch(filter, this.config.logPageSize, limit)) {
      this.report.numTotalLogEntries++;
      yield entry;
    }

    this.logger.info(
      { total: this.report.numTotalLogEntries },
      'Finished loading audit log entries'
    );
  }

  /**
   * Lazily read exported audit rows, one query per configured dataset
   */
  async *readExportedAuditRows(limit?: number): AsyncGenerator<ExportedAuditRow> {
    if (!this.auditTableClient) {
      throw new ConfigurationError('No audit table client configured');
    }

    const datasets = this.config.auditMetadataDatasets;
    if (!datasets || datasets.length === 0) {
      const reason = 'auditMetadataDatasets not set';
      this.report.reportFailure('audit-metadata', reason);
      this.report.auditMetadataDatasetsMissing = true;
      this.logger.error(reason);
      return;
    }

    const window = this.paddedWindow();
    const startTime = formatAuditDateTime(window.start);
    const endTime = formatAuditDateTime(window.end);
    this.report.auditStartTime = startTime;
    this.report.auditEndTime = endTime;

    for (const dataset of datasets) {
      this.logger.info({ dataset, startTime, endTime }, 'Start loading exported audit rows');
      const sql = buildAuditMetadataQuery(
        dataset,
        this.config.useDateShardedAuditLogTables,
        window.start,
        window.end,
        limit
      );

      await this.throttle();
      yield* this.auditTableClient.query(sql);

      this.logger.info({ dataset }, 'Finished loading exported audit rows');
    }
  }
}
