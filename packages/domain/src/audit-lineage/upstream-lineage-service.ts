/**
 * @fileoverview Upstream Lineage Domain Service
 *
 * Answers "which tables feed this table?" for callers. The lineage map is
 * built lazily from the configured audit source on the first request and
 * cached for the lifetime of the service (or until invalidated).
 *
 * @module domain/audit-lineage/upstream-lineage-service
 */

import {
  AllowDenyPattern,
  AuditEventSource,
  ConfigurationError,
  ExtractionReport,
  ExternalServiceError,
  LineageMapBuilder,
  NodeSqlTableParser,
  TableReference,
  TemporaryTableClassifier,
  componentLogger,
  makeDatasetUrn,
  parseExportedAuditRows,
  parseLineageConfig,
  parseLogEntries,
  resolveUpstreams,
  toError,
  type AuditLogSource,
  type AuditTableClient,
  type LineageConfig,
  type LineageConfigInput,
  type LineageMap,
  type Logger,
  type QueryEvent,
  type SqlTableParser,
  type TableIdentifier,
  type TokenBucketRateLimiter,
} from '@auditlineage/core';

// =============================================================================
// TYPES
// =============================================================================

export const LOG_SOURCE_FAILURE_KEY = 'lineage-gcp-logs';
export const AUDIT_TABLE_SOURCE_FAILURE_KEY = 'lineage-exported-gcp-audit-logs';

/**
 * One upstream edge of a dataset
 */
export interface UpstreamEdge {
  datasetUrn: string;
  type: 'TRANSFORMED';
}

/**
 * Upstream lineage aspect of one table
 */
export interface UpstreamLineage {
  /** Sorted by dataset URN */
  upstreams: UpstreamEdge[];
  extraProperties: Record<string, string>;
}

/**
 * Dependencies for the upstream lineage service
 */
export interface UpstreamLineageServiceDependencies {
  /** Extractor configuration; validated on construction */
  config?: LineageConfigInput;
  /** Audit log service client, used unless exported audit metadata is enabled */
  logSource?: AuditLogSource;
  /** Exported audit table client, used when exported audit metadata is enabled */
  auditTableClient?: AuditTableClient;
  /** Defaults to node-sql-parser */
  sqlParser?: SqlTableParser;
  /** Shared limiter, overrides `rateLimit`/`requestsPerMin` */
  rateLimiter?: TokenBucketRateLimiter;
  /** Report holding the counters of the latest build; a fresh one by default */
  report?: ExtractionReport;
  logger?: Logger;
}

// =============================================================================
// SERVICE IMPLEMENTATION
// =============================================================================

/**
 * Domain service for upstream table lineage
 *
 * - Builds the lineage map once; concurrent callers share one build
 * - Resolves temporary tables to their permanent upstreams
 * - Emits dataset URNs in a deterministic order
 */
export class UpstreamLineageService {
  private readonly config: LineageConfig;
  private readonly deps: UpstreamLineageServiceDependencies;
  private readonly report: ExtractionReport;
  private readonly sqlParser: SqlTableParser;
  private readonly datasetPattern: AllowDenyPattern;
  private readonly tablePattern: AllowDenyPattern;
  private readonly classifier: TemporaryTableClassifier;
  private readonly logger: Logger;

  private lineageMap: LineageMap | undefined;
  private inflight: Promise<LineageMap> | undefined;
  private generation = 0;

  constructor(deps: UpstreamLineageServiceDependencies) {
    this.config = parseLineageConfig(deps.config ?? {});
    this.deps = deps;
    this.report = deps.report ?? new ExtractionReport();
    this.logger = deps.logger ?? componentLogger('upstream-lineage-service');

    if (this.config.useExportedAuditMetadata && !deps.auditTableClient) {
      throw new ConfigurationError('Exported audit metadata is enabled but no audit table client was given', [
        'auditTableClient: required when useExportedAuditMetadata is true',
      ]);
    }
    if (!this.config.useExportedAuditMetadata && !deps.logSource) {
      throw new ConfigurationError('No audit log source was given', [
        'logSource: required when useExportedAuditMetadata is false',
      ]);
    }

    this.sqlParser = deps.sqlParser ?? new NodeSqlTableParser();
    this.datasetPattern = new AllowDenyPattern(this.config.datasetPattern);
    this.tablePattern = new AllowDenyPattern(this.config.tablePattern);

    this.classifier = new TemporaryTableClassifier({
      datasetPrefixes: [this.config.tempTableDatasetPrefix],
      tablePatterns: this.config.tempTablePatterns,
    });
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * Upstream lineage of one table.
   *
   * Returns null when no lineage was recorded for the table, and an empty
   * upstream list when lineage was recorded but nothing permanent feeds it.
   */
  async getUpstreamLineage(target: TableIdentifier): Promise<UpstreamLineage | null> {
    const targetRef = TableReference.fromIdentifier(target);
    const targetKey = targetRef.toString();
    const lineageMap = await this.getLineageMap();

    if (!lineageMap.has(targetKey)) {
      return null;
    }

    const seen = new Set<string>();
    const resolved = [
      ...resolveUpstreams(lineageMap, targetKey, seen, this.classifier, this.logger),
    ].filter((upstream) => !upstream.equals(targetRef));

    if (this.config.upstreamLineageInReport) {
      for (const upstream of resolved) {
        this.report.recordUpstreamLineage(targetKey, upstream.toString());
      }
    }

    const urnOptions = {
      platform: this.config.platform,
      platformInstance: this.config.platformInstance,
      env: this.config.env,
    };
    const urns = resolved.map((upstream) => makeDatasetUrn(upstream, urnOptions)).sort();

    return {
      upstreams: urns.map((datasetUrn): UpstreamEdge => ({ datasetUrn, type: 'TRANSFORMED' })),
      extraProperties: {},
    };
  }

  /**
   * The lineage map, built on first use. Concurrent callers await the
   * same build. Each build counts into its own report, which replaces the
   * service report's counters once the build completes; a build overtaken
   * by `invalidate()` leaves both the cache and the report untouched.
   */
  async getLineageMap(): Promise<LineageMap> {
    if (this.lineageMap) {
      return this.lineageMap;
    }

    if (!this.inflight) {
      const generation = this.generation;
      const buildReport = new ExtractionReport(this.report.maxRecordFailures);
      const build = this.buildLineageMap(buildReport)
        .then((lineageMap) => {
          if (generation === this.generation) {
            this.lineageMap = lineageMap;
            this.report.recordBuild(buildReport);
          }
          return lineageMap;
        })
        .finally(() => {
          if (this.inflight === build) {
            this.inflight = undefined;
          }
        });
      this.inflight = build;
    }

    return this.inflight;
  }

  /**
   * Drop the cached map; the next request rebuilds it
   */
  invalidate(): void {
    this.generation++;
    this.lineageMap = undefined;
    this.inflight = undefined;
  }

  getReport(): ExtractionReport {
    return this.report;
  }

  // ===========================================================================
  // HEALTH
  // ===========================================================================

  /**
   * Pull at most one record from the selected source. Errors propagate.
   */
  async testCapability(): Promise<void> {
    const report = new ExtractionReport();
    const source = this.createSource(report);

    const records = this.config.useExportedAuditMetadata
      ? source.readExportedAuditRows(1)
      : source.readLogEntries(1);

    try {
      await records.next();
    } finally {
      await records.return(undefined);
    }

    if (report.auditMetadataDatasetsMissing) {
      throw new ConfigurationError('Exported audit metadata is enabled but no audit datasets are configured', [
        'auditMetadataDatasets: required when useExportedAuditMetadata is true',
      ]);
    }
  }

  // ===========================================================================
  // BUILD
  // ===========================================================================

  private createSource(report: ExtractionReport): AuditEventSource {
    return new AuditEventSource(this.config, report, {
      logSource: this.deps.logSource,
      auditTableClient: this.deps.auditTableClient,
      rateLimiter: this.deps.rateLimiter,
      logger: this.logger,
    });
  }

  private readEvents(report: ExtractionReport): AsyncIterable<QueryEvent> {
    const source = this.createSource(report);
    const context = {
      options: { includeFullPayloads: this.config.includeFullPayloads },
      report,
      logger: this.logger,
    };

    return this.config.useExportedAuditMetadata
      ? parseExportedAuditRows(source.readExportedAuditRows(), context)
      : parseLogEntries(source.readLogEntries(), context);
  }

  private async buildLineageMap(report: ExtractionReport): Promise<LineageMap> {
    const useExported = this.config.useExportedAuditMetadata;
    this.logger.info(
      { source: useExported ? 'exported-audit-tables' : 'audit-logs' },
      'Populating lineage info'
    );

    const builder = new LineageMapBuilder({
      report,
      sqlParser: this.sqlParser,
      datasetPattern: this.datasetPattern,
      tablePattern: this.tablePattern,
      logger: this.logger,
    });

    let lineageMap: LineageMap;
    try {
      lineageMap = await builder.build(this.readEvents(report));
    } catch (error) {
      const cause = toError(error);
      const failure = new ExternalServiceError(
        useExported ? 'AuditTables' : 'AuditLogs',
        cause.message,
        cause
      );
      report.reportFailure(
        useExported ? AUDIT_TABLE_SOURCE_FAILURE_KEY : LOG_SOURCE_FAILURE_KEY,
        failure.message
      );
      this.logger.error({ err: failure }, 'Failed to build lineage map; continuing without lineage');
      lineageMap = new Map();
    }

    report.lineageMetadataEntries = lineageMap.size;
    this.logger.info({ entries: lineageMap.size }, 'Built lineage map');
    return lineageMap;
  }
}

/**
 * Factory function for creating the upstream lineage service
 */
export function createUpstreamLineageService(
  deps: UpstreamLineageServiceDependencies
): UpstreamLineageService {
  return new UpstreamLineageService(deps);
}
