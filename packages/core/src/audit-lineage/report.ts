/**
 * Extraction report
 *
 * Diagnostic counters for one extraction run. The report is owned by the
 * caller; pipeline components only write into it. Nothing here gates
 * correctness.
 *
 * @module core/audit-lineage/report
 */

/** Per-record failures kept before further ones are only counted */
export const DEFAULT_MAX_RECORD_FAILURES = 1000;

export class ExtractionReport {
  numTotalLogEntries = 0;
  numParsedLogEntries = 0;
  numTotalAuditEntries = 0;
  numParsedAuditEntries = 0;

  numTotalLineageEntries = 0;
  numSkippedLineageEntriesMissingData = 0;
  numSkippedLineageEntriesNotAllowed = 0;
  numSkippedLineageEntriesSqlParserFailure = 0;
  numSkippedLineageEntriesOther = 0;

  lineageMetadataEntries = 0;

  logEntryStartTime: string | undefined;
  logEntryEndTime: string | undefined;
  auditStartTime: string | undefined;
  auditEndTime: string | undefined;
  auditMetadataDatasetsMissing = false;

  /** Failure key to reasons, in the order they were reported */
  readonly failures = new Map<string, string[]>();

  /** Per-record failures counted but not kept in `failures` */
  numDroppedRecordFailures = 0;

  /** Destination key to resolved upstream keys, filled when enabled in config */
  readonly upstreamLineage = new Map<string, Set<string>>();

  private keptRecordFailures = 0;

  constructor(readonly maxRecordFailures = DEFAULT_MAX_RECORD_FAILURES) {}

  /**
   * Record a run-level failure (source or configuration). Always kept.
   */
  reportFailure(key: string, reason: string): void {
    const reasons = this.failures.get(key);
    if (reasons) {
      reasons.push(reason);
    } else {
      this.failures.set(key, [reason]);
    }
  }

  /**
   * Record the failure of a single audit record. Only the first
   * `maxRecordFailures` are kept; the rest are counted.
   */
  reportRecordFailure(key: string, reason: string): void {
    if (this.keptRecordFailures >= this.maxRecordFailures) {
      this.numDroppedRecordFailures++;
      return;
    }
    this.keptRecordFailures++;
    this.reportFailure(key, reason);
  }

  recordUpstreamLineage(destination: string, upstream: string): void {
    const upstreams = this.upstreamLineage.get(destination) ?? new Set<string>();
    upstreams.add(upstream);
    this.upstreamLineage.set(destination, upstreams);
  }

  /**
   * Take over the counters and failures of a finished build, replacing
   * those of any earlier build. Upstream lineage records are kept.
   */
  recordBuild(build: ExtractionReport): void {
    this.numTotalLogEntries = build.numTotalLogEntries;
    this.numParsedLogEntries = build.numParsedLogEntries;
    this.numTotalAuditEntries = build.numTotalAuditEntries;
    this.numParsedAuditEntries = build.numParsedAuditEntries;
    this.numTotalLineageEntries = build.numTotalLineageEntries;
    this.numSkippedLineageEntriesMissingData = build.numSkippedLineageEntriesMissingData;
    this.numSkippedLineageEntriesNotAllowed = build.numSkippedLineageEntriesNotAllowed;
    this.numSkippedLineageEntriesSqlParserFailure = build.numSkippedLineageEntriesSqlParserFailure;
    this.numSkippedLineageEntriesOther = build.numSkippedLineageEntriesOther;
    this.lineageMetadataEntries = build.lineageMetadataEntries;
    this.logEntryStartTime = build.logEntryStartTime;
    this.logEntryEndTime = build.logEntryEndTime;
    this.auditStartTime = build.auditStartTime;
    this.auditEndTime = build.auditEndTime;
    this.auditMetadataDatasetsMissing = build.auditMetadataDatasetsMissing;
    this.numDroppedRecordFailures = build.numDroppedRecordFailures;
    this.keptRecordFailures = build.keptRecordFailures;

    this.failures.clear();
    for (const [key, reasons] of build.failures) {
      this.failures.set(key, [...reasons]);
    }
  }

  /** Every failure reported, including dropped record failures */
  get failureCount(): number {
    let count = this.numDroppedRecordFailures;
    for (const reasons of this.failures.values()) {
      count += reasons.length;
    }
    return count;
  }
}
