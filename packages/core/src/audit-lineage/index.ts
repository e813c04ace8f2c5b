/**
 * Audit-trail table lineage
 *
 * Parses warehouse audit records into query events, folds them into a
 * destination -> upstreams map and resolves temporary tables away.
 *
 * @module core/audit-lineage
 */

// =============================================================================
// TYPES
// =============================================================================

export {
  TableSpecSchema,
  JobCompletedJobSchema,
  JobChangeJobSchema,
  type RawAuditLogEntry,
  type ExportedAuditRow,
  type JobCompletedJob,
  type JobChangeJob,
  type AuditRecordVariant,
  type QueryEvent,
  type ParseFailureReason,
  type ParseFailure,
  type ParseOptions,
  type LineageMap,
  type AllowedPredicate,
} from './types.js';

export {
  TableReference,
  sanitizeTableName,
  bareTableName,
  parseTableIdentifier,
  type TableIdentifier,
  type TableSpec,
} from './table-reference.js';

export { ExtractionReport, DEFAULT_MAX_RECORD_FAILURES } from './report.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export {
  AllowDenyPatternConfigSchema,
  LineageConfigSchema,
  parseLineageConfig,
  type AllowDenyPatternConfig,
  type LineageConfig,
  type LineageConfigInput,
} from './config.js';

export { AllowDenyPattern } from './allow-deny-pattern.js';

// =============================================================================
// PIPELINE
// =============================================================================

export {
  getFirstMissingKey,
  detectVariant,
  parseAuditLogEntry,
  parseExportedAuditRow,
  parseLogEntries,
  parseExportedAuditRows,
  type ParseStreamContext,
} from './event-parser.js';

export {
  AuditEventSource,
  buildLogFilter,
  buildAuditMetadataQuery,
  formatAuditDateTime,
  formatAuditDateShard,
  type AuditLogSource,
  type AuditTableClient,
  type AuditEventSourceDependencies,
} from './event-source.js';

export {
  NodeSqlTableParser,
  parsedTableBareName,
  type SqlTableParser,
  type NodeSqlTableParserOptions,
} from './sql-table-parser.js';

export { LineageMapBuilder, type LineageMapBuilderDependencies } from './lineage-map-builder.js';

export {
  TemporaryTableClassifier,
  resolveUpstreams,
  type TemporaryTableClassifierOptions,
} from './temp-table-resolver.js';

export { makeDatasetUrn, type DatasetUrnOptions } from './dataset-urn.js';
