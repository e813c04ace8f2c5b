/**
 * Audit Event Parser
 *
 * Turns one raw audit record into a QueryEvent. Two log schema variants are
 * supported (the older `serviceData.jobCompletedEvent` shape and the
 * structured `metadata.jobChange` shape); exported audit table rows carry
 * the structured shape as a JSON string.
 *
 * Parsing never throws for malformed input: a ParseFailure names the
 * missing paths instead, and the streaming helpers count and log it
 * without interrupting the stream.
 *
 * @module core/audit-lineage/event-parser
 */

import type { ZodError } from 'zod';

import { ValidationError } from '../errors.js';
import { componentLogger, deepRedactObject, type Logger } from '../logger/index.js';
import { Err, Ok, type Result } from '../types/result.js';
import type { ExtractionReport } from './report.js';
import { TableReference } from './table-reference.js';
import {
  JobChangeJobSchema,
  JobCompletedJobSchema,
  type AuditRecordVariant,
  type ExportedAuditRow,
  type JobChangeJob,
  type JobCompletedJob,
  type ParseFailure,
  type ParseFailureReason,
  type ParseOptions,
  type QueryEvent,
  type RawAuditLogEntry,
} from './types.js';

const JOB_COMPLETED_KEYS = ['serviceData', 'jobCompletedEvent', 'job'] as const;
const JOB_CHANGE_KEYS = ['metadata', 'jobChange', 'job'] as const;
const EXPORTED_JOB_CHANGE_KEYS = ['jobChange', 'job'] as const;

const DONE_STATE = 'DONE';
const QUERY_JOB_TYPE = 'QUERY';

interface EventBase {
  sourceId: string;
  timestamp: Date;
  actorEmail: string | undefined;
  payload: unknown;
}

// =============================================================================
// HELPERS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Dotted path up to and including the first key that is absent, or
 * undefined when the whole chain is present
 */
export function getFirstMissingKey(value: unknown, keys: readonly string[]): string | undefined {
  let current = value;
  for (let i = 0; i < keys.length; i++) {
    const key = keys[i] ?? '';
    if (!isRecord(current) || current[key] === undefined || current[key] === null) {
      return keys.slice(0, i + 1).join('.');
    }
    current = current[key];
  }
  return undefined;
}

function getPath(value: unknown, keys: readonly string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function failure(
  sourceId: string,
  reason: ParseFailureReason,
  message: string,
  missingPaths: readonly string[] = []
): Result<QueryEvent, ParseFailure> {
  return Err({ sourceId, reason, message, missingPaths });
}

function schemaFailure(
  sourceId: string,
  prefix: string,
  error: ZodError
): Result<QueryEvent, ParseFailure> {
  const missingPaths = error.issues.map((issue) =>
    [prefix, ...issue.path.map(String)].join('.')
  );
  return failure(
    sourceId,
    'missing-fields',
    `Audit record is missing required fields: ${missingPaths.join(', ')}`,
    missingPaths
  );
}

function parseTimestamp(value: string | Date): Date | undefined {
  const timestamp = value instanceof Date ? value : new Date(value);
  return Number.isNaN(timestamp.getTime()) ? undefined : timestamp;
}

function extractActorEmail(protoPayload: unknown): string | undefined {
  const email = getPath(protoPayload, ['authenticationInfo', 'principalEmail']);
  return typeof email === 'string' ? email : undefined;
}

function hasEntries(value: Record<string, unknown> | undefined): boolean {
  return value !== undefined && Object.keys(value).length > 0;
}

function toReferences<T>(
  values: readonly T[] | undefined,
  convert: (value: T) => TableReference
): TableReference[] {
  return (values ?? []).map(convert);
}

/**
 * Build the event, turning a malformed table name into a ParseFailure
 */
function buildEvent(
  base: EventBase,
  build: () => Omit<QueryEvent, keyof EventBase | 'payload'>
): Result<QueryEvent, ParseFailure> {
  try {
    const fields = build();
    return Ok({
      ...fields,
      sourceId: base.sourceId,
      timestamp: base.timestamp,
      actorEmail: base.actorEmail,
      payload: base.payload,
    });
  } catch (error) {
    if (error instanceof ValidationError) {
      return failure(base.sourceId, 'invalid-table-reference', error.message);
    }
    throw error;
  }
}

// =============================================================================
// VARIANT PARSERS
// =============================================================================

/**
 * Select the schema variant by a presence check on the payload
 */
export function detectVariant(
  protoPayload: unknown
): { variant: AuditRecordVariant } | { missing: string[] } {
  const missingCompleted = getFirstMissingKey(protoPayload, JOB_COMPLETED_KEYS);
  if (missingCompleted === undefined) {
    return { variant: { kind: 'job-completed', job: getPath(protoPayload, JOB_COMPLETED_KEYS) } };
  }

  const missingChange = getFirstMissingKey(protoPayload, JOB_CHANGE_KEYS);
  if (missingChange === undefined) {
    return { variant: { kind: 'job-change', job: getPath(protoPayload, JOB_CHANGE_KEYS) } };
  }

  return { missing: [`protoPayload.${missingCompleted}`, `protoPayload.${missingChange}`] };
}

function fromJobCompleted(
  job: JobCompletedJob,
  base: EventBase
): Result<QueryEvent, ParseFailure> {
  const status = job.jobStatus;
  if (status?.state !== undefined && status.state !== DONE_STATE) {
    return failure(base.sourceId, 'job-not-done', `Job state is ${status.state}`);
  }
  if (hasEntries(status?.error)) {
    return failure(base.sourceId, 'job-errored', 'Job completed with an error');
  }

  const queryConfig = job.jobConfiguration.query;
  return buildEvent(base, () => ({
    destinationTable: queryConfig.destinationTable
      ? TableReference.fromSpec(queryConfig.destinationTable)
      : undefined,
    referencedTables: toReferences(job.jobStatistics.referencedTables, TableReference.fromSpec),
    referencedViews: toReferences(job.jobStatistics.referencedViews, TableReference.fromSpec),
    query: queryConfig.query,
    jobName: job.jobName?.jobId,
  }));
}

function fromJobChange(job: JobChangeJob, base: EventBase): Result<QueryEvent, ParseFailure> {
  const status = job.jobStatus;
  if (status?.jobState !== undefined && status.jobState !== DONE_STATE) {
    return failure(base.sourceId, 'job-not-done', `Job state is ${status.jobState}`);
  }
  if (hasEntries(status?.errorResult)) {
    return failure(base.sourceId, 'job-errored', 'Job completed with an error');
  }
  if (job.jobConfig.type !== undefined && job.jobConfig.type !== QUERY_JOB_TYPE) {
    return failure(base.sourceId, 'not-a-query', `Job type is ${job.jobConfig.type}`);
  }

  const queryConfig = job.jobConfig.queryConfig;
  const queryStats = job.jobStats?.queryStats;
  return buildEvent(base, () => ({
    destinationTable: queryConfig.destinationTable
      ? TableReference.fromKey(queryConfig.destinationTable)
      : undefined,
    referencedTables: toReferences(queryStats?.referencedTables, TableReference.fromKey),
    referencedViews: toReferences(queryStats?.referencedViews, TableReference.fromKey),
    query: queryConfig.query,
    jobName: job.jobName,
  }));
}

// =============================================================================
// PUBLIC PARSERS
// =============================================================================

/**
 * Parse one audit log service entry
 */
export function parseAuditLogEntry(
  entry: RawAuditLogEntry,
  options: ParseOptions
): Result<QueryEvent, ParseFailure> {
  const sourceId = `${entry.logName}-${entry.insertId}`;

  const timestamp = parseTimestamp(entry.timestamp);
  if (!timestamp) {
    return failure(sourceId, 'missing-fields', 'Audit record has no valid timestamp', [
      'timestamp',
    ]);
  }

  const detected = detectVariant(entry.protoPayload);
  if ('missing' in detected) {
    return failure(
      sourceId,
      'missing-fields',
      `Unable to parse log entry, missing ${detected.missing.join(' and ')}`,
      detected.missing
    );
  }

  const base: EventBase = {
    sourceId,
    timestamp,
    actorEmail: extractActorEmail(entry.protoPayload),
    payload: options.includeFullPayloads ? entry.protoPayload : undefined,
  };

  const { variant } = detected;
  switch (variant.kind) {
    case 'job-completed': {
      const parsed = JobCompletedJobSchema.safeParse(variant.job);
      return parsed.success
        ? fromJobCompleted(parsed.data, base)
        : schemaFailure(sourceId, `protoPayload.${JOB_COMPLETED_KEYS.join('.')}`, parsed.error);
    }
    case 'job-change': {
      const parsed = JobChangeJobSchema.safeParse(variant.job);
      return parsed.success
        ? fromJobChange(parsed.data, base)
        : schemaFailure(sourceId, `protoPayload.${JOB_CHANGE_KEYS.join('.')}`, parsed.error);
    }
  }
}

/**
 * Parse one row of an exported audit log table
 */
export function parseExportedAuditRow(
  row: ExportedAuditRow,
  options: ParseOptions
): Result<QueryEvent, ParseFailure> {
  const sourceId = `${row.logName}-${row.insertId}`;

  const timestamp = parseTimestamp(row.timestamp);
  if (!timestamp) {
    return failure(sourceId, 'missing-fields', 'Audit row has no valid timestamp', ['timestamp']);
  }
  if (row.metadata === null || row.metadata === '') {
    return failure(sourceId, 'missing-fields', 'Audit row has no metadata', ['metadata']);
  }

  let metadata: unknown;
  try {
    metadata = JSON.parse(row.metadata);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return failure(sourceId, 'invalid-json', `Audit row metadata is not valid JSON: ${detail}`);
  }

  const missing = getFirstMissingKey(metadata, EXPORTED_JOB_CHANGE_KEYS);
  if (missing !== undefined) {
    return failure(sourceId, 'missing-fields', `Unable to parse audit row, missing metadata.${missing}`, [
      `metadata.${missing}`,
    ]);
  }

  const parsed = JobChangeJobSchema.safeParse(getPath(metadata, EXPORTED_JOB_CHANGE_KEYS));
  if (!parsed.success) {
    return schemaFailure(sourceId, `metadata.${EXPORTED_JOB_CHANGE_KEYS.join('.')}`, parsed.error);
  }

  return fromJobChange(parsed.data, {
    sourceId,
    timestamp,
    actorEmail: extractActorEmail(row.protoPayload),
    payload: options.includeFullPayloads ? metadata : undefined,
  });
}

// =============================================================================
// STREAMING
// =============================================================================

export interface ParseStreamContext {
  options: ParseOptions;
  report: ExtractionReport;
  logger?: Logger;
}

function recordFailure(
  parseFailure: ParseFailure,
  raw: unknown,
  report: ExtractionReport,
  logger: Logger
): void {
  report.reportRecordFailure(parseFailure.sourceId, parseFailure.message);
  logger.error(
    {
      sourceId: parseFailure.sourceId,
      reason: parseFailure.reason,
      missingPaths: parseFailure.missingPaths,
      record: deepRedactObject(raw),
    },
    parseFailure.message
  );
}

/**
 * Lazily parse audit log entries, dropping and reporting unparsable ones
 */
export async function* parseLogEntries(
  entries: AsyncIterable<RawAuditLogEntry>,
  context: ParseStreamContext
): AsyncGenerator<QueryEvent> {
  const logger = context.logger ?? componentLogger('event-parser');
  context.report.numParsedLogEntries = 0;

  for await (const entry of entries) {
    const result = parseAuditLogEntry(entry, context.options);
    if (result.isOk) {
      context.report.numParsedLogEntries++;
      yield result.value;
    } else {
      recordFailure(result.error, entry, context.report, logger);
    }
  }

  logger.info(
    { parsed: context.report.numParsedLogEntries },
    'Finished parsing audit log entries'
  );
}

/**
 * Lazily parse exported audit rows, dropping and reporting unparsable ones
 */
export async function* parseExportedAuditRows(
  rows: AsyncIterable<ExportedAuditRow>,
  context: ParseStreamContext
): AsyncGenerator<QueryEvent> {
  const logger = context.logger ?? componentLogger('event-parser');
  context.report.numTotalAuditEntries = 0;
  context.report.numParsedAuditEntries = 0;

  for await (const row of rows) {
    context.report.numTotalAuditEntries++;
    const result = parseExportedAuditRow(row, context.options);
    if (result.isOk) {
      context.report.numParsedAuditEntries++;
      yield result.value;
    } else {
      recordFailure(result.error, row, context.report, logger);
    }
  }

  logger.info(
    {
      total: context.report.numTotalAuditEntries,
      parsed: context.report.numParsedAuditEntries,
    },
    'Finished parsing exported audit rows'
  );
}
