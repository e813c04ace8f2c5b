/**
 * Audit-trail lineage types
 *
 * Raw record shapes for the two audit log schema variants and the exported
 * audit table rows, plus the structures flowing through the pipeline.
 *
 * @module core/audit-lineage/types
 */

import { z } from 'zod';

import type { TableReference } from './table-reference.js';

// =============================================================================
// RAW RECORDS
// =============================================================================

/**
 * One entry as returned by the audit log service
 */
export interface RawAuditLogEntry {
  logName: string;
  insertId: string;
  timestamp: string | Date;
  /** Decoded protoPayload; its shape is validated by the event parser */
  protoPayload: unknown;
}

/**
 * One row of an exported audit log table
 */
export interface ExportedAuditRow {
  logName: string;
  insertId: string;
  timestamp: string | Date;
  /** JSON-encoded audit metadata (`{ jobChange: { job: ... } }`) */
  metadata: string | null;
  protoPayload?: unknown;
}

// =============================================================================
// SCHEMA VARIANTS
// =============================================================================

/**
 * Table spec object used by the older audit schema
 */
export const TableSpecSchema = z.object({
  projectId: z.string(),
  datasetId: z.string(),
  tableId: z.string(),
});

/**
 * `protoPayload.serviceData.jobCompletedEvent.job` (older flat schema)
 */
export const JobCompletedJobSchema = z.object({
  jobName: z
    .object({
      projectId: z.string().optional(),
      jobId: z.string().optional(),
    })
    .optional(),
  jobConfiguration: z.object({
    query: z.object({
      query: z.string().optional(),
      destinationTable: TableSpecSchema.optional(),
    }),
  }),
  jobStatus: z
    .object({
      state: z.string().optional(),
      error: z.record(z.unknown()).optional(),
    })
    .optional(),
  jobStatistics: z.object({
    referencedTables: z.array(TableSpecSchema).optional(),
    referencedViews: z.array(TableSpecSchema).optional(),
  }),
});
export type JobCompletedJob = z.infer<typeof JobCompletedJobSchema>;

/**
 * `metadata.jobChange.job` (structured audit metadata schema)
 */
export const JobChangeJobSchema = z.object({
  jobName: z.string().optional(),
  jobConfig: z.object({
    type: z.string().optional(),
    queryConfig: z.object({
      query: z.string().optional(),
      destinationTable: z.string().optional(),
    }),
  }),
  jobStatus: z
    .object({
      jobState: z.string().optional(),
      errorResult: z.record(z.unknown()).optional(),
    })
    .optional(),
  jobStats: z
    .object({
      queryStats: z
        .object({
          referencedTables: z.array(z.string()).optional(),
          referencedViews: z.array(z.string()).optional(),
        })
        .optional(),
    })
    .optional(),
});
export type JobChangeJob = z.infer<typeof JobChangeJobSchema>;

/**
 * Record variant selected by a presence check on the payload
 */
export type AuditRecordVariant =
  | { kind: 'job-completed'; job: unknown }
  | { kind: 'job-change'; job: unknown };

// =============================================================================
// PIPELINE STRUCTURES
// =============================================================================

/**
 * One completed, non-errored query execution
 */
export interface QueryEvent {
  /** `{logName}-{insertId}`, used for failure reporting */
  readonly sourceId: string;
  readonly timestamp: Date;
  /** Absent for queries that do not write a table */
  readonly destinationTable?: TableReference;
  readonly referencedTables: readonly TableReference[];
  readonly referencedViews: readonly TableReference[];
  /** Statement text, used to disambiguate views from their base tables */
  readonly query?: string;
  readonly jobName?: string;
  readonly actorEmail?: string;
  /** Full raw payload, only kept when full payloads are enabled */
  readonly payload?: unknown;
}

export type ParseFailureReason =
  | 'missing-fields'
  | 'invalid-json'
  | 'job-not-done'
  | 'job-errored'
  | 'not-a-query'
  | 'invalid-table-reference';

/**
 * Why a raw record could not become a QueryEvent
 */
export interface ParseFailure {
  readonly sourceId: string;
  readonly reason: ParseFailureReason;
  /** Dotted paths of the required fields that were absent */
  readonly missingPaths: readonly string[];
  readonly message: string;
}

export interface ParseOptions {
  /** Keep the full raw payload on each event (debug only) */
  includeFullPayloads: boolean;
}

/**
 * Destination table key to the set of upstream table keys
 */
export type LineageMap = Map<string, Set<string>>;

/**
 * Allow/deny predicate applied to dataset and table names
 */
export interface AllowedPredicate {
  allowed(name: string): boolean;
}
