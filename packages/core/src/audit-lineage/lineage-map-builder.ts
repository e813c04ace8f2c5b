/**
 * Lineage Map Builder
 *
 * Folds a stream of QueryEvents into a destination -> upstreams map in one
 * pass. Keys are canonical table paths, so the resulting membership does not
 * depend on event order.
 *
 * When an event references both tables and views, the audit trail reports a
 * view together with the base tables behind it. The statement text is then
 * parsed and only objects named in it are kept.
 *
 * @module core/audit-lineage/lineage-map-builder
 */

import { toError } from '../errors.js';
import { componentLogger, redactSql, type Logger } from '../logger/index.js';
import type { ExtractionReport } from './report.js';
import { parsedTableBareName, type SqlTableParser } from './sql-table-parser.js';
import { bareTableName, sanitizeTableName } from './table-reference.js';
import type { AllowedPredicate, LineageMap, QueryEvent } from './types.js';

export interface LineageMapBuilderDependencies {
  report: ExtractionReport;
  sqlParser: SqlTableParser;
  datasetPattern: AllowedPredicate;
  tablePattern: AllowedPredicate;
  logger?: Logger;
}

export class LineageMapBuilder {
  private readonly report: ExtractionReport;
  private readonly sqlParser: SqlTableParser;
  private readonly datasetPattern: AllowedPredicate;
  private readonly tablePattern: AllowedPredicate;
  private readonly logger: Logger;

  constructor(deps: LineageMapBuilderDependencies) {
    this.report = deps.report;
    this.sqlParser = deps.sqlParser;
    this.datasetPattern = deps.datasetPattern;
    this.tablePattern = deps.tablePattern;
    this.logger = deps.logger ?? componentLogger('lineage-map-builder');
  }

  /**
   * Consume the events and return the lineage map
   */
  async build(events: AsyncIterable<QueryEvent> | Iterable<QueryEvent>): Promise<LineageMap> {
    const lineageMap: LineageMap = new Map();
    this.report.numTotalLineageEntries = 0;
    this.report.numSkippedLineageEntriesMissingData = 0;
    this.report.numSkippedLineageEntriesNotAllowed = 0;
    this.report.numSkippedLineageEntriesSqlParserFailure = 0;
    this.report.numSkippedLineageEntriesOther = 0;

    for await (const event of events) {
      this.addEvent(lineageMap, event);
    }

    return lineageMap;
  }

  /**
   * Apply one event to the map
   */
  addEvent(lineageMap: LineageMap, event: QueryEvent): void {
    this.report.numTotalLineageEntries++;

    const destination = event.destinationTable;
    if (
      !destination ||
      (event.referencedTables.length === 0 && event.referencedViews.length === 0)
    ) {
      this.report.numSkippedLineageEntriesMissingData++;
      return;
    }

    if (
      !this.datasetPattern.allowed(destination.dataset) ||
      !this.tablePattern.allowed(destination.table)
    ) {
      this.report.numSkippedLineageEntriesNotAllowed++;
      return;
    }

    const destinationKey = destination.toString();
    const added: string[] = [];
    const addUpstream = (upstreamKey: string): void => {
      let upstreams = lineageMap.get(destinationKey);
      if (!upstreams) {
        upstreams = new Set();
        lineageMap.set(destinationKey, upstreams);
      }
      if (!upstreams.has(upstreamKey)) {
        upstreams.add(upstreamKey);
        added.push(upstreamKey);
      }
    };

    let hasTable = false;
    for (const table of event.referencedTables) {
      const key = table.toString();
      if (key !== destinationKey) {
        addUpstream(key);
        hasTable = true;
      }
    }

    let hasView = false;
    for (const view of event.referencedViews) {
      const key = view.toString();
      if (key !== destinationKey) {
        addUpstream(key);
        hasView = true;
      }
    }

    if (hasTable && hasView) {
      this.keepDirectlyReferenced(lineageMap, destinationKey, event, added);
    }

    if (!hasTable && !hasView) {
      this.report.numSkippedLineageEntriesOther++;
    }
  }

  /**
   * Restrict the destination's upstreams to objects named in the statement.
   * If the statement cannot be parsed, the upstreams this event added are
   * withdrawn again.
   */
  private keepDirectlyReferenced(
    lineageMap: LineageMap,
    destinationKey: string,
    event: QueryEvent,
    added: readonly string[]
  ): void {
    const current = lineageMap.get(destinationKey) ?? new Set<string>();

    let referenced: Set<string>;
    try {
      referenced = this.parseReferencedNames(event.query);
    } catch (error) {
      this.logger.warn(
        {
          sourceId: event.sourceId,
          destination: destinationKey,
          query: event.query !== undefined ? redactSql(event.query) : undefined,
          err: toError(error),
        },
        'SQL parser failed on query; it will be skipped from lineage'
      );
      this.report.numSkippedLineageEntriesSqlParserFailure++;
      for (const key of added) {
        current.delete(key);
      }
      return;
    }

    const filtered = new Set<string>();
    for (const key of current) {
      if (referenced.has(bareTableName(key))) {
        filtered.add(key);
      }
    }
    lineageMap.set(destinationKey, filtered);
  }

  private parseReferencedNames(query: string | undefined): Set<string> {
    if (query === undefined || query.trim() === '') {
      throw new Error('Query text is not available for view disambiguation');
    }

    const names = new Set<string>();
    for (const table of this.sqlParser.parseTables(query)) {
      const bare = parsedTableBareName(table);
      names.add(bare);
      const sanitized = sanitizeTableName(bare);
      if (sanitized.length > 0) {
        names.add(sanitized);
      }
    }
    return names;
  }
}
