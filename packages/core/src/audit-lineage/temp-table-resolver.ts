/**
 * Temporary-table resolution
 *
 * Temporary tables are transparent in the final lineage: each one is
 * replaced by its own upstreams, transitively.
 *
 * @module core/audit-lineage/temp-table-resolver
 */

import { componentLogger, type Logger } from '../logger/index.js';
import { TableReference } from './table-reference.js';
import type { LineageMap } from './types.js';

export interface TemporaryTableClassifierOptions {
  /** Datasets starting with any of these prefixes hold temporary tables */
  datasetPrefixes?: readonly string[];
  /** Table names matching any of these regexes are temporary */
  tablePatterns?: readonly string[];
}

export class TemporaryTableClassifier {
  private readonly datasetPrefixes: readonly string[];
  private readonly tablePatterns: RegExp[];

  constructor(options: TemporaryTableClassifierOptions = {}) {
    this.datasetPrefixes = (options.datasetPrefixes ?? ['_']).filter((p) => p.length > 0);
    this.tablePatterns = (options.tablePatterns ?? []).map((p) => new RegExp(p, 'i'));
  }

  isTemporary(table: TableReference): boolean {
    return (
      this.datasetPrefixes.some((prefix) => table.dataset.startsWith(prefix)) ||
      this.tablePatterns.some((pattern) => pattern.test(table.table))
    );
  }
}

/**
 * Resolve the non-temporary upstreams of `target`.
 *
 * `seen` is owned by the caller and shared across the whole expansion; a
 * temporary table is expanded at most once, which bounds the work on cyclic
 * maps. Temporary tables without a map entry contribute nothing.
 */
export function resolveUpstreams(
  lineageMap: LineageMap,
  target: string,
  seen: Set<string>,
  classifier: TemporaryTableClassifier,
  logger: Logger = componentLogger('temp-table-resolver')
): Set<TableReference> {
  const resolved = new Map<string, TableReference>();
  const pending: string[] = [target];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;

    const upstreams = lineageMap.get(current);
    if (!upstreams) continue;

    for (const upstreamKey of upstreams) {
      const upstream = TableReference.fromKey(upstreamKey);
      if (!classifier.isTemporary(upstream)) {
        resolved.set(upstreamKey, upstream);
        continue;
      }
      if (seen.has(upstreamKey)) {
        logger.debug({ table: upstreamKey }, 'Skipping temporary table seen already');
        continue;
      }
      seen.add(upstreamKey);
      pending.push(upstreamKey);
    }
  }

  return new Set(resolved.values());
}
