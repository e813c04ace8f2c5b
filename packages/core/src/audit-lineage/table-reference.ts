/**
 * Canonical warehouse table reference
 *
 * Audit records name the same table in several spellings: path strings
 * (`projects/p/datasets/d/tables/t`), spec objects, partition decorators,
 * date shards and wildcard suffixes. Every spelling is reduced to one
 * lower-cased reference so that it can be used as a map key.
 *
 * @module core/audit-lineage/table-reference
 */

import { ValidationError } from '../errors.js';

const TABLE_PATH_REGEX = /^projects\/([^/]+)\/datasets\/([^/]+)\/tables\/([^/]+)$/;

// `$` starts a partition decorator, `@` a snapshot decorator
const DECORATOR_REGEX = /[$@].*$/;

// `events_*`, `events_2021*`, `events*`
const WILDCARD_SUFFIX_REGEX = /(_[^_]*)?\*$/;

const UNDERSCORE_SHARD_REGEX = /^(.+)_\d{8}$/;
const BARE_SHARD_REGEX = /^(.*\D)\d{8}$/;
const SHARD_ONLY_REGEX = /^\d{8}$/;

// `/` and backticks would break the key and dotted spellings; spaces are legal
const INVALID_COMPONENT_REGEX = /[/`]/;

/**
 * Identifier handed in by callers of the lineage facade
 */
export interface TableIdentifier {
  projectId: string;
  dataset: string;
  table: string;
}

/**
 * Table spec object as emitted by the older audit log schema
 */
export interface TableSpec {
  projectId: string;
  datasetId: string;
  tableId: string;
}

/**
 * Strip decorators, wildcard and date-shard suffixes from a table name.
 * Returns an empty string when nothing but the shard is left.
 */
export function sanitizeTableName(table: string): string {
  let name = table.trim().toLowerCase().replace(DECORATOR_REGEX, '');
  name = name.replace(WILDCARD_SUFFIX_REGEX, '');

  const underscoreShard = UNDERSCORE_SHARD_REGEX.exec(name);
  if (underscoreShard?.[1]) {
    return underscoreShard[1];
  }
  const bareShard = BARE_SHARD_REGEX.exec(name);
  if (bareShard?.[1]) {
    return bareShard[1];
  }
  if (SHARD_ONLY_REGEX.test(name)) {
    return '';
  }
  return name;
}

function assertComponent(kind: string, value: string, raw: string): void {
  if (value.length === 0 || INVALID_COMPONENT_REGEX.test(value)) {
    throw new ValidationError(`Invalid ${kind} in table reference: ${raw}`, { kind, value });
  }
}

/**
 * Immutable, canonical table reference
 */
export class TableReference {
  readonly project: string;
  readonly dataset: string;
  readonly table: string;
  private readonly key: string;

  private constructor(project: string, dataset: string, table: string) {
    this.project = project;
    this.dataset = dataset;
    this.table = table;
    this.key = `projects/${project}/datasets/${dataset}/tables/${table}`;
  }

  /**
   * Build a canonical reference from raw components
   *
   * @throws ValidationError when a component is empty or contains `/` or a backtick
   */
  static of(project: string, dataset: string, table: string): TableReference {
    const raw = `${project}.${dataset}.${table}`;
    const canonicalProject = project.trim().toLowerCase();
    const canonicalDataset = dataset.trim().toLowerCase();
    assertComponent('project', canonicalProject, raw);
    assertComponent('dataset', canonicalDataset, raw);

    const sanitized = sanitizeTableName(table);
    const canonicalTable = sanitized.length > 0 ? sanitized : canonicalDataset;
    assertComponent('table', canonicalTable, raw);

    return new TableReference(canonicalProject, canonicalDataset, canonicalTable);
  }

  /**
   * Parse a `projects/{p}/datasets/{d}/tables/{t}` path
   */
  static fromKey(key: string): TableReference {
    const match = TABLE_PATH_REGEX.exec(key.trim());
    if (!match?.[1] || !match[2] || !match[3]) {
      throw new ValidationError(`Invalid table path: ${key}`);
    }
    return TableReference.of(match[1], match[2], match[3]);
  }

  /**
   * Parse a `project.dataset.table` name; the project part may itself contain dots
   */
  static fromDottedName(name: string): TableReference {
    const parts = name.trim().replace(/`/g, '').split('.');
    if (parts.length < 3) {
      throw new ValidationError(`Invalid table name: ${name}`);
    }
    const table = parts[parts.length - 1] ?? '';
    const dataset = parts[parts.length - 2] ?? '';
    const project = parts.slice(0, -2).join('.');
    return TableReference.of(project, dataset, table);
  }

  /**
   * Parse either a path or a dotted name
   */
  static parse(value: string): TableReference {
    return value.trim().startsWith('projects/')
      ? TableReference.fromKey(value)
      : TableReference.fromDottedName(value);
  }

  static fromSpec(spec: TableSpec): TableReference {
    return TableReference.of(spec.projectId, spec.datasetId, spec.tableId);
  }

  static fromIdentifier(identifier: TableIdentifier): TableReference {
    return TableReference.of(identifier.projectId, identifier.dataset, identifier.table);
  }

  toString(): string {
    return this.key;
  }

  toDottedName(): string {
    return `${this.project}.${this.dataset}.${this.table}`;
  }

  equals(other: TableReference): boolean {
    return this.key === other.key;
  }

  /**
   * Total order on the canonical key, independent of locale
   */
  static compare(a: TableReference, b: TableReference): number {
    if (a.key < b.key) return -1;
    if (a.key > b.key) return 1;
    return 0;
  }
}

/**
 * Final path segment of a lineage map key (the bare table name)
 */
export function bareTableName(key: string): string {
  const segments = key.split('/');
  return segments[segments.length - 1] ?? key;
}

/**
 * Parse a `project.dataset.table` string into a caller-facing identifier
 */
export function parseTableIdentifier(name: string): TableIdentifier {
  const ref = TableReference.fromDottedName(name);
  return { projectId: ref.project, dataset: ref.dataset, table: ref.table };
}
