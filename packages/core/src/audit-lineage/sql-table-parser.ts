/**
 * SQL table-name parsing
 *
 * The lineage builder only needs one capability from a SQL parser: the
 * list of tables a statement reads or writes. Implementations throw
 * SqlParseError when a statement cannot be parsed.
 *
 * @module core/audit-lineage/sql-table-parser
 */

import sqlParser from 'node-sql-parser';

import { SqlParseError, toError } from '../errors.js';

export interface SqlTableParser {
  parseTables(sql: string): string[];
}

export interface NodeSqlTableParserOptions {
  /** node-sql-parser dialect name */
  database?: string;
}

/**
 * Table parser backed by node-sql-parser.
 *
 * `tableList` returns entries shaped `{statement}::{schema}::{table}`;
 * only the qualified table part is kept.
 */
export class NodeSqlTableParser implements SqlTableParser {
  private readonly parser = new sqlParser.Parser();
  private readonly database: string;

  constructor(options: NodeSqlTableParserOptions = {}) {
    this.database = options.database ?? 'BigQuery';
  }

  parseTables(sql: string): string[] {
    let entries: string[];
    try {
      entries = this.parser.tableList(sql, { database: this.database });
    } catch (error) {
      throw new SqlParseError(`Unable to parse SQL: ${toError(error).message}`, toError(error));
    }

    const tables = new Set<string>();
    for (const entry of entries) {
      const [, schema, table] = entry.split('::');
      if (!table) continue;
      tables.add(schema && schema !== 'null' ? `${schema}.${table}` : table);
    }
    return [...tables];
  }
}

/**
 * Lower-cased final dot segment of a parsed table name, without backticks
 */
export function parsedTableBareName(name: string): string {
  const segments = name.replace(/[`"]/g, '').split('.');
  return (segments[segments.length - 1] ?? name).trim().toLowerCase();
}
