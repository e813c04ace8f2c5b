import type { TableReference } from './table-reference.js';

export interface DatasetUrnOptions {
  platform: string;
  platformInstance?: string;
  env: string;
}

/**
 * `urn:li:dataset:(urn:li:dataPlatform:{platform},{instance.}p.d.t,{env})`
 */
export function makeDatasetUrn(table: TableReference, options: DatasetUrnOptions): string {
  const name = options.platformInstance
    ? `${options.platformInstance}.${table.toDottedName()}`
    : table.toDottedName();
  return `urn:li:dataset:(urn:li:dataPlatform:${options.platform},${name},${options.env})`;
}
