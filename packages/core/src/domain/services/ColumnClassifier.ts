import { AlignmentClass } from '../model/Column.js';

const NUMERIC_TYPE_TAGS: ReadonlySet<string> = new Set([
  // PostgreSQL internal names
  'int2',
  'int4',
  'int8',
  'float4',
  'float8',
  'numeric',
  'oid',
  'xid',
  'cid',
  'money',
  // SQL spellings
  'smallint',
  'integer',
  'int',
  'bigint',
  'real',
  'double precision',
  'decimal',
  // SQLite declared types
  'tinyint',
  'mediumint',
  'float',
  'double',
]);

/** Lower-cased tag without a trailing type modifier such as `(10,2)`. */
function normalizeTypeTag(typeTag: string): string {
  return typeTag
    .replace(/\s*\([^)]*\)\s*$/, '')
    .trim()
    .toLowerCase();
}

/**
 * Map a column type tag to its alignment class. Unknown tags are `generic`.
 *
 * @example
 * ```typescript
 * classifyColumn('int4');          // 'numeric'
 * classifyColumn('NUMERIC(10,2)'); // 'numeric'
 * classifyColumn('text');          // 'generic'
 * ```
 */
export function classifyColumn(typeTag: string): AlignmentClass {
  return NUMERIC_TYPE_TAGS.has(normalizeTypeTag(typeTag)) ? AlignmentClass.NUMERIC : AlignmentClass.GENERIC;
}
