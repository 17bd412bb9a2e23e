import type { ColumnDescriptor } from '../model/Column.js';

/** Rows of a tabular result: ordered column descriptors plus rows of text cells. */
export interface TabularResult {
  readonly kind: 'tuples';
  readonly columns: readonly ColumnDescriptor[];
  /** Iterated once, in source order. Each row holds one cell per column; SQL NULL is `''`. */
  readonly rows: Iterable<readonly string[]>;
}

/** Acknowledgement of a statement that produced no result set (e.g. `CREATE TABLE`). */
export interface CommandResult {
  readonly kind: 'command';
  /** Short description of what ran, e.g. `INSERT 0 3`. May be empty. */
  readonly commandTag: string;
}

export type QueryResult = TabularResult | CommandResult;

/**
 * Port for executing one query against a data source.
 *
 * The transfer calls `connect()`, then `execute()`, iterates the returned rows, and
 * finally calls `release()` exactly once, whatever happened before. All calls are
 * synchronous. Methods throw an `Error` whose message is the source's diagnostic.
 */
export interface QuerySource {
  /** Short name used in events, e.g. `sqlite` or `memory`. */
  readonly name: string;
  connect(): void;
  execute(query: string): QueryResult;
  /** Release the connection and any result handles. Must tolerate a failed or missing `connect()`. */
  release(): void;
}
