import Database from 'better-sqlite3';
import type { ColumnDescriptor, QueryResult, QuerySource } from '@pagerdata/core';

/** Options for `SqliteQuerySource`. */
export interface SqliteQuerySourceOptions {
  /** Path to the database file. */
  readonly filename: string;
  /** Open the database read-only. Default: `false`. */
  readonly readonly?: boolean;
  /** Fail to connect when the file does not exist instead of creating it. Default: `true`. */
  readonly fileMustExist?: boolean;
  /** Busy timeout in milliseconds. Default: `5000`. */
  readonly timeout?: number;
}

type CellValue = string | number | bigint | Buffer | null;

function isCellValue(value: unknown): value is CellValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    Buffer.isBuffer(value)
  );
}

/** Render one SQLite value as cell text. NULL becomes `''`; BLOBs are rejected. */
function toCellText(value: unknown, column: string): string {
  if (!isCellValue(value)) {
    throw new Error(`Unexpected value of type ${typeof value} in column "${column}"`);
  }
  if (value === null) return '';
  if (Buffer.isBuffer(value)) {
    throw new Error(`Column "${column}" holds binary data, which cannot be displayed`);
  }
  return String(value);
}

/** `INSERT 3`, `CREATE 0`: the statement's leading keyword and the number of changed rows. */
function commandTag(sql: string, changes: number): string {
  const verb = /^\s*([A-Za-z]+)/.exec(sql)?.[1]?.toUpperCase() ?? '';
  return verb ? `${verb} ${changes}` : String(changes);
}

/**
 * Query source over a SQLite database file using better-sqlite3.
 *
 * Statements that return rows are streamed lazily through a raw iterator, with 64-bit
 * integers read as `bigint` so large values keep every digit. Other statements run
 * immediately and come back as a command acknowledgement.
 */
export class SqliteQuerySource implements QuerySource {
  readonly name = 'sqlite';
  private db: Database.Database | null = null;
  private active: IterableIterator<unknown> | null = null;

  constructor(private readonly options: SqliteQuerySourceOptions) {}

  connect(): void {
    this.db = new Database(this.options.filename, {
      readonly: this.options.readonly ?? false,
      fileMustExist: this.options.fileMustExist ?? true,
      timeout: this.options.timeout ?? 5000,
    });
  }

  execute(query: string): QueryResult {
    const db = this.db;
    if (!db) {
      throw new Error('Not connected. Call connect() first.');
    }

    const statement = db.prepare(query);
    if (!statement.reader) {
      const result = statement.run();
      return { kind: 'command', commandTag: commandTag(query, result.changes) };
    }

    const columns: ColumnDescriptor[] = statement.columns().map((column) => ({
      name: column.name,
      typeTag: column.type ?? '',
    }));

    statement.raw(true).safeIntegers(true);
    const iterator = statement.iterate();
    this.active = iterator;
    return { kind: 'tuples', columns, rows: this.readRows(iterator, columns) };
  }

  release(): void {
    this.active?.return?.();
    this.active = null;
    if (this.db?.open) {
      this.db.close();
    }
    this.db = null;
  }

  private *readRows(
    iterator: IterableIterator<unknown>,
    columns: readonly ColumnDescriptor[],
  ): Generator<readonly string[]> {
    try {
      for (const row of iterator) {
        if (!Array.isArray(row)) {
          throw new Error('Expected a raw row');
        }
        yield columns.map((column, i) => toCellText(row[i], column.name));
      }
    } finally {
      this.active = null;
    }
  }
}
