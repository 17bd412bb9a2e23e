import type { ColumnDescriptor } from '../../domain/model/Column.js';
import type { QueryResult, QuerySource } from '../../domain/ports/QuerySource.js';

/** Options for `InMemoryQuerySource`. */
export interface InMemoryQuerySourceOptions {
  /** When set, `connect()` throws with this diagnostic. */
  readonly connectError?: string;
  /** When set, `execute()` throws with this diagnostic. */
  readonly queryError?: string;
  /** When set, the query is acknowledged with this command tag instead of returning rows. */
  readonly commandTag?: string;
}

/**
 * Query source over rows already held in memory. Every query returns the same result.
 *
 * Useful for results fetched by other means and for tests. Counts `connect()` and
 * `release()` calls so callers can check the lifecycle.
 *
 * @example
 * ```typescript
 * const source = new InMemoryQuerySource(
 *   [{ name: 'id', typeTag: 'int4' }, { name: 'label', typeTag: 'text' }],
 *   [['1', 'one'], ['2', 'two']],
 * );
 * ```
 */
export class InMemoryQuerySource implements QuerySource {
  readonly name = 'memory';
  connectCount = 0;
  releaseCount = 0;
  lastQuery: string | null = null;

  constructor(
    private readonly columns: readonly ColumnDescriptor[],
    private readonly rows: Iterable<readonly string[]>,
    private readonly options: InMemoryQuerySourceOptions = {},
  ) {}

  connect(): void {
    this.connectCount++;
    if (this.options.connectError !== undefined) {
      throw new Error(this.options.connectError);
    }
  }

  execute(query: string): QueryResult {
    this.lastQuery = query;
    if (this.options.queryError !== undefined) {
      throw new Error(this.options.queryError);
    }
    if (this.options.commandTag !== undefined) {
      return { kind: 'command', commandTag: this.options.commandTag };
    }
    return { kind: 'tuples', columns: this.columns, rows: this.rows };
  }

  release(): void {
    this.releaseCount++;
  }
}
