import { describe, it, expect, vi, afterEach } from 'vitest';
import { TransferOrchestrator } from '../../src/TransferOrchestrator.js';
import type { TransferResult } from '../../src/TransferOrchestrator.js';
import { InMemoryQuerySource } from '../../src/infrastructure/sources/InMemoryQuerySource.js';
import { RowBucketStore } from '../../src/domain/model/RowBucketStore.js';
import type { InMemoryQuerySourceOptions } from '../../src/infrastructure/sources/InMemoryQuerySource.js';
import type { ColumnDescriptor } from '../../src/domain/model/Column.js';
import type { TransferFailedEvent } from '../../src/domain/events/DomainEvents.js';

// --- Helpers ---

const twoColumns: ColumnDescriptor[] = [
  { name: 'id', typeTag: 'int4' },
  { name: 'label', typeTag: 'text' },
];

function wideColumns(count: number): ColumnDescriptor[] {
  return Array.from({ length: count }, (_, i) => ({ name: `c${i}`, typeTag: 'text' }));
}

function setup(
  columns: readonly ColumnDescriptor[],
  rows: Iterable<readonly string[]>,
  options?: InMemoryQuerySourceOptions,
) {
  const source = new InMemoryQuerySource(columns, rows, options);
  const transfer = new TransferOrchestrator({ query: 'SELECT * FROM t', source });
  const failed: TransferFailedEvent[] = [];
  transfer.on('transfer:failed', (event) => failed.push(event));
  return { source, transfer, failed };
}

function* rowsThenFailure(): Generator<readonly string[]> {
  yield ['1', 'one'];
  throw new Error('server closed the connection unexpectedly');
}

// ============================================================
// Recoverable errors
// ============================================================
describe('Errors: connection', () => {
  it('should fail with the source diagnostic and still release', () => {
    const { source, transfer, failed } = setup(twoColumns, [], { connectError: 'could not connect to server' });

    const result = transfer.run();

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'CONNECTION_ERROR',
        message: 'Connection to database failed: could not connect to server',
        fatal: false,
      },
    });
    expect(source.releaseCount).toBe(1);
    expect(failed[0]?.state).toBe('CONNECT');
    expect(transfer.getState()).toBe('DONE');
  });
});

describe('Errors: query', () => {
  it('should fail when the query is rejected', () => {
    const { source, transfer } = setup(twoColumns, [], { queryError: 'syntax error at or near "SELEC"' });

    const result = transfer.run();

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'QUERY_ERROR',
        message: 'Query doesn\'t return data: syntax error at or near "SELEC"',
        fatal: false,
      },
    });
    expect(source.releaseCount).toBe(1);
  });

  it('should fail on a non-tabular result', () => {
    const { source, transfer, failed } = setup(twoColumns, [], { commandTag: 'CREATE TABLE' });

    const result = transfer.run();

    expect(result).toEqual({
      ok: false,
      error: { code: 'QUERY_ERROR', message: "Query doesn't return data: CREATE TABLE", fatal: false },
    });
    expect(failed[0]?.state).toBe('VALIDATE');
    expect(source.releaseCount).toBe(1);
  });

  it('should omit the detail when the acknowledgement has no tag', () => {
    const { transfer } = setup(twoColumns, [], { commandTag: '' });

    const result = transfer.run();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Query doesn't return data");
  });

  it('should fail when the source breaks while rows are read', () => {
    const { source, transfer, failed } = setup(twoColumns, rowsThenFailure());

    const result = transfer.run();

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'QUERY_ERROR',
        message: "Query doesn't return data: server closed the connection unexpectedly",
        fatal: false,
      },
    });
    expect(failed[0]?.state).toBe('ROW_TRANSFER');
    expect(source.releaseCount).toBe(1);
  });
});

describe('Errors: column limit', () => {
  it('should accept exactly 1024 columns', () => {
    const { transfer } = setup(wideColumns(1024), [wideColumns(1024).map((c) => c.name)]);

    const result = transfer.run();

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.descriptor.nfields).toBe(1024);
      expect(result.store.rowCount).toBe(2);
    }
  });

  it('should reject 1025 columns', () => {
    const { source, transfer, failed } = setup(wideColumns(1025), []);

    const result = transfer.run();

    expect(result).toEqual({
      ok: false,
      error: { code: 'COLUMN_LIMIT_EXCEEDED', message: 'too many columns', fatal: false },
    });
    expect(failed[0]?.state).toBe('COLUMN_SETUP');
    expect(source.releaseCount).toBe(1);
  });

  it('should honour a lower configured limit', () => {
    const source = new InMemoryQuerySource(wideColumns(3), []);
    const transfer = new TransferOrchestrator({ query: 'SELECT 1', source, maxColumns: 2 });

    const result = transfer.run();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('COLUMN_LIMIT_EXCEEDED');
  });
});

describe('Errors: integration unavailable', () => {
  it('should fail without a source and contact nothing', () => {
    const transfer = new TransferOrchestrator({ query: 'SELECT 1' });

    const result = transfer.run();

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'INTEGRATION_UNAVAILABLE',
        message: 'Query cannot be executed. The query source integration is not available in this build.',
        fatal: false,
      },
    });
    expect(transfer.getState()).toBe('DONE');
  });
});

// ============================================================
// Fatal errors
// ============================================================
describe('Errors: out of memory', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function failAllocationsAfter(allowed: number): void {
    const original = Buffer.allocUnsafeSlow;
    let calls = 0;
    vi.spyOn(Buffer, 'allocUnsafeSlow').mockImplementation((size: number) => {
      calls++;
      if (calls > allowed) {
        throw new RangeError('Array buffer allocation failed');
      }
      return original.call(Buffer, size);
    });
  }

  it('should stop at once, report a fatal error and release the source', () => {
    failAllocationsAfter(3);
    const rows = [
      ['1', 'a'],
      ['2', 'b'],
      ['3', 'c'],
      ['4', 'd'],
    ];
    const { source, transfer, failed } = setup(twoColumns, rows);

    const result = transfer.run();

    expect(result).toEqual({
      ok: false,
      error: { code: 'OUT_OF_MEMORY', message: 'out of memory', fatal: true },
    });
    expect(failed[0]?.state).toBe('ROW_TRANSFER');
    expect(source.releaseCount).toBe(1);
    expect(transfer.getState()).toBe('DONE');
  });

  it('should treat a failed bucket allocation during the row transfer as fatal', () => {
    const original = RowBucketStore.prototype.allocateBucket;
    let allocations = 0;
    vi.spyOn(RowBucketStore.prototype, 'allocateBucket').mockImplementation(function (this: RowBucketStore) {
      allocations++;
      if (allocations > 1) {
        throw new RangeError('Array buffer allocation failed');
      }
      return original.call(this);
    });
    // The header and 999 rows fill the first bucket; the 1000th row needs a second one.
    const rows = Array.from({ length: 1000 }, (_, i) => [String(i), `row ${i}`]);
    const { source, transfer, failed } = setup(twoColumns, rows);

    const result = transfer.run();

    expect(result).toEqual({
      ok: false,
      error: { code: 'OUT_OF_MEMORY', message: 'out of memory', fatal: true },
    });
    expect(allocations).toBe(2);
    expect(failed[0]?.state).toBe('ROW_TRANSFER');
    expect(source.releaseCount).toBe(1);
    expect(transfer.getState()).toBe('DONE');
  });

  it('should treat a failed column descriptor allocation as fatal', () => {
    const { source, transfer, failed } = setup(twoColumns, [['1', 'a']]);
    vi.stubGlobal(
      'Uint32Array',
      class {
        constructor() {
          throw new RangeError('Array buffer allocation failed');
        }
      },
    );

    let result: TransferResult | undefined;
    try {
      result = transfer.run();
    } finally {
      vi.unstubAllGlobals();
    }

    expect(result).toEqual({
      ok: false,
      error: { code: 'OUT_OF_MEMORY', message: 'out of memory', fatal: true },
    });
    expect(failed[0]?.state).toBe('COLUMN_SETUP');
    expect(source.releaseCount).toBe(1);
  });

  it('should treat a failed header allocation as fatal', () => {
    failAllocationsAfter(0);
    const { source, transfer, failed } = setup(twoColumns, [['1', 'a']]);

    const result = transfer.run();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.fatal).toBe(true);
    expect(failed[0]?.state).toBe('HEADER_TRANSFER');
    expect(source.releaseCount).toBe(1);
  });
});

// ============================================================
// Unexpected errors
// ============================================================
describe('Errors: contract violations', () => {
  it('should propagate a row with the wrong number of cells after cleanup', () => {
    const { source, transfer } = setup(twoColumns, [['only one']]);

    expect(() => transfer.run()).toThrow('Row has 1 cells, expected 2');
    expect(source.releaseCount).toBe(1);
    expect(transfer.getState()).toBe('DONE');
  });
});
