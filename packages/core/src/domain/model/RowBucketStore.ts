import type { EncodedRow } from './Row.js';
import { isAllocationFailure } from './TransferError.js';

/** Rows per bucket. Affects allocation granularity only. */
export const ROW_BUCKET_CAPACITY = 1000;

/** Stable address of a stored row: bucket index in the arena plus slot inside the bucket. */
export interface RowHandle {
  readonly bucket: number;
  readonly slot: number;
}

/** Result of appending a row. A failed append leaves the store untouched. */
export type AppendResult =
  | { readonly appended: true; readonly handle: RowHandle }
  | { readonly appended: false; readonly reason: 'OUT_OF_MEMORY' };

/** A fixed-capacity chunk of rows with a parallel multiline flag per row. */
export interface RowBucket {
  readonly rows: EncodedRow[];
  readonly multilines: Uint8Array;
  nrows: number;
}

/** Read-only view of a bucket handed out to readers. */
export interface RowBucketView {
  readonly index: number;
  readonly nrows: number;
  row(slot: number): EncodedRow;
  isMultiline(slot: number): boolean;
}

/**
 * Append-only row storage made of fixed-capacity buckets.
 *
 * Buckets are kept in an arena (array) in arrival order and the tail is tracked for
 * O(1) append. Every bucket but the last is full. Once `seal()` is called the store is
 * read-only and may be shared between readers.
 */
export class RowBucketStore implements Iterable<EncodedRow> {
  private arena: RowBucket[] = [];
  private tail: RowBucket | null = null;
  private total = 0;
  private isSealed = false;

  constructor(readonly capacity: number = ROW_BUCKET_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('Bucket capacity must be at least 1');
    }
  }

  get rowCount(): number {
    return this.total;
  }

  get bucketCount(): number {
    return this.arena.length;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  append(row: EncodedRow, isMultiline: boolean): AppendResult {
    if (this.isSealed) {
      throw new Error('Cannot append to a sealed row store');
    }

    let bucket = this.tail;
    if (!bucket || bucket.nrows >= this.capacity) {
      try {
        bucket = this.allocateBucket();
      } catch (error) {
        if (isAllocationFailure(error)) {
          return { appended: false, reason: 'OUT_OF_MEMORY' };
        }
        throw error;
      }
      this.arena.push(bucket);
      this.tail = bucket;
    }

    const slot = bucket.nrows;
    bucket.rows[slot] = row;
    bucket.multilines[slot] = isMultiline ? 1 : 0;
    bucket.nrows++;
    this.total++;

    return { appended: true, handle: { bucket: this.arena.length - 1, slot } };
  }

  /** Make the store read-only. Idempotent. */
  seal(): void {
    this.isSealed = true;
  }

  /** Drop every bucket and row. The store can be reused afterwards unless it was sealed. */
  clear(): void {
    this.arena = [];
    this.tail = null;
    this.total = 0;
  }

  get(handle: RowHandle): EncodedRow {
    const bucket = this.arena[handle.bucket];
    const row = bucket && handle.slot >= 0 && handle.slot < bucket.nrows ? bucket.rows[handle.slot] : undefined;
    if (!row) {
      throw new RangeError(`No row at bucket ${handle.bucket}, slot ${handle.slot}`);
    }
    return row;
  }

  /** Convert a zero-based row index (header is 0) into a handle. */
  handleOf(index: number): RowHandle {
    if (!Number.isInteger(index) || index < 0 || index >= this.total) {
      throw new RangeError(`Row index ${index} out of range (store has ${this.total} rows)`);
    }
    return { bucket: Math.floor(index / this.capacity), slot: index % this.capacity };
  }

  rowAt(index: number): EncodedRow {
    return this.get(this.handleOf(index));
  }

  isMultiline(index: number): boolean {
    const { bucket, slot } = this.handleOf(index);
    return this.arena[bucket]?.multilines[slot] === 1;
  }

  /** Buckets in chain order. */
  buckets(): RowBucketView[] {
    return this.arena.map((bucket, index) => ({
      index,
      nrows: bucket.nrows,
      row: (slot: number) => this.get({ bucket: index, slot }),
      isMultiline: (slot: number) => slot >= 0 && slot < bucket.nrows && bucket.multilines[slot] === 1,
    }));
  }

  *[Symbol.iterator](): Iterator<EncodedRow> {
    for (const bucket of this.arena) {
      for (let slot = 0; slot < bucket.nrows; slot++) {
        const row = bucket.rows[slot];
        if (row) yield row;
      }
    }
  }

  /**
   * Allocate an empty bucket without attaching it. `append()` calls this when the tail is
   * full; a `RangeError` here means the allocation failed.
   */
  allocateBucket(): RowBucket {
    return {
      rows: new Array<EncodedRow>(this.capacity),
      multilines: new Uint8Array(this.capacity),
      nrows: 0,
    };
  }
}
