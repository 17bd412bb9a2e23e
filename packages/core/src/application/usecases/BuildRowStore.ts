import type { TabularResult } from '../../domain/ports/QuerySource.js';
import type { EncodedRow } from '../../domain/model/Row.js';
import type { TransferError } from '../../domain/model/TransferError.js';
import {
  OutOfMemoryError,
  columnLimitExceeded,
  errorMessage,
  isAllocationFailure,
  queryError,
} from '../../domain/model/TransferError.js';
import { PrintDataDescriptor } from '../../domain/model/PrintDataDescriptor.js';
import { classifyColumn } from '../../domain/services/ColumnClassifier.js';
import { encodeRow } from '../../domain/services/RowEncoder.js';
import type { TransferContext } from '../TransferContext.js';

/**
 * Use case: fill the row store and the descriptor from a tabular result
 * (COLUMN_SETUP → HEADER_TRANSFER → ROW_TRANSFER).
 *
 * Returns `null` on success or a recoverable error. Allocation failures are thrown as
 * `OutOfMemoryError` and end the transfer at once.
 */
export class BuildRowStore {
  constructor(private readonly ctx: TransferContext) {}

  execute(result: TabularResult): TransferError | null {
    this.ctx.transitionTo('COLUMN_SETUP');
    const nfields = result.columns.length;
    if (nfields > this.ctx.config.maxColumns) {
      return columnLimitExceeded();
    }
    const descriptor = this.setupColumns(result);

    this.ctx.transitionTo('HEADER_TRANSFER');
    const header = encodeRow(
      result.columns.map((column) => column.name),
      nfields,
    );
    let headerMultiline = false;
    for (let i = 0; i < nfields; i++) {
      const metrics = this.ctx.measure(header.field(i));
      descriptor.seed(i, metrics);
      headerMultiline ||= metrics.isMultiline;
    }
    this.store(header, headerMultiline);

    this.ctx.eventBus.emit({
      type: 'transfer:header',
      transferId: this.ctx.transferId,
      columnCount: nfields,
      timestamp: Date.now(),
    });

    this.ctx.transitionTo('ROW_TRANSFER');
    const rows = result.rows[Symbol.iterator]();
    for (;;) {
      let next: IteratorResult<readonly string[]>;
      try {
        next = rows.next();
      } catch (error) {
        if (error instanceof OutOfMemoryError) throw error;
        return queryError(errorMessage(error));
      }
      if (next.done) break;

      const row = encodeRow(next.value, nfields);
      let rowMultiline = false;
      for (let i = 0; i < nfields; i++) {
        const metrics = this.ctx.measure(row.field(i));
        descriptor.fold(i, metrics);
        rowMultiline ||= metrics.isMultiline;
      }
      this.store(row, rowMultiline);
    }

    return null;
  }

  private setupColumns(result: TabularResult): PrintDataDescriptor {
    try {
      const descriptor = new PrintDataDescriptor(
        result.columns.map((column) => classifyColumn(column.typeTag)),
        true,
      );
      this.ctx.descriptor = descriptor;
      return descriptor;
    } catch (error) {
      if (isAllocationFailure(error)) {
        throw new OutOfMemoryError('column descriptor', { cause: error });
      }
      throw error;
    }
  }

  private store(row: EncodedRow, isMultiline: boolean): void {
    const store = this.ctx.store;
    const appended = store.append(row, isMultiline);
    if (!appended.appended) {
      throw new OutOfMemoryError('row bucket');
    }

    if (appended.handle.slot === store.capacity - 1) {
      this.ctx.eventBus.emit({
        type: 'transfer:progress',
        transferId: this.ctx.transferId,
        rowCount: store.rowCount,
        bucketCount: store.bucketCount,
        timestamp: Date.now(),
      });
    }
  }
}
