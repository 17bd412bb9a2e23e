import type { TransferConfig } from './TransferConfig.js';
import { resolveTransferConfig } from './TransferConfig.js';
import type { RowBucketStore } from './domain/model/RowBucketStore.js';
import type { PrintDataDescriptor } from './domain/model/PrintDataDescriptor.js';
import type { TransferError } from './domain/model/TransferError.js';
import { OutOfMemoryError, errorMessage, integrationUnavailable, outOfMemory } from './domain/model/TransferError.js';
import type { TransferState } from './domain/model/TransferState.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { TransferContext } from './application/TransferContext.js';
import { OpenResult } from './application/usecases/OpenResult.js';
import { BuildRowStore } from './application/usecases/BuildRowStore.js';

/** Outcome of `run()`. On failure no rows are exposed. */
export type TransferResult =
  | { readonly ok: true; readonly store: RowBucketStore; readonly descriptor: PrintDataDescriptor }
  | { readonly ok: false; readonly error: TransferError };

/**
 * Facade that moves one query result into a `RowBucketStore` plus its `PrintDataDescriptor`.
 *
 * `run()` walks CONNECT → EXECUTE → VALIDATE → COLUMN_SETUP → HEADER_TRANSFER →
 * ROW_TRANSFER → CLEANUP → DONE. Any step may end early; CLEANUP always runs exactly once
 * and releases the source before `run()` returns. The whole call is synchronous.
 *
 * @example
 * ```typescript
 * const transfer = new TransferOrchestrator({ query: 'SELECT * FROM t', source, displayMode: 'display' });
 * const result = transfer.run();
 * if (result.ok) pager.show(result.store, result.descriptor);
 * else console.error(result.error.message);
 * ```
 */
export class TransferOrchestrator {
  private readonly ctx: TransferContext;

  /** @throws Error when the configuration is invalid. */
  constructor(config: TransferConfig) {
    this.ctx = new TransferContext(resolveTransferConfig(config));
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /** Current state of the transfer state machine. */
  getState(): TransferState {
    return this.ctx.state;
  }

  getTransferId(): string {
    return this.ctx.transferId;
  }

  /**
   * Run the transfer. Recoverable failures and allocation failures (flagged `fatal`) come
   * back as `{ ok: false }`; anything else propagates after cleanup.
   *
   * @throws Error if the transfer has already run.
   */
  run(): TransferResult {
    if (this.ctx.state !== 'IDLE') {
      throw new Error(`Cannot run transfer from state '${this.ctx.state}'`);
    }

    const { source, displayMode } = this.ctx.config;
    this.ctx.startedAt = Date.now();
    this.ctx.eventBus.emit({
      type: 'transfer:started',
      transferId: this.ctx.transferId,
      source: source?.name ?? 'none',
      displayMode,
      timestamp: this.ctx.startedAt,
    });

    let failure: TransferError | null;
    let failedIn: TransferState = this.ctx.state;
    try {
      failure = this.transfer();
      failedIn = this.ctx.state;
    } catch (error) {
      failedIn = this.ctx.state;
      if (!(error instanceof OutOfMemoryError)) throw error;
      failure = outOfMemory();
    } finally {
      this.cleanup();
    }

    const { store, descriptor } = this.ctx;
    if (failure) {
      store.clear();
      store.seal();
      this.ctx.eventBus.emit({
        type: 'transfer:failed',
        transferId: this.ctx.transferId,
        error: failure,
        state: failedIn,
        timestamp: Date.now(),
      });
      return { ok: false, error: failure };
    }
    if (!descriptor) {
      throw new Error('Transfer finished without a column descriptor');
    }

    store.seal();
    this.ctx.eventBus.emit({
      type: 'transfer:completed',
      transferId: this.ctx.transferId,
      rowCount: store.rowCount,
      bucketCount: store.bucketCount,
      columnCount: descriptor.nfields,
      elapsedMs: Date.now() - this.ctx.startedAt,
      timestamp: Date.now(),
    });
    return { ok: true, store, descriptor };
  }

  private transfer(): TransferError | null {
    const source = this.ctx.config.source;
    if (!source) {
      return integrationUnavailable();
    }

    const opened = new OpenResult(this.ctx).execute(source);
    if (!opened.ok) {
      return opened.error;
    }

    return new BuildRowStore(this.ctx).execute(opened.result);
  }

  private cleanup(): void {
    this.ctx.transitionTo('CLEANUP');
    const source = this.ctx.config.source;
    if (source) {
      try {
        source.release();
      } catch (error) {
        this.ctx.eventBus.emit({
          type: 'transfer:cleanup-failed',
          transferId: this.ctx.transferId,
          error: errorMessage(error),
          timestamp: Date.now(),
        });
      }
    }
    this.ctx.transitionTo('DONE');
  }
}
