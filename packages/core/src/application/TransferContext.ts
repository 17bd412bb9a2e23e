import { randomUUID } from 'node:crypto';
import type { ResolvedTransferConfig } from '../TransferConfig.js';
import type { PrintDataDescriptor } from '../domain/model/PrintDataDescriptor.js';
import type { FieldMeasurer } from '../domain/services/FieldMetricsCalculator.js';
import { createFieldMeasurer } from '../domain/services/FieldMetricsCalculator.js';
import { RowBucketStore } from '../domain/model/RowBucketStore.js';
import { TransferState, canTransition } from '../domain/model/TransferState.js';
import { EventBus } from './EventBus.js';

/**
 * Mutable state shared by the use cases of one transfer.
 *
 * Internal class, not exported from the public API. The orchestrator owns it; use cases
 * receive a reference and advance the state machine as they go.
 */
export class TransferContext {
  readonly eventBus = new EventBus();
  readonly transferId = randomUUID();
  readonly store = new RowBucketStore();
  readonly measure: FieldMeasurer;

  state: TransferState = TransferState.IDLE;
  descriptor: PrintDataDescriptor | null = null;
  startedAt = 0;

  constructor(readonly config: ResolvedTransferConfig) {
    this.measure = createFieldMeasurer(config.displayMode);
  }

  transitionTo(next: TransferState): void {
    if (!canTransition(this.state, next)) {
      throw new Error(`Invalid transfer state transition from '${this.state}' to '${next}'`);
    }
    const from = this.state;
    this.state = next;
    this.eventBus.emit({
      type: 'transfer:state',
      transferId: this.transferId,
      from,
      to: next,
      timestamp: Date.now(),
    });
  }
}
