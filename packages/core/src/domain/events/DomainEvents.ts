import type { TransferState } from '../model/TransferState.js';
import type { TransferError } from '../model/TransferError.js';
import type { DisplayMode } from '../model/DisplayMode.js';

/** Emitted when `run()` is called, before the source is contacted. */
export interface TransferStartedEvent {
  readonly type: 'transfer:started';
  readonly transferId: string;
  readonly source: string;
  readonly displayMode: DisplayMode;
  readonly timestamp: number;
}

/** Emitted on every state machine transition. */
export interface TransferStateChangedEvent {
  readonly type: 'transfer:state';
  readonly transferId: string;
  readonly from: TransferState;
  readonly to: TransferState;
  readonly timestamp: number;
}

/** Emitted once the header row is stored and the descriptor seeded. */
export interface HeaderStoredEvent {
  readonly type: 'transfer:header';
  readonly transferId: string;
  readonly columnCount: number;
  readonly timestamp: number;
}

/** Emitted each time a bucket fills up during the row transfer. */
export interface TransferProgressEvent {
  readonly type: 'transfer:progress';
  readonly transferId: string;
  /** Rows stored so far, header included. */
  readonly rowCount: number;
  readonly bucketCount: number;
  readonly timestamp: number;
}

/** Emitted when the store is complete and sealed. */
export interface TransferCompletedEvent {
  readonly type: 'transfer:completed';
  readonly transferId: string;
  /** Rows stored, header included. */
  readonly rowCount: number;
  readonly bucketCount: number;
  readonly columnCount: number;
  readonly elapsedMs: number;
  readonly timestamp: number;
}

/** Emitted when the transfer ends with a failure value. */
export interface TransferFailedEvent {
  readonly type: 'transfer:failed';
  readonly transferId: string;
  readonly error: TransferError;
  /** State in which the failure happened. */
  readonly state: TransferState;
  readonly timestamp: number;
}

/** Emitted when releasing the source throws. The transfer result is not affected. */
export interface CleanupFailedEvent {
  readonly type: 'transfer:cleanup-failed';
  readonly transferId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | TransferStartedEvent
  | TransferStateChangedEvent
  | HeaderStoredEvent
  | TransferProgressEvent
  | TransferCompletedEvent
  | TransferFailedEvent
  | CleanupFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
