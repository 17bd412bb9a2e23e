/**
 * Finite state machine for a single transfer.
 *
 * Valid transitions:
 * - `IDLE` → `CONNECT` | `CLEANUP`
 * - `CONNECT` → `EXECUTE` | `CLEANUP`
 * - `EXECUTE` → `VALIDATE` | `CLEANUP`
 * - `VALIDATE` → `COLUMN_SETUP` | `CLEANUP`
 * - `COLUMN_SETUP` → `HEADER_TRANSFER` | `CLEANUP`
 * - `HEADER_TRANSFER` → `ROW_TRANSFER` | `CLEANUP`
 * - `ROW_TRANSFER` → `CLEANUP`
 * - `CLEANUP` → `DONE`
 * - `DONE` → (terminal)
 */
export const TransferState = {
  IDLE: 'IDLE',
  CONNECT: 'CONNECT',
  EXECUTE: 'EXECUTE',
  VALIDATE: 'VALIDATE',
  COLUMN_SETUP: 'COLUMN_SETUP',
  HEADER_TRANSFER: 'HEADER_TRANSFER',
  ROW_TRANSFER: 'ROW_TRANSFER',
  CLEANUP: 'CLEANUP',
  DONE: 'DONE',
} as const;

export type TransferState = (typeof TransferState)[keyof typeof TransferState];

const VALID_TRANSITIONS: Record<TransferState, readonly TransferState[]> = {
  [TransferState.IDLE]: [TransferState.CONNECT, TransferState.CLEANUP],
  [TransferState.CONNECT]: [TransferState.EXECUTE, TransferState.CLEANUP],
  [TransferState.EXECUTE]: [TransferState.VALIDATE, TransferState.CLEANUP],
  [TransferState.VALIDATE]: [TransferState.COLUMN_SETUP, TransferState.CLEANUP],
  [TransferState.COLUMN_SETUP]: [TransferState.HEADER_TRANSFER, TransferState.CLEANUP],
  [TransferState.HEADER_TRANSFER]: [TransferState.ROW_TRANSFER, TransferState.CLEANUP],
  [TransferState.ROW_TRANSFER]: [TransferState.CLEANUP],
  [TransferState.CLEANUP]: [TransferState.DONE],
  [TransferState.DONE]: [],
};

/** Check whether a state transition is valid according to the transfer FSM. */
export function canTransition(from: TransferState, to: TransferState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
