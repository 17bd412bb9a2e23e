/** Machine-readable failure codes of a transfer. */
export type TransferErrorCode =
  | 'CONNECTION_ERROR'
  | 'QUERY_ERROR'
  | 'COLUMN_LIMIT_EXCEEDED'
  | 'INTEGRATION_UNAVAILABLE'
  | 'OUT_OF_MEMORY';

/** A failed transfer. The message is meant to be shown to the user as is. */
export interface TransferError {
  readonly code: TransferErrorCode;
  readonly message: string;
  /**
   * `true` only for `OUT_OF_MEMORY`. A fatal failure stops the transfer at once and
   * discards every row already stored.
   */
  readonly fatal: boolean;
}

export const COLUMN_LIMIT_MESSAGE = 'too many columns';
export const INTEGRATION_UNAVAILABLE_MESSAGE =
  'Query cannot be executed. The query source integration is not available in this build.';
export const OUT_OF_MEMORY_MESSAGE = 'out of memory';

export function connectionError(diagnostic: string): TransferError {
  return { code: 'CONNECTION_ERROR', message: `Connection to database failed: ${diagnostic}`, fatal: false };
}

/** `detail` is the source's diagnostic, or the command tag of a non-tabular result. */
export function queryError(detail?: string): TransferError {
  const message = detail ? `Query doesn't return data: ${detail}` : "Query doesn't return data";
  return { code: 'QUERY_ERROR', message, fatal: false };
}

export function columnLimitExceeded(): TransferError {
  return { code: 'COLUMN_LIMIT_EXCEEDED', message: COLUMN_LIMIT_MESSAGE, fatal: false };
}

export function integrationUnavailable(): TransferError {
  return { code: 'INTEGRATION_UNAVAILABLE', message: INTEGRATION_UNAVAILABLE_MESSAGE, fatal: false };
}

export function outOfMemory(): TransferError {
  return { code: 'OUT_OF_MEMORY', message: OUT_OF_MEMORY_MESSAGE, fatal: true };
}

/**
 * Thrown when a row, bucket or descriptor allocation cannot be satisfied.
 *
 * Internal signal: the orchestrator converts it into a fatal `TransferError`.
 */
export class OutOfMemoryError extends Error {
  constructor(what: string, options?: { cause?: unknown }) {
    super(`Cannot allocate ${what}`, options);
    this.name = 'OutOfMemoryError';
  }
}

/** Engines report exhausted or oversized allocations as `RangeError`. */
export function isAllocationFailure(error: unknown): error is RangeError {
  return error instanceof RangeError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
