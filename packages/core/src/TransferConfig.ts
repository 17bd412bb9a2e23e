import type { QuerySource } from './domain/ports/QuerySource.js';
import { DisplayMode, isDisplayMode } from './domain/model/DisplayMode.js';

/** Hard ceiling on the number of result columns. */
export const MAX_COLUMNS = 1024;

/** Configuration for a single transfer. */
export interface TransferConfig {
  /** Query text handed to the source. Must not be blank. */
  readonly query: string;
  /** How cells are measured. Default: `'display'`. */
  readonly displayMode?: DisplayMode;
  /**
   * Query source integration. When absent the transfer fails with
   * `INTEGRATION_UNAVAILABLE` without contacting anything.
   */
  readonly source?: QuerySource;
  /** Column limit, inclusive. Default and maximum: `1024`. */
  readonly maxColumns?: number;
}

/** `TransferConfig` with defaults applied. */
export interface ResolvedTransferConfig {
  readonly query: string;
  readonly displayMode: DisplayMode;
  readonly source: QuerySource | null;
  readonly maxColumns: number;
}

/**
 * Apply defaults and validate.
 *
 * @throws Error on a blank query, an unknown display mode or a column limit outside `1..1024`.
 */
export function resolveTransferConfig(config: TransferConfig): ResolvedTransferConfig {
  if (config.query.trim() === '') {
    throw new Error('Query must not be empty');
  }

  const displayMode: unknown = config.displayMode ?? DisplayMode.DISPLAY;
  if (!isDisplayMode(displayMode)) {
    throw new Error(`Unknown display mode '${String(displayMode)}'. Expected 'raw' or 'display'`);
  }

  const maxColumns = config.maxColumns ?? MAX_COLUMNS;
  if (!Number.isInteger(maxColumns) || maxColumns < 1 || maxColumns > MAX_COLUMNS) {
    throw new Error(`Column limit must be an integer between 1 and ${MAX_COLUMNS}`);
  }

  return {
    query: config.query,
    displayMode,
    source: config.source ?? null,
    maxColumns,
  };
}
