/** Character tallies reported by the display-width algorithm. Not interpreted by the core. */
export interface AuxCounts {
  readonly digits: number;
  readonly others: number;
}

/** Measured shape of one cell. */
export interface FieldMetrics {
  /** Width of the longest line segment. */
  readonly width: number;
  /** `true` when the cell contains at least one line break. */
  readonly isMultiline: boolean;
  /** Zero in `raw` mode. */
  readonly aux: AuxCounts;
}

export const EMPTY_AUX_COUNTS: AuxCounts = Object.freeze({ digits: 0, others: 0 });
