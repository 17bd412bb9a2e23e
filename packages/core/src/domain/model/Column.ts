/**
 * How a column's values are aligned when rendered.
 *
 * - `numeric`: right-aligned (integers, floats, decimals, money, identifiers)
 * - `generic`: left-aligned (everything else)
 */
export const AlignmentClass = {
  NUMERIC: 'numeric',
  GENERIC: 'generic',
} as const;

export type AlignmentClass = (typeof AlignmentClass)[keyof typeof AlignmentClass];

/** A result column as reported by the query source. */
export interface ColumnDescriptor {
  /** Column label, stored as the header cell. */
  readonly name: string;
  /** Source type name (e.g. `int4`, `INTEGER`, `varchar(20)`). Empty when the source has none. */
  readonly typeTag: string;
}
