import type { AlignmentClass } from './Column.js';
import type { FieldMetrics } from './FieldMetrics.js';

/** Layout metadata of one column. */
export interface ColumnLayout {
  readonly alignment: AlignmentClass;
  /** Widest cell seen so far, header included. */
  readonly width: number;
  /** `true` once any cell of the column contained a line break. */
  readonly multiline: boolean;
}

/**
 * Per-column display metadata built while rows are transferred.
 *
 * Widths only grow and multiline flags only turn on: `seed()` sets the header values,
 * `fold()` merges every data cell into them.
 */
export class PrintDataDescriptor {
  readonly hasHeader: boolean;
  private readonly alignments: readonly AlignmentClass[];
  private readonly widths: Uint32Array;
  private readonly multilines: Uint8Array;

  constructor(alignments: readonly AlignmentClass[], hasHeader = true) {
    this.alignments = [...alignments];
    this.widths = new Uint32Array(alignments.length);
    this.multilines = new Uint8Array(alignments.length);
    this.hasHeader = hasHeader;
  }

  get nfields(): number {
    return this.alignments.length;
  }

  /** Set the starting values of a column from its header cell. */
  seed(column: number, metrics: FieldMetrics): void {
    this.assertColumn(column);
    this.widths[column] = metrics.width;
    this.multilines[column] = metrics.isMultiline ? 1 : 0;
  }

  /** Merge one data cell: `width = max(width, cell)`, `multiline |= cell`. */
  fold(column: number, metrics: FieldMetrics): void {
    this.assertColumn(column);
    if (metrics.width > (this.widths[column] ?? 0)) {
      this.widths[column] = metrics.width;
    }
    if (metrics.isMultiline) {
      this.multilines[column] = 1;
    }
  }

  column(index: number): ColumnLayout {
    const alignment = this.assertColumn(index);
    return {
      alignment,
      width: this.widths[index] ?? 0,
      multiline: this.multilines[index] === 1,
    };
  }

  columns(): ColumnLayout[] {
    return this.alignments.map((_, index) => this.column(index));
  }

  private assertColumn(index: number): AlignmentClass {
    const alignment = this.alignments[index];
    if (alignment === undefined) {
      throw new RangeError(`Column ${index} out of range (descriptor has ${this.alignments.length} columns)`);
    }
    return alignment;
  }
}
