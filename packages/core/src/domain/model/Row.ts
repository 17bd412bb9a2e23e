/**
 * One tuple of a result set (or the header row of column names).
 *
 * All fields live back to back in a single owned UTF-8 buffer, each followed by a NUL
 * terminator. `offsets[i]` is the first byte of field `i`; the field ends one byte before
 * the next field starts (or before the end of the buffer for the last field).
 */
export class EncodedRow {
  constructor(
    private readonly buffer: Buffer,
    private readonly offsets: Uint32Array,
  ) {}

  get nfields(): number {
    return this.offsets.length;
  }

  /** Size of the owned buffer, terminators included. */
  get byteLength(): number {
    return this.buffer.length;
  }

  /** Raw UTF-8 bytes of field `index`, without the terminator. Shares memory with the row. */
  fieldBytes(index: number): Buffer {
    const start = this.offsetOf(index);
    return this.buffer.subarray(start, this.endOf(index));
  }

  field(index: number): string {
    const start = this.offsetOf(index);
    return this.buffer.toString('utf8', start, this.endOf(index));
  }

  fields(): string[] {
    const values: string[] = [];
    for (let i = 0; i < this.offsets.length; i++) {
      values.push(this.field(i));
    }
    return values;
  }

  private offsetOf(index: number): number {
    const offset = this.offsets[index];
    if (offset === undefined) {
      throw new RangeError(`Field index ${index} out of range (row has ${this.offsets.length} fields)`);
    }
    return offset;
  }

  private endOf(index: number): number {
    const next = this.offsets[index + 1];
    return (next ?? this.buffer.length) - 1;
  }
}
