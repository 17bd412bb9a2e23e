import { EncodedRow } from '../model/Row.js';
import { OutOfMemoryError, isAllocationFailure } from '../model/TransferError.js';

const TERMINATOR = 0;

/**
 * Pack the cells of one row into a single owned buffer.
 *
 * The buffer size is computed up front (UTF-8 length of every cell plus one terminator
 * each) and allocated once, unpooled, so the row never shares memory with other rows.
 * Cells must not contain NUL characters.
 *
 * @throws OutOfMemoryError when the buffer or the offset table cannot be allocated.
 * @throws Error when `cells.length` differs from `nfields`.
 */
export function encodeRow(cells: readonly string[], nfields: number): EncodedRow {
  if (cells.length !== nfields) {
    throw new Error(`Row has ${cells.length} cells, expected ${nfields}`);
  }

  let size = 0;
  for (const cell of cells) {
    size += Buffer.byteLength(cell, 'utf8') + 1;
  }

  let buffer: Buffer;
  let offsets: Uint32Array;
  try {
    buffer = Buffer.allocUnsafeSlow(size);
    offsets = new Uint32Array(nfields);
  } catch (error) {
    if (isAllocationFailure(error)) {
      throw new OutOfMemoryError(`row buffer of ${size} bytes`, { cause: error });
    }
    throw error;
  }

  let position = 0;
  for (let i = 0; i < nfields; i++) {
    offsets[i] = position;
    position += buffer.write(cells[i] ?? '', position, 'utf8');
    buffer[position++] = TERMINATOR;
  }

  return new EncodedRow(buffer, offsets);
}
