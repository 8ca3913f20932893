import Maze from './maze';
import { MazeError, MalformedEncodingError } from './maze.errors';
import { warn } from '../utils/warnings';

/**
 * Binary maze format.
 *
 * Layout:
 *  [ width: u16 big-endian ][ packed cells ... ]
 *
 * Cells are packed two per byte in row-major order, the first cell in the
 * high nibble and the second in the low nibble. An odd cell count leaves the
 * final low nibble as zero padding.
 *
 * Height is not stored; the decoder derives it from the cell count. Because a
 * zero low nibble in the last byte is always read as padding, a maze with an
 * even cell count whose last cell is fully walled does not survive a round
 * trip: the last cell is dropped and, unless the width is 1, the remaining
 * count no longer fills whole rows so decoding fails.
 */

/** Size of the width header in bytes. */
export const HEADER_BYTES = 2;

/** Result of {@link tryDecodeMaze}. */
export type DecodeResult =
  | { ok: true; maze: Maze }
  | { ok: false; error: MazeError };

/** Encode `maze` to the binary maze format. */
export function encodeMaze(maze: Maze): Uint8Array {
  const cells = maze.cells();
  const packedLength = Math.ceil(cells.length / 2);
  const bytes = new Uint8Array(HEADER_BYTES + packedLength);
  // Width fits u16: the Maze constructor enforces MAX_WIDTH.
  bytes[0] = (maze.width >> 8) & 0xff;
  bytes[1] = maze.width & 0xff;
  for (let i = 0; i < packedLength; i++) {
    const high = cells[i * 2];
    const low = i * 2 + 1 < cells.length ? cells[i * 2 + 1] : 0;
    bytes[HEADER_BYTES + i] = (high << 4) | low;
  }
  return bytes;
}

/**
 * Decode the binary maze format.
 *
 * @throws {MalformedEncodingError} for a buffer shorter than header plus one
 *  byte, a zero width, or a cell count that is not a whole number of rows.
 */
export function decodeMaze(bytes: Uint8Array): Maze {
  if (bytes.length < HEADER_BYTES + 1) {
    throw new MalformedEncodingError(
      `maze data needs at least ${HEADER_BYTES + 1} bytes, got ${bytes.length}`
    );
  }
  const width = (bytes[0] << 8) | bytes[1];
  if (width === 0) {
    throw new MalformedEncodingError('maze width is zero');
  }
  const packed = bytes.subarray(HEADER_BYTES);
  const padded = (packed[packed.length - 1] & 0x0f) === 0;
  const cellCount = packed.length * 2 - (padded ? 1 : 0);
  if (cellCount % width !== 0) {
    throw new MalformedEncodingError(
      `${cellCount} cells do not fill rows of width ${width}`
    );
  }
  if (padded && (packed.length * 2) % width === 0) {
    warn(
      `[maze] last nibble is zero and read as padding; a fully walled final cell would be dropped (width ${width}).`
    );
  }
  const cells = new Uint8Array(cellCount);
  for (let i = 0; i < cellCount; i++) {
    const byte = packed[i >> 1];
    cells[i] = i % 2 === 0 ? byte >> 4 : byte & 0x0f;
  }
  return new Maze(width, cellCount / width, cells);
}

/** {@link decodeMaze} as a result union instead of a throw. */
export function tryDecodeMaze(bytes: Uint8Array): DecodeResult {
  try {
    return { ok: true, maze: decodeMaze(bytes) };
  } catch (error) {
    if (error instanceof MazeError) return { ok: false, error };
    throw error;
  }
}
