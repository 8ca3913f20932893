import {
  Coordinate,
  fromTraceLetter,
  stepDirection,
  toTraceLetter,
  travel,
} from '../maze/direction';
import { MalformedEncodingError } from '../maze/maze.errors';
import type { SolutionPath } from '../solvers/solver.types';

/**
 * Solution trace: one ASCII byte per move of a path, `U`, `D`, `L` or `R`,
 * naming the direction from each coordinate to the next. A path of `n`
 * coordinates yields `n - 1` bytes.
 *
 * @throws {MalformedEncodingError} when two consecutive coordinates are not
 *  grid-adjacent.
 */
export function encodeSolutionTrace(path: SolutionPath): Uint8Array {
  const bytes = new Uint8Array(Math.max(0, path.length - 1));
  for (let i = 0; i + 1 < path.length; i++) {
    const [from, to] = [path[i], path[i + 1]];
    const direction = stepDirection(from, to);
    if (direction === undefined) {
      throw new MalformedEncodingError(
        `(${from[0]},${from[1]}) and (${to[0]},${to[1]}) are not adjacent`
      );
    }
    bytes[i] = toTraceLetter(direction).charCodeAt(0);
  }
  return bytes;
}

/**
 * Replay a trace from `start` (default `(0,0)`) back into a path.
 *
 * @throws {MalformedEncodingError} on a byte that is not `U`, `D`, `L` or `R`.
 */
export function decodeSolutionTrace(
  bytes: Uint8Array,
  start: Coordinate = [0, 0]
): Coordinate[] {
  const path: Coordinate[] = [start];
  let [x, y] = start;
  for (let i = 0; i < bytes.length; i++) {
    const direction = fromTraceLetter(String.fromCharCode(bytes[i]));
    if (direction === undefined) {
      throw new MalformedEncodingError(
        `trace byte 0x${bytes[i].toString(16).padStart(2, '0')} at offset ${i} is not U, D, L or R`
      );
    }
    [x, y] = travel(direction, x, y);
    path.push([x, y]);
  }
  return path;
}
