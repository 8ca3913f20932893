import type { Coordinate } from '../maze/direction';

/** Ordered coordinates from the start `(0,0)` to the goal, both inclusive. */
export type SolutionPath = readonly Coordinate[];

/**
 * Progress of a solver.
 * - `searching`: more steps are needed.
 * - `solved`: the goal was reached; `step` keeps returning the same path.
 * - `exhausted`: the frontier emptied without reaching the goal.
 */
export type SolverStatus = 'searching' | 'solved' | 'exhausted';

/** Key for a coordinate inside per-solver maps: its row-major index. */
export function positionKey(pos: Coordinate, width: number): number {
  return pos[1] * width + pos[0];
}

/** Whether two coordinates name the same cell. */
export function samePosition(a: Coordinate, b: Coordinate): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/**
 * Follow `predecessors` from `end` back to the cell with no predecessor and
 * return the route in start-to-end order.
 */
export function reconstructPath(
  end: Coordinate,
  width: number,
  predecessorOf: (key: number) => Coordinate | null
): Coordinate[] {
  const path: Coordinate[] = [];
  let cursor: Coordinate | null = end;
  while (cursor !== null) {
    path.push(cursor);
    cursor = predecessorOf(positionKey(cursor, width));
  }
  return path.reverse();
}
