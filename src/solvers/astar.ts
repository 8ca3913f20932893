/**
 * A* search over the maze passages.
 *
 * Frontier entries carry the step count from the start (`cost`), a Manhattan
 * distance estimate (`heuristic`) and the predecessor. Each step pops the
 * entry with the lowest `cost`, breaking ties on the lower `heuristic`, then on
 * insertion order.
 *
 * Two deliberate departures from textbook A*:
 *  - The heuristic stored for a neighbour is measured from the cell being
 *    expanded, not from the neighbour itself.
 *  - An entry already in `open` is never updated with a cheaper cost.
 * Cells already in `closed` are skipped, so a closed entry is never reopened.
 */
import type Maze from '../maze/maze';
import type { MazeBounds } from '../maze/maze';
import type { Coordinate } from '../maze/direction';
import {
  SolutionPath,
  SolverStatus,
  positionKey,
  reconstructPath,
  samePosition,
} from './solver.types';

/** Bookkeeping for one cell in the `open` or `closed` set. */
export interface CellInformation {
  /** Coordinate of the cell. */
  pos: Coordinate;
  /** Steps from the start. */
  cost: number;
  /** Manhattan distance estimate to the goal. */
  heuristic: number;
  /** Cell this one was reached from; `null` for the start. */
  from: Coordinate | null;
}

/** Manhattan distance between two coordinates. */
export function manhattan(a: Coordinate, b: Coordinate): number {
  return Math.abs(a[0] - b[0]) + Math.abs(a[1] - b[1]);
}

export default class AStarSolver {
  readonly kind = 'a-star';

  readonly end: Coordinate;
  readonly #width: number;
  readonly #open = new Map<number, CellInformation>();
  readonly #closed = new Map<number, CellInformation>();
  #path: Coordinate[] = [];
  #exhausted = false;

  constructor(bounds: MazeBounds) {
    this.#width = bounds.width;
    this.end = [bounds.width - 1, bounds.height - 1];
    const start: Coordinate = [0, 0];
    this.#open.set(0, {
      pos: start,
      cost: 0,
      heuristic: manhattan(start, this.end),
      from: null,
    });
  }

  get status(): SolverStatus {
    if (this.#path.length > 0) return 'solved';
    return this.#exhausted ? 'exhausted' : 'searching';
  }

  /** Route found; empty until solved. */
  get path(): SolutionPath {
    return this.#path;
  }

  /** Frontier entries keyed by row-major index. */
  get open(): ReadonlyMap<number, Readonly<CellInformation>> {
    return this.#open;
  }

  /** Expanded entries keyed by row-major index. */
  get closed(): ReadonlyMap<number, Readonly<CellInformation>> {
    return this.#closed;
  }

  step(maze: Maze): SolutionPath | null {
    if (this.#path.length > 0) return this.#path;

    const entry = this.#popLowest();
    if (!entry) {
      this.#exhausted = true;
      return null;
    }
    const [key, current] = entry;
    this.#closed.set(key, current);

    if (samePosition(current.pos, this.end)) {
      this.#path = reconstructPath(
        current.pos,
        this.#width,
        (k) => this.#closed.get(k)?.from ?? null
      );
      return this.#path;
    }

    const cost = current.cost + 1;
    const heuristic = manhattan(current.pos, this.end);
    for (const next of maze.getTravellableNeighbors(current.pos)) {
      const nextKey = positionKey(next, this.#width);
      if (this.#closed.has(nextKey) || this.#open.has(nextKey)) continue;
      this.#open.set(nextKey, { pos: next, cost, heuristic, from: current.pos });
    }
    return null;
  }

  /** Remove and return the lowest (cost, heuristic) open entry. */
  #popLowest(): [number, CellInformation] | undefined {
    let best: [number, CellInformation] | undefined;
    for (const [key, info] of this.#open) {
      if (
        !best ||
        info.cost < best[1].cost ||
        (info.cost === best[1].cost && info.heuristic < best[1].heuristic)
      ) {
        best = [key, info];
      }
    }
    if (best) this.#open.delete(best[0]);
    return best;
  }
}
