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

/**
 * Breadth-first search.
 *
 * Expands one frontier cell per step. On an unweighted grid the first time the
 * goal is dequeued its predecessor chain is a shortest route in edge count.
 */
export default class BfsSolver {
  readonly kind = 'bfs';

  readonly end: Coordinate;
  readonly #width: number;
  /** FIFO frontier; `#head` marks the next cell to dequeue. */
  readonly #queue: Coordinate[] = [[0, 0]];
  #head = 0;
  /** Row-major index -> predecessor (`null` for the start). */
  readonly #visited = new Map<number, Coordinate | null>([[0, null]]);
  #path: Coordinate[] = [];
  #finished = false;
  #exhausted = false;

  constructor(bounds: MazeBounds) {
    this.#width = bounds.width;
    this.end = [bounds.width - 1, bounds.height - 1];
  }

  get status(): SolverStatus {
    if (this.#finished) return 'solved';
    return this.#exhausted ? 'exhausted' : 'searching';
  }

  get finished(): boolean {
    return this.#finished;
  }

  /** Shortest route; empty until solved. */
  get path(): SolutionPath {
    return this.#path;
  }

  /** Cells waiting to be expanded, in dequeue order. */
  get queue(): readonly Coordinate[] {
    return this.#queue.slice(this.#head);
  }

  /** Row-major indices of every discovered cell. */
  get visited(): ReadonlySet<number> {
    return new Set(this.#visited.keys());
  }

  step(maze: Maze): SolutionPath | null {
    if (this.#finished) return this.#path;
    if (this.#head >= this.#queue.length) {
      this.#exhausted = true;
      return null;
    }

    const pos = this.#queue[this.#head++];
    if (samePosition(pos, this.end)) {
      this.#finished = true;
      this.#path = reconstructPath(
        pos,
        this.#width,
        (key) => this.#visited.get(key) ?? null
      );
      return this.#path;
    }

    for (const next of maze.getTravellableNeighbors(pos)) {
      const key = positionKey(next, this.#width);
      if (this.#visited.has(key)) continue;
      this.#visited.set(key, pos);
      this.#queue.push(next);
    }
    return null;
  }
}
