import type Maze from '../maze/maze';
import type { MazeBounds } from '../maze/maze';
import type { Coordinate } from '../maze/direction';
import {
  SolutionPath,
  SolverStatus,
  positionKey,
  samePosition,
} from './solver.types';

/**
 * Depth-first search.
 *
 * Keeps the current route as a stack: each step either extends it to the
 * first unvisited travellable neighbour (UP, RIGHT, DOWN, LEFT order) or pops
 * a dead end. The route found is *a* path, not necessarily the shortest.
 */
export default class DfsSolver {
  readonly kind = 'dfs';

  readonly end: Coordinate;
  readonly #width: number;
  readonly #visited = new Set<number>();
  readonly #path: Coordinate[] = [[0, 0]];
  #status: SolverStatus = 'searching';

  constructor(bounds: MazeBounds) {
    this.#width = bounds.width;
    this.end = [bounds.width - 1, bounds.height - 1];
  }

  get status(): SolverStatus {
    return this.#status;
  }

  /** Current route from the start (the answer once solved). */
  get path(): SolutionPath {
    return this.#path;
  }

  /** Row-major indices of cells already expanded. */
  get visited(): ReadonlySet<number> {
    return this.#visited;
  }

  step(maze: Maze): SolutionPath | null {
    if (this.#path.length === 0) return null;
    const pos = this.#path[this.#path.length - 1];
    if (samePosition(pos, this.end)) {
      this.#status = 'solved';
      return this.#path;
    }

    this.#visited.add(positionKey(pos, this.#width));
    const next = maze
      .getTravellableNeighbors(pos)
      .find((n) => !this.#visited.has(positionKey(n, this.#width)));
    if (next) {
      this.#path.push(next);
    } else {
      this.#path.pop();
      if (this.#path.length === 0) this.#status = 'exhausted';
    }
    return null;
  }
}
