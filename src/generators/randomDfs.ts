import type Maze from '../maze/maze';
import type { MazeBounds } from '../maze/maze';
import type { Coordinate } from '../maze/direction';
import {
  RandomOptions,
  RandomSource,
  pick,
  randomIndex,
  resolveRandom,
} from '../utils/rng';

/**
 * Randomized depth-first backtracker.
 *
 * Carves toward a random uncarved neighbour of the cell on top of the stack,
 * backtracking when none is left. Faster than {@link WilsonGenerator} but
 * biased toward long corridors with few branches.
 */
export default class RandomDfsGenerator {
  readonly kind = 'random-dfs';

  readonly #rng: RandomSource;
  #stack: Coordinate[];

  constructor(bounds: MazeBounds, options: RandomOptions = {}) {
    this.#rng = resolveRandom(options);
    const start = randomIndex(this.#rng, bounds.width * bounds.height);
    this.#stack = [[start % bounds.width, Math.floor(start / bounds.width)]];
  }

  /** Cells from the starting cell to the current head. */
  get stack(): readonly Coordinate[] {
    return this.#stack;
  }

  get done(): boolean {
    return this.#stack.length === 0;
  }

  /** Carve one passage or backtrack one cell; `true` once the stack is empty. */
  step(maze: Maze): boolean {
    if (this.#stack.length === 0) return true;
    const pos = this.#stack[this.#stack.length - 1];

    const candidates = maze
      .getNeighbors(pos)
      .filter((n) => maze.get(n.x, n.y) === 0);
    if (candidates.length === 0) {
      this.#stack.pop();
      return this.#stack.length === 0;
    }

    const next = pick(this.#rng, candidates);
    maze.carve(pos[0], pos[1], next.direction);
    this.#stack.push([next.x, next.y]);
    return false;
  }
}
