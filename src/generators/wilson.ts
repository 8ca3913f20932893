/**
 * Wilson's algorithm (loop-erased random walk)
 * ============================================
 * Samples a uniform spanning tree of the grid, i.e. an unbiased perfect maze.
 *
 * A walk wanders over raw grid adjacency (walls ignored). Whenever it steps
 * onto a cell it already contains, the loop since that cell's first visit is
 * erased. When it reaches a cell that already belongs to the maze, the walk is
 * committed: a passage is carved between every consecutive pair of its cells.
 * A new walk then starts from a random uncarved cell until none remain.
 *
 * The very first walk has no maze to hit, so it is aimed at an advisory target
 * cell picked at construction; reaching that cell commits the walk too.
 *
 * Work is split into single {@link WilsonGenerator.step} calls so callers can
 * animate generation or run it to completion.
 *
 * @example
 * const maze = new Maze(16, 16);
 * const wilson = new WilsonGenerator(maze.getBounds(), { seed: 'demo' });
 * while (!wilson.step(maze));
 */
import type Maze from '../maze/maze';
import type { MazeBounds } from '../maze/maze';
import { Coordinate, Direction, between, opposite } from '../maze/direction';
import {
  RandomOptions,
  RandomSource,
  pick,
  randomIndex,
  resolveRandom,
} from '../utils/rng';

export default class WilsonGenerator {
  readonly kind = 'wilson';

  readonly #rng: RandomSource;
  readonly #width: number;
  /** Positions of the current walk, oldest first. */
  #walk: Coordinate[] = [];
  /** Row-major index -> offset in #walk. */
  readonly #walkOffsets = new Map<number, number>();
  #firstWalkTarget: Coordinate | null = null;
  #lastDirection: Direction | null = null;
  #commits = 0;

  constructor(bounds: MazeBounds, options: RandomOptions = {}) {
    this.#rng = resolveRandom(options);
    this.#width = bounds.width;
    const cellCount = bounds.width * bounds.height;
    // A single cell is already a spanning tree: nothing to walk.
    if (cellCount < 2) return;

    const startIndex = randomIndex(this.#rng, cellCount);
    // Draw the target from the remaining cells so it never equals the start.
    let targetIndex = randomIndex(this.#rng, cellCount - 1);
    if (targetIndex >= startIndex) targetIndex++;
    this.#firstWalkTarget = this.#toXY(targetIndex);
    this.#push(this.#toXY(startIndex));
  }

  /** Current walk, oldest position first. */
  get walk(): readonly Coordinate[] {
    return this.#walk;
  }

  /** Target of the first walk; `null` once the first walk committed. */
  get firstWalkTarget(): Coordinate | null {
    return this.#firstWalkTarget;
  }

  /** Number of walks carved into the maze so far. */
  get commits(): number {
    return this.#commits;
  }

  /** Whether generation finished. */
  get done(): boolean {
    return this.#walk.length === 0;
  }

  /**
   * Advance the walk by one move.
   *
   * @returns `true` once every cell of `maze` is carved.
   */
  step(maze: Maze): boolean {
    if (this.#walk.length === 0) return true;
    const pos = this.#walk[this.#walk.length - 1];

    const neighbors = maze.getNeighbors(pos);
    let next = pick(this.#rng, neighbors);
    // Stepping straight back would only form a 2-cycle; redraw once.
    if (
      this.#lastDirection !== null &&
      next.direction === opposite(this.#lastDirection)
    ) {
      next = pick(this.#rng, neighbors);
    }

    const nextPos: Coordinate = [next.x, next.y];
    const loopStart = this.#walkOffsets.get(this.#key(nextPos));
    if (loopStart !== undefined) {
      this.#truncate(loopStart + 1);
      return false;
    }

    this.#lastDirection = next.direction;
    this.#push(nextPos);

    if (maze.get(next.x, next.y) !== 0 || this.#isFirstWalkTarget(nextPos)) {
      this.#firstWalkTarget = null;
      this.#commit(maze);
      return this.#startNewWalk(maze);
    }
    return false;
  }

  #commit(maze: Maze): void {
    for (let i = 0; i + 1 < this.#walk.length; i++) {
      const [x, y] = this.#walk[i];
      maze.carve(x, y, between(this.#walk[i], this.#walk[i + 1]));
    }
    this.#commits++;
  }

  /** Seed the next walk from a random uncarved cell; `true` when none is left. */
  #startNewWalk(maze: Maze): boolean {
    this.#truncate(0);
    this.#lastDirection = null;
    const uncarved: number[] = [];
    for (let i = 0; i < maze.size; i++) {
      if (maze.getIndex(i) === 0) uncarved.push(i);
    }
    if (uncarved.length === 0) return true;
    this.#push(this.#toXY(pick(this.#rng, uncarved)));
    return false;
  }

  #push(pos: Coordinate): void {
    this.#walkOffsets.set(this.#key(pos), this.#walk.length);
    this.#walk.push(pos);
  }

  /** Drop every walk position from `length` on. */
  #truncate(length: number): void {
    for (let i = length; i < this.#walk.length; i++) {
      this.#walkOffsets.delete(this.#key(this.#walk[i]));
    }
    this.#walk.length = length;
  }

  #isFirstWalkTarget(pos: Coordinate): boolean {
    const target = this.#firstWalkTarget;
    return target !== null && target[0] === pos[0] && target[1] === pos[1];
  }

  #key(pos: Coordinate): number {
    return pos[1] * this.#width + pos[0];
  }

  #toXY(index: number): Coordinate {
    return [index % this.#width, Math.floor(index / this.#width)];
  }
}
