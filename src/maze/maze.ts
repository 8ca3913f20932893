/**
 * Maze
 * ====
 * A rectangular grid of cells whose 4-bit masks record open passages.
 *
 * Bit `d` of a cell (see {@link Direction}) set means the side facing
 * direction `d` is open toward the neighbour there. Cells are stored row-major
 * (`index = y * width + x`) in a `Uint8Array`; a mask of 0 is a fully walled,
 * not yet carved cell.
 *
 * Invariant: passages are symmetric. {@link Maze.carve} is the only mutator
 * that maintains this; `open`, `close` and `clear` touch a single cell and are
 * kept for tooling.
 *
 * Lifecycle: created empty or decoded from bytes, mutated by a generator, then
 * read (never written) by solvers.
 *
 * @example
 * const maze = new Maze(3, 2);
 * maze.carve(0, 0, Direction.RIGHT);
 * maze.get(1, 0); // -> Direction.LEFT
 */
import {
  ALL_PASSAGES,
  Coordinate,
  DIRECTIONS,
  Direction,
  hasPassage,
  opposite,
  travel,
} from './direction';
import { decodeMaze, encodeMaze } from './maze.codec';
import { InvalidDimensionsError, OutOfBoundsError } from './maze.errors';
import { onceWarn } from '../utils/warnings';

/** Largest width the binary codec can store (u16). */
export const MAX_WIDTH = 0xffff;

/** Width and height of a maze. */
export interface MazeBounds {
  width: number;
  height: number;
}

/** A grid-adjacent cell together with the direction leading to it. */
export interface Neighbor {
  x: number;
  y: number;
  direction: Direction;
}

export default class Maze {
  /** Number of columns. */
  readonly width: number;
  /** Number of rows. */
  readonly height: number;
  /** Row-major passage masks. */
  readonly #cells: Uint8Array;

  /**
   * Create a maze. Without `cells` every cell starts fully walled.
   *
   * @param cells Optional row-major masks (copied); length must equal `width * height`.
   * @throws {InvalidDimensionsError} for non-positive / non-integer sizes, a
   *  width the codec cannot store, or a mismatching `cells` length.
   */
  constructor(width: number, height: number, cells?: ArrayLike<number>) {
    if (!Number.isInteger(width) || width <= 0 || width > MAX_WIDTH) {
      throw new InvalidDimensionsError(
        `width must be an integer in [1, ${MAX_WIDTH}], got ${width}`
      );
    }
    if (!Number.isInteger(height) || height <= 0) {
      throw new InvalidDimensionsError(
        `height must be a positive integer, got ${height}`
      );
    }
    this.width = width;
    this.height = height;
    this.#cells = new Uint8Array(width * height);
    if (cells) {
      if (cells.length !== this.#cells.length) {
        throw new InvalidDimensionsError(
          `expected ${this.#cells.length} cells for ${width}x${height}, got ${cells.length}`
        );
      }
      for (let i = 0; i < cells.length; i++) {
        this.#cells[i] = cells[i] & ALL_PASSAGES;
      }
    }
  }

  /** Decode a maze from its binary form (see {@link decodeMaze}). */
  static fromBytes(bytes: Uint8Array): Maze {
    return decodeMaze(bytes);
  }

  /** Binary form of this maze (see {@link encodeMaze}). */
  toBytes(): Uint8Array {
    return encodeMaze(this);
  }

  getBounds(): MazeBounds {
    return { width: this.width, height: this.height };
  }

  /** Total number of cells. */
  get size(): number {
    return this.#cells.length;
  }

  /** Whether `(x, y)` names a cell of this grid. */
  inBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      y >= 0 &&
      x < this.width &&
      y < this.height
    );
  }

  /**
   * Passage mask of cell `(x, y)`.
   *
   * @throws {OutOfBoundsError}
   */
  get(x: number, y: number): number {
    return this.#cells[this.xyToIndex(x, y)];
  }

  /**
   * Passage mask of the cell at row-major `index`.
   *
   * @throws {OutOfBoundsError}
   */
  getIndex(index: number): number {
    this.#assertIndex(index);
    return this.#cells[index];
  }

  /** Row-major index of `(x, y)`. */
  xyToIndex(x: number, y: number): number {
    if (!this.inBounds(x, y)) {
      throw new OutOfBoundsError(
        `(${x},${y}) is outside the ${this.width}x${this.height} maze`
      );
    }
    return y * this.width + x;
  }

  /** Coordinate of row-major `index`. */
  indexToXY(index: number): Coordinate {
    this.#assertIndex(index);
    return [index % this.width, Math.floor(index / this.width)];
  }

  /**
   * Open the `direction` side of `(x, y)` only. The neighbour is untouched,
   * so the result may be asymmetric; generators use {@link carve}.
   */
  open(x: number, y: number, direction: Direction): void {
    onceWarn(
      'maze.open',
      '[maze] open() edits a single cell and can leave passages asymmetric; use carve() to connect two cells.'
    );
    const index = this.xyToIndex(x, y);
    this.#cells[index] |= direction;
  }

  /** Close the `direction` side of `(x, y)` only. */
  close(x: number, y: number, direction: Direction): void {
    onceWarn(
      'maze.close',
      '[maze] close() edits a single cell and can leave passages asymmetric.'
    );
    const index = this.xyToIndex(x, y);
    this.#cells[index] &= ~direction & ALL_PASSAGES;
  }

  /** Reset `(x, y)` to a fully walled cell. */
  clear(x: number, y: number): void {
    this.#cells[this.xyToIndex(x, y)] = 0;
  }

  /**
   * Open a passage between `(x, y)` and its neighbour toward `direction`,
   * setting the matching bit on both cells.
   *
   * @throws {OutOfBoundsError} if either cell lies outside the grid; neither
   *  cell is modified in that case.
   */
  carve(x: number, y: number, direction: Direction): void {
    const from = this.xyToIndex(x, y);
    const [tx, ty] = travel(direction, x, y);
    const to = this.xyToIndex(tx, ty);
    this.#cells[from] |= direction;
    this.#cells[to] |= opposite(direction);
  }

  /**
   * Grid-adjacent cells of `pos` regardless of walls, in UP, RIGHT, DOWN,
   * LEFT order.
   */
  getNeighbors(pos: Coordinate): Neighbor[] {
    const [x, y] = pos;
    this.xyToIndex(x, y);
    const neighbors: Neighbor[] = [];
    for (const direction of DIRECTIONS) {
      const [nx, ny] = travel(direction, x, y);
      if (this.inBounds(nx, ny)) neighbors.push({ x: nx, y: ny, direction });
    }
    return neighbors;
  }

  /**
   * Cells reachable from `pos` through an open passage, in UP, RIGHT, DOWN,
   * LEFT order.
   */
  getTravellableNeighbors(pos: Coordinate): Coordinate[] {
    const [x, y] = pos;
    const mask = this.get(x, y);
    const neighbors: Coordinate[] = [];
    for (const direction of DIRECTIONS) {
      if (!hasPassage(mask, direction)) continue;
      const next = travel(direction, x, y);
      if (this.inBounds(next[0], next[1])) neighbors.push(next);
    }
    return neighbors;
  }

  /**
   * Number of undirected passages. Each symmetric passage sets two bits, so
   * this counts the RIGHT and DOWN bits whose neighbour exists.
   */
  passageCount(): number {
    let count = 0;
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const mask = this.#cells[y * this.width + x];
        if (x + 1 < this.width && hasPassage(mask, Direction.RIGHT)) count++;
        if (y + 1 < this.height && hasPassage(mask, Direction.DOWN)) count++;
      }
    }
    return count;
  }

  /** Copy of the row-major masks. */
  cells(): Uint8Array {
    return this.#cells.slice();
  }

  clone(): Maze {
    return new Maze(this.width, this.height, this.#cells);
  }

  /** Same dimensions and identical masks. */
  equals(other: Maze): boolean {
    if (this.width !== other.width || this.height !== other.height) return false;
    for (let i = 0; i < this.#cells.length; i++) {
      if (this.#cells[i] !== other.getIndex(i)) return false;
    }
    return true;
  }

  #assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.#cells.length) {
      throw new OutOfBoundsError(
        `index ${index} is outside the ${this.#cells.length} cells of the maze`
      );
    }
  }
}
