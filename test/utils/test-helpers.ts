import Maze from '../../src/maze/maze';
import {
  ALL_PASSAGES,
  Coordinate,
  Direction,
  between,
  hasPassage,
} from '../../src/maze/direction';

/**
 * Maze with every in-bounds passage open (border sides stay closed so the
 * masks are symmetric).
 */
export function createOpenMaze(width: number, height: number): Maze {
  const maze = new Maze(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x + 1 < width; x++) maze.carve(x, y, Direction.RIGHT);
  }
  for (let y = 0; y + 1 < height; y++) {
    for (let x = 0; x < width; x++) maze.carve(x, y, Direction.DOWN);
  }
  return maze;
}

/** Maze whose every cell mask is `0b1111`, border sides included. */
export function createFullMaskMaze(width: number, height: number): Maze {
  return new Maze(width, height, new Uint8Array(width * height).fill(ALL_PASSAGES));
}

/** Number of cells reachable from `(0,0)` through open passages. */
export function countReachable(maze: Maze): number {
  const seen = new Set<number>([0]);
  const queue: Coordinate[] = [[0, 0]];
  while (queue.length > 0) {
    const pos = queue.shift();
    if (!pos) break;
    for (const next of maze.getTravellableNeighbors(pos)) {
      const key = maze.xyToIndex(next[0], next[1]);
      if (seen.has(key)) continue;
      seen.add(key);
      queue.push(next);
    }
  }
  return seen.size;
}

/** Whether every passage bit has its mirror bit on the neighbouring cell. */
export function isSymmetric(maze: Maze): boolean {
  for (let y = 0; y < maze.height; y++) {
    for (let x = 0; x < maze.width; x++) {
      for (const neighbor of maze.getNeighbors([x, y])) {
        const here = hasPassage(maze.get(x, y), neighbor.direction);
        const back = hasPassage(
          maze.get(neighbor.x, neighbor.y),
          between([neighbor.x, neighbor.y], [x, y])
        );
        if (here !== back) return false;
      }
    }
  }
  return true;
}

/**
 * Whether `path` runs from `(0,0)` to the far corner, each move crossing an
 * open passage.
 */
export function isValidRoute(maze: Maze, path: readonly Coordinate[]): boolean {
  if (path.length === 0) return false;
  const [sx, sy] = path[0];
  const [ex, ey] = path[path.length - 1];
  if (sx !== 0 || sy !== 0 || ex !== maze.width - 1 || ey !== maze.height - 1) {
    return false;
  }
  for (let i = 0; i + 1 < path.length; i++) {
    const open = maze.getTravellableNeighbors(path[i]);
    const [nx, ny] = path[i + 1];
    if (!open.some(([x, y]) => x === nx && y === ny)) return false;
  }
  return true;
}
