/**
 * Run-to-completion drivers.
 *
 * Generators and solvers only expose a single-step primitive. These helpers
 * call it in a loop for callers that want the finished result at once; a
 * paced caller (one step per animation frame, say) simply calls `step` itself.
 */
import { config } from './config';
import Maze from './maze/maze';
import { StepLimitExceededError } from './maze/maze.errors';
import {
  GeneratorKind,
  MazeGenerator,
  createGenerator,
  stepGenerator,
} from './generators/generator';
import { MazeSolver, stepSolver } from './solvers/solver';
import type { SolutionPath } from './solvers/solver.types';
import type { RandomOptions } from './utils/rng';

export interface RunOptions {
  /** Step cap; falls back to `config.maxSteps`, unlimited when both are unset. */
  maxSteps?: number;
}

export interface GenerateMazeOptions extends RandomOptions, RunOptions {
  /** Algorithm to use. Default: 'wilson'. */
  generator?: GeneratorKind;
}

function stepLimit(options: RunOptions): number {
  return options.maxSteps ?? config.maxSteps ?? Infinity;
}

/**
 * Step `generator` until it reports completion.
 *
 * @returns Number of `step` calls made, including the final one.
 * @throws {StepLimitExceededError}
 */
export function runGenerator(
  generator: MazeGenerator,
  maze: Maze,
  options: RunOptions = {}
): number {
  const limit = stepLimit(options);
  let steps = 0;
  while (steps < limit) {
    steps++;
    if (stepGenerator(generator, maze)) return steps;
  }
  throw new StepLimitExceededError(limit);
}

/**
 * Step `solver` until it returns a path or runs out of cells to explore.
 *
 * @returns The path, or `null` when the goal is unreachable.
 * @throws {StepLimitExceededError}
 */
export function runSolver(
  solver: MazeSolver,
  maze: Maze,
  options: RunOptions = {}
): SolutionPath | null {
  const limit = stepLimit(options);
  for (let steps = 0; steps < limit; steps++) {
    const path = stepSolver(solver, maze);
    if (path) return path;
    if (solver.status === 'exhausted') return null;
  }
  throw new StepLimitExceededError(limit);
}

/**
 * Build a complete perfect maze in one call.
 *
 * @example
 * const maze = generateMaze(10, 8, { seed: 'level-1' });
 */
export function generateMaze(
  width: number = config.defaultWidth,
  height: number = config.defaultHeight,
  options: GenerateMazeOptions = {}
): Maze {
  const maze = new Maze(width, height);
  const generator = createGenerator(
    options.generator ?? 'wilson',
    maze.getBounds(),
    options
  );
  runGenerator(generator, maze, options);
  return maze;
}
