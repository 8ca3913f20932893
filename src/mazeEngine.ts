/**
 * Public surface of the maze engine.
 *
 * @example
 * import { generateMaze, createSolver, runSolver, encodeMaze } from 'maze-engine';
 *
 * const maze = generateMaze(24, 24, { seed: 'daily' });
 * const path = runSolver(createSolver('a-star', maze.getBounds()), maze);
 * const bytes = encodeMaze(maze);
 */
export { config } from './config';
export type { MazeEngineConfig } from './config';

export { default as Maze, MAX_WIDTH } from './maze/maze';
export type { MazeBounds, Neighbor } from './maze/maze';
export {
  ALL_PASSAGES,
  DIRECTIONS,
  Direction,
  between,
  stepDirection,
  fromTraceLetter,
  hasPassage,
  opposite,
  toTraceLetter,
  travel,
} from './maze/direction';
export type { Coordinate, TraceLetter } from './maze/direction';
export {
  HEADER_BYTES,
  decodeMaze,
  encodeMaze,
  tryDecodeMaze,
} from './maze/maze.codec';
export type { DecodeResult } from './maze/maze.codec';
export {
  InvalidDimensionsError,
  MalformedEncodingError,
  MazeError,
  OutOfBoundsError,
  StepLimitExceededError,
} from './maze/maze.errors';
export type { MazeErrorKind } from './maze/maze.errors';

export { default as WilsonGenerator } from './generators/wilson';
export { default as RandomDfsGenerator } from './generators/randomDfs';
export {
  GENERATOR_KINDS,
  createGenerator,
  isGeneratorKind,
  stepGenerator,
} from './generators/generator';
export type { GeneratorKind, MazeGenerator } from './generators/generator';

export { default as DfsSolver } from './solvers/dfs';
export { default as BfsSolver } from './solvers/bfs';
export { default as AStarSolver, manhattan } from './solvers/astar';
export type { CellInformation } from './solvers/astar';
export {
  SOLVER_KINDS,
  createSolver,
  isSolverKind,
  stepSolver,
} from './solvers/solver';
export type { MazeSolver, SolverKind } from './solvers/solver';
export type { SolutionPath, SolverStatus } from './solvers/solver.types';

export { generateMaze, runGenerator, runSolver } from './runner';
export type { GenerateMazeOptions, RunOptions } from './runner';

export {
  decodeSolutionTrace,
  encodeSolutionTrace,
} from './trace/solutionTrace';

export {
  DEFAULT_MAZE_FILE,
  loadMaze,
  loadSolutionTrace,
  saveMaze,
  saveSolutionTrace,
} from './io/mazeFile';

export type { RandomOptions, RandomSource } from './utils/rng';
export { onceWarn, resetWarnings, warn } from './utils/warnings';
