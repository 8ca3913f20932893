import type Maze from '../maze/maze';
import type { MazeBounds } from '../maze/maze';
import AStarSolver from './astar';
import BfsSolver from './bfs';
import DfsSolver from './dfs';
import type { SolutionPath } from './solver.types';

/** Every path-finding strategy the engine ships. */
export type MazeSolver = DfsSolver | BfsSolver | AStarSolver;

/** Discriminant of {@link MazeSolver}. */
export type SolverKind = MazeSolver['kind'];

export const SOLVER_KINDS: readonly SolverKind[] = ['dfs', 'bfs', 'a-star'];

/**
 * Construct a solver of the given kind. Every solver starts at `(0,0)` and
 * targets `(width-1, height-1)`.
 */
export function createSolver(kind: SolverKind, bounds: MazeBounds): MazeSolver {
  switch (kind) {
    case 'dfs':
      return new DfsSolver(bounds);
    case 'bfs':
      return new BfsSolver(bounds);
    case 'a-star':
      return new AStarSolver(bounds);
  }
}

/**
 * Advance `solver` by one step over `maze`.
 *
 * @returns The finished path, or `null` while pending (or exhausted).
 */
export function stepSolver(solver: MazeSolver, maze: Maze): SolutionPath | null {
  switch (solver.kind) {
    case 'dfs':
      return solver.step(maze);
    case 'bfs':
      return solver.step(maze);
    case 'a-star':
      return solver.step(maze);
  }
}

/** Whether `value` names a solver kind (for parsing user input). */
export function isSolverKind(value: string): value is SolverKind {
  return SOLVER_KINDS.some((kind) => kind === value);
}
