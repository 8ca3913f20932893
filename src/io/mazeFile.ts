/**
 * On-disk persistence for mazes and solution traces.
 *
 * Thin wrappers over `fs-extra` that move the binary formats of
 * `maze.codec` and `solutionTrace` to and from files. The engine itself never
 * touches the filesystem; this module is the plumbing a CLI or tool uses.
 */
import fs from 'fs-extra';
import type Maze from '../maze/maze';
import { decodeMaze, encodeMaze } from '../maze/maze.codec';
import type { Coordinate } from '../maze/direction';
import type { SolutionPath } from '../solvers/solver.types';
import {
  decodeSolutionTrace,
  encodeSolutionTrace,
} from '../trace/solutionTrace';

/** File name used when a caller saves a maze without choosing one. */
export const DEFAULT_MAZE_FILE = 'maze.dat';

/** Write `maze` in the binary maze format, creating parent directories. */
export async function saveMaze(
  maze: Maze,
  file: string = DEFAULT_MAZE_FILE
): Promise<void> {
  await fs.outputFile(file, encodeMaze(maze));
}

/**
 * Read a maze saved by {@link saveMaze}.
 *
 * @throws {MalformedEncodingError} when the file content is not a valid maze.
 */
export async function loadMaze(file: string = DEFAULT_MAZE_FILE): Promise<Maze> {
  const bytes = await fs.readFile(file);
  return decodeMaze(new Uint8Array(bytes));
}

/** Write the `U/D/L/R` trace of `path`, creating parent directories. */
export async function saveSolutionTrace(
  file: string,
  path: SolutionPath
): Promise<void> {
  await fs.outputFile(file, encodeSolutionTrace(path));
}

/** Read a trace saved by {@link saveSolutionTrace} back into a path from `(0,0)`. */
export async function loadSolutionTrace(file: string): Promise<Coordinate[]> {
  const bytes = await fs.readFile(file);
  return decodeSolutionTrace(new Uint8Array(bytes));
}
