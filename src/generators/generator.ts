import type Maze from '../maze/maze';
import type { MazeBounds } from '../maze/maze';
import type { RandomOptions } from '../utils/rng';
import RandomDfsGenerator from './randomDfs';
import WilsonGenerator from './wilson';

/** Every maze generator the engine ships. */
export type MazeGenerator = WilsonGenerator | RandomDfsGenerator;

/** Discriminant of {@link MazeGenerator}. */
export type GeneratorKind = MazeGenerator['kind'];

export const GENERATOR_KINDS: readonly GeneratorKind[] = ['wilson', 'random-dfs'];

/** Construct a generator of the given kind for a maze of `bounds`. */
export function createGenerator(
  kind: GeneratorKind,
  bounds: MazeBounds,
  options: RandomOptions = {}
): MazeGenerator {
  switch (kind) {
    case 'wilson':
      return new WilsonGenerator(bounds, options);
    case 'random-dfs':
      return new RandomDfsGenerator(bounds, options);
  }
}

/** Advance `generator` by one step on `maze`; `true` once generation is done. */
export function stepGenerator(generator: MazeGenerator, maze: Maze): boolean {
  switch (generator.kind) {
    case 'wilson':
      return generator.step(maze);
    case 'random-dfs':
      return generator.step(maze);
  }
}

/** Whether `value` names a generator kind (for parsing user input). */
export function isGeneratorKind(value: string): value is GeneratorKind {
  return GENERATOR_KINDS.some((kind) => kind === value);
}
