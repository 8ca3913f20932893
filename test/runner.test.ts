import { config } from '../src/config';
import Maze from '../src/maze/maze';
import { StepLimitExceededError } from '../src/maze/maze.errors';
import RandomDfsGenerator from '../src/generators/randomDfs';
import { createSolver } from '../src/solvers/solver';
import { generateMaze, runGenerator, runSolver } from '../src/runner';
import { countReachable, createOpenMaze } from './utils/test-helpers';

describe('runner', () => {
  describe('runGenerator()', () => {
    it('counts every step including the final one', () => {
      // Arrange: carve (0,0)->(1,0), pop (1,0), pop (0,0)
      const maze = new Maze(2, 1);
      const generator = new RandomDfsGenerator(maze.getBounds(), { rng: () => 0 });
      // Act
      const steps = runGenerator(generator, maze);
      // Assert
      expect(steps).toBe(3);
    });

    it('throws once maxSteps is spent', () => {
      // Arrange
      const maze = new Maze(2, 1);
      const generator = new RandomDfsGenerator(maze.getBounds(), { rng: () => 0 });
      // Act & Assert
      expect(() => runGenerator(generator, maze, { maxSteps: 2 })).toThrow(
        StepLimitExceededError
      );
    });

    it('finishes when maxSteps is exactly enough', () => {
      // Arrange
      const maze = new Maze(2, 1);
      const generator = new RandomDfsGenerator(maze.getBounds(), { rng: () => 0 });
      // Act
      const steps = runGenerator(generator, maze, { maxSteps: 3 });
      // Assert
      expect(steps).toBe(3);
    });
  });

  describe('runSolver()', () => {
    it('returns the route of a solvable maze', () => {
      // Arrange
      const maze = createOpenMaze(2, 1);
      // Act
      const path = runSolver(createSolver('bfs', maze.getBounds()), maze);
      // Assert
      expect(path).toEqual([
        [0, 0],
        [1, 0],
      ]);
    });

    it('throws with the limit in the message', () => {
      // Arrange
      const maze = createOpenMaze(2, 1);
      const solver = createSolver('a-star', maze.getBounds());
      // Act & Assert
      expect(() => runSolver(solver, maze, { maxSteps: 1 })).toThrow(
        'Step limit of 1 exceeded before completion'
      );
    });

    it('falls back to config.maxSteps', () => {
      // Arrange
      config.maxSteps = 1;
      const maze = createOpenMaze(2, 1);
      const solver = createSolver('dfs', maze.getBounds());
      // Act
      let caught: unknown;
      try {
        runSolver(solver, maze);
      } catch (err) {
        caught = err;
      }
      // Assert
      expect(
        caught instanceof StepLimitExceededError ? caught.maxSteps : caught
      ).toBe(1);
    });

    it('prefers the per-call limit over config.maxSteps', () => {
      // Arrange
      config.maxSteps = 1;
      const maze = createOpenMaze(2, 1);
      // Act
      const path = runSolver(createSolver('dfs', maze.getBounds()), maze, {
        maxSteps: 2,
      });
      // Assert
      expect(path).toHaveLength(2);
    });
  });

  describe('generateMaze()', () => {
    it('uses the configured default size', () => {
      // Act
      const maze = generateMaze(undefined, undefined, { seed: 'defaults' });
      // Assert
      expect(maze.getBounds()).toEqual({ width: 24, height: 24 });
    });

    it('follows config changes to the default size', () => {
      // Arrange
      config.defaultWidth = 5;
      config.defaultHeight = 3;
      // Act
      const maze = generateMaze();
      // Assert
      expect(maze.getBounds()).toEqual({ width: 5, height: 3 });
    });

    it.each([['wilson'], ['random-dfs']] as const)(
      'builds a perfect maze with the %s generator',
      (generator) => {
        // Act
        const maze = generateMaze(7, 6, { generator, seed: 'perfect' });
        // Assert
        expect([maze.passageCount(), countReachable(maze)]).toEqual([41, 42]);
      }
    );

    it('is reproducible from a seed', () => {
      // Act
      const a = generateMaze(8, 8, { seed: 'repeat' });
      const b = generateMaze(8, 8, { seed: 'repeat' });
      // Assert
      expect(a.equals(b)).toBe(true);
    });

    it('honours maxSteps', () => {
      expect(() => generateMaze(10, 10, { seed: 'cap', maxSteps: 1 })).toThrow(
        StepLimitExceededError
      );
    });
  });
});
