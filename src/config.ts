/**
 * Global maze-engine configuration contract & default instance.
 *
 * A central `config` object gives callers (and tests) one documented place to
 * tweak engine behaviour without threading options through every call.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from './config';
 *   config.warnings = true;   // enable runtime guidance on stderr
 *   config.maxSteps = 10_000; // cap run-to-completion loops
 *
 * Adjust BEFORE creating mazes, generators or solvers so every component reads
 * the intended values.
 *
 * DESIGN NOTES
 * ------------
 * - Plain serializable object: no setters, no proxies.
 * - Flags default to silent, unlimited behaviour.
 */
export interface MazeEngineConfig {
  /**
   * Emit one-time guidance warnings (asymmetric `open` / `close` use, etc.) to
   * `console.warn`.
   * Default: false
   */
  warnings: boolean;

  /** Width used by `generateMaze` when none is given. Default: 24 */
  defaultWidth: number;

  /** Height used by `generateMaze` when none is given. Default: 24 */
  defaultHeight: number;

  /**
   * Default upper bound on `step` calls made by `runGenerator` / `runSolver`.
   * `undefined` = unlimited. A per-call `maxSteps` option takes precedence.
   */
  maxSteps?: number;
}

/**
 * Singleton mutable configuration object consumed throughout the engine.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: MazeEngineConfig = {
  warnings: false, // runtime guidance
  defaultWidth: 24,
  defaultHeight: 24,
  // maxSteps: 1_000_000, // example safety cap for run-to-completion drivers
};
