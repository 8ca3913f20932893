import seedrandom from 'seedrandom';

/** Uniform random source returning values in `[0, 1)`. */
export type RandomSource = () => number;

/** Randomness options accepted by every generator. */
export interface RandomOptions {
  /** Explicit random source. Takes precedence over `seed`. */
  rng?: RandomSource;
  /** Seed for a deterministic `seedrandom` stream. */
  seed?: string;
}

/**
 * Resolve the random source described by `opts`: an injected `rng`, a seeded
 * `seedrandom` stream, or `Math.random`.
 */
export function resolveRandom(opts: RandomOptions = {}): RandomSource {
  if (opts.rng) return opts.rng;
  if (opts.seed !== undefined) {
    const prng = seedrandom(opts.seed);
    return () => prng();
  }
  return Math.random;
}

/** Uniform integer in `[0, n)`. */
export function randomIndex(rng: RandomSource, n: number): number {
  // Clamp guards a custom rng that returns exactly 1.
  return Math.min(n - 1, Math.floor(rng() * n));
}

/** Uniformly chosen element of a non-empty array. */
export function pick<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError('Cannot pick from an empty list');
  return items[randomIndex(rng, items.length)];
}
