import { config } from '../config';

// Keys already reported by onceWarn (reset between tests via resetWarnings).
const seen = new Set<string>();

/** Emit a warning when `config.warnings` is enabled. */
export function warn(message: string): void {
  if (!config.warnings) return;
  // eslint-disable-next-line no-console
  console.warn(message);
}

/**
 * One-time warning keyed by `key`. A key only counts as reported once a
 * warning was actually emitted, so enabling `config.warnings` later still
 * surfaces it.
 */
export function onceWarn(key: string, message: string): void {
  if (seen.has(key) || !config.warnings) return;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
}

/** Forget every key reported by {@link onceWarn}. */
export function resetWarnings(): void {
  seen.clear();
}
