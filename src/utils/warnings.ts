import { config } from '../config';

// One-time warning utility keyed by message family.
const seen = new Set<string>();

/**
 * Emit `message` once per `key` for the lifetime of the process, and only while
 * `config.warnings` is enabled.
 *
 * @returns true when the warning was written.
 */
export function onceWarn(key: string, message: string): boolean {
  if (!config.warnings || seen.has(key)) return false;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
  return true;
}

/** Forget emitted keys (test isolation). */
export function resetWarnings(): void {
  seen.clear();
}
