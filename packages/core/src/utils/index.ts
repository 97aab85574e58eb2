/**
 * @relay/core - Common utilities
 *
 * Shared helper functions used across the relay packages.
 */

// ---------------------------------------------------------------------------
// Async helpers
// ---------------------------------------------------------------------------

/** Longest delay setTimeout honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Check that `value` is an integer delay setTimeout can wait for.
 * Throws RangeError otherwise.
 */
export function requireTimerDelay(name: string, value: number, minimum = 0): number {
  if (!Number.isInteger(value) || value < minimum || value > MAX_TIMER_DELAY_MS) {
    throw new RangeError(
      `${name} must be an integer between ${minimum} and ${MAX_TIMER_DELAY_MS}, got ${value}`,
    );
  }
  return value;
}

/**
 * Sleep for a given number of milliseconds.
 *
 * Resolves early (never rejects) when `signal` aborts, so callers check
 * `signal.aborted` afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ---------------------------------------------------------------------------
// String helpers
// ---------------------------------------------------------------------------

/**
 * Truncate a string to a maximum length, appending an ellipsis if truncated.
 */
export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) return str;
  if (maxLength <= suffix.length) return suffix.slice(0, maxLength);
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Object helpers
// ---------------------------------------------------------------------------

/**
 * Check if a value is a non-null object (not an array).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
