/**
 * @relay/fallback - Fallback state transitions
 *
 * Pure functions over the per-execution counters. Every `execute` call
 * starts from `initialState()` and owns its state exclusively.
 */

export interface FallbackState {
  /** Position in the backend list. */
  readonly index: number;
  /** Attempts against `index` since it was selected or reset. */
  readonly retry: number;
  /** Number of completed passes over the backend list. */
  readonly cycle: number;
}

export interface FallbackLimits {
  backendCount: number;
  maxRetriesPerBackend: number;
  maxCycles: number;
}

/**
 * What to do after a quota error.
 *
 * - `retry`: same backend again after the retry backoff
 * - `rotate`: next backend, immediately
 * - `cycle`: back to the first backend after the cycle backoff
 * - `exhausted`: the whole budget is spent
 */
export type QuotaDecision =
  | { action: 'retry'; state: FallbackState }
  | { action: 'rotate'; state: FallbackState }
  | { action: 'cycle'; state: FallbackState }
  | { action: 'exhausted'; state: FallbackState };

export function initialState(): FallbackState {
  return { index: 0, retry: 0, cycle: 0 };
}

export function advanceOnQuota(state: FallbackState, limits: FallbackLimits): QuotaDecision {
  const retry = state.retry + 1;

  if (retry < limits.maxRetriesPerBackend) {
    return { action: 'retry', state: { ...state, retry } };
  }

  if (state.index < limits.backendCount - 1) {
    return { action: 'rotate', state: { index: state.index + 1, retry: 0, cycle: state.cycle } };
  }

  const cycle = state.cycle + 1;
  if (cycle >= limits.maxCycles) {
    return { action: 'exhausted', state: { index: state.index, retry: 0, cycle } };
  }

  return { action: 'cycle', state: { index: 0, retry: 0, cycle } };
}

/** Whether a success in `state` came from anything but the primary backend's first window. */
export function isFallback(state: FallbackState): boolean {
  return state.cycle > 0 || state.index > 0;
}
