/**
 * @relay/fallback - FallbackExecutor
 *
 * Runs a prompt against a priority-ordered backend list. Quota errors are
 * retried on the same backend, then rotated to the next one, then the whole
 * list is cycled a bounded number of times. Any other failure ends the run.
 */

import pino from 'pino';
import { sleep, errorMessage, requireTimerDelay } from '@relay/core';
import { classifyQuotaError } from './classifier.js';
import { advanceOnQuota, initialState, isFallback, type FallbackLimits, type FallbackState } from './state.js';
import type {
  AttemptEvent,
  AttemptStatus,
  BackendInvoker,
  ErrorClassifier,
  ExecutionFailure,
  ExecutionResult,
  FailureKind,
  FallbackAttempt,
  InvocationOutcome,
  InvocationRequest,
} from './types.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_RETRIES_PER_BACKEND = 3;
export const DEFAULT_MAX_CYCLES = 3;
export const DEFAULT_DEADLINE_MS = 60_000;
export const DEFAULT_RETRY_BACKOFF_MS = 5_000;
export const DEFAULT_CYCLE_BACKOFF_MS = 2_000;

export interface FallbackExecutorOptions {
  /** Backend identifiers, highest priority first. Copied and frozen. */
  backends: readonly string[];
  invoker: BackendInvoker;
  /** Defaults to the substring quota heuristic. */
  classifier?: ErrorClassifier;
  /** Pause before retrying the same backend (default 5 000). */
  retryBackoffMs?: number;
  /** Pause before starting a new cycle (default 2 000). */
  cycleBackoffMs?: number;
  logger?: pino.Logger;
  /** Called before every invocation. */
  onAttempt?: (event: AttemptEvent) => void;
  /** Sink for verbose progress lines (default console.log). */
  write?: (line: string) => void;
}

export interface ExecuteOptions {
  maxRetriesPerBackend?: number;
  maxCycles?: number;
  /** Bound on a single invocation, not on the whole run. */
  deadlineMs?: number;
  /** Emit human-readable progress lines. Does not change the result. */
  verbose?: boolean;
  /** Abandons the run at the next attempt boundary or backoff. */
  signal?: AbortSignal;
}

/** Abort reason handed to the invoker when an attempt runs out of time. */
export class InvocationTimeoutError extends Error {
  constructor(
    public readonly backendId: string,
    public readonly deadlineMs: number,
  ) {
    super(`Backend "${backendId}" timed out after ${deadlineMs}ms`);
    this.name = 'InvocationTimeoutError';
  }
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function seconds(ms: number): string {
  return `${ms / 1000}s`;
}

// ---------------------------------------------------------------------------
// FallbackExecutor
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const executor = new FallbackExecutor({
 *   backends: ['model-a', 'model-b'],
 *   invoker: new CommandInvoker({ command: 'gemini', args: ['--model', '{backend}', '-p', '{prompt}'] }),
 * });
 * const result = await executor.execute('summarise this', { verbose: true });
 * if (!result.success && result.kind === 'exhausted') process.exitCode = 1;
 * ```
 */
export class FallbackExecutor {
  private readonly backends: readonly string[];
  private readonly invoker: BackendInvoker;
  private readonly classifier: ErrorClassifier;
  private readonly retryBackoffMs: number;
  private readonly cycleBackoffMs: number;
  private readonly onAttempt?: (event: AttemptEvent) => void;
  private readonly write: (line: string) => void;
  private readonly log: pino.Logger;

  constructor(options: FallbackExecutorOptions) {
    if (options.backends.length === 0) {
      throw new Error('FallbackExecutor requires at least one backend');
    }
    this.backends = Object.freeze([...options.backends]);
    this.invoker = options.invoker;
    this.classifier = options.classifier ?? classifyQuotaError;
    this.retryBackoffMs = requireTimerDelay('retryBackoffMs', options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS);
    this.cycleBackoffMs = requireTimerDelay('cycleBackoffMs', options.cycleBackoffMs ?? DEFAULT_CYCLE_BACKOFF_MS);
    this.onAttempt = options.onAttempt;
    this.write = options.write ?? ((line) => console.log(line));
    this.log = options.logger ?? pino({ name: 'relay:fallback' });
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * Run `prompt` until a backend succeeds, a non-quota error or timeout
   * occurs, or every backend has used its retries in `maxCycles` cycles.
   */
  async execute(prompt: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const limits: FallbackLimits = {
      backendCount: this.backends.length,
      maxRetriesPerBackend: requirePositiveInteger(
        'maxRetriesPerBackend',
        options.maxRetriesPerBackend ?? DEFAULT_MAX_RETRIES_PER_BACKEND,
      ),
      maxCycles: requirePositiveInteger('maxCycles', options.maxCycles ?? DEFAULT_MAX_CYCLES),
    };
    const deadlineMs = requireTimerDelay('deadlineMs', options.deadlineMs ?? DEFAULT_DEADLINE_MS, 1);
    const verbose = options.verbose ?? false;
    const signal = options.signal;
    const say = (line: string): void => {
      if (verbose) this.write(line);
    };

    const attempts: FallbackAttempt[] = [];
    let state: FallbackState = initialState();

    for (;;) {
      if (signal?.aborted) {
        return this.fail('cancelled', 'cancelled', state, attempts);
      }

      const backendId = this.backendAt(state.index);
      const event: AttemptEvent = {
        backendId,
        index: state.index,
        backendCount: limits.backendCount,
        cycle: state.cycle,
        maxCycles: limits.maxCycles,
        retry: state.retry,
        maxRetriesPerBackend: limits.maxRetriesPerBackend,
      };
      this.onAttempt?.(event);
      say(
        `Attempting backend: ${backendId} ` +
          `(backend ${state.index + 1}/${limits.backendCount}, ` +
          `cycle ${state.cycle + 1}/${limits.maxCycles}, ` +
          `retry ${state.retry + 1}/${limits.maxRetriesPerBackend})`,
      );
      this.log.debug(event, 'Invoking backend');

      const outcome = await this.invokeWithDeadline(backendId, prompt, deadlineMs, signal);
      const record = (status: AttemptStatus): void => {
        attempts.push({
          backendId,
          index: state.index,
          cycle: state.cycle,
          retry: state.retry,
          status,
          ...(status === 'success' ? {} : { error: outcome.error }),
        });
      };

      // --- success -----------------------------------------------------------
      if (outcome.success) {
        record('success');
        const fallbackUsed = isFallback(state);
        say(`Success with backend: ${backendId}`);
        this.log.info({ backendId, fallbackUsed, attempts: attempts.length }, 'Backend succeeded');
        return {
          success: true,
          backendId,
          output: outcome.output,
          fallbackUsed,
          cycles: state.cycle,
          attempts,
        };
      }

      if (signal?.aborted) {
        record(outcome.timedOut ? 'timeout' : 'error');
        return this.fail('cancelled', 'cancelled', state, attempts, outcome);
      }

      // --- timeout -----------------------------------------------------------
      // Ends the whole run, unretried, to keep the established behaviour.
      // Whether a timeout should rotate like a quota error is still open.
      if (outcome.timedOut) {
        record('timeout');
        say(`Timeout on ${backendId} after ${seconds(deadlineMs)}`);
        this.log.warn({ backendId, deadlineMs }, 'Backend timed out -- stopping');
        return this.fail('timeout', 'timeout', state, attempts, outcome);
      }

      // --- non-quota error ---------------------------------------------------
      if (this.classifier(outcome.error, outcome) !== 'quota') {
        record('error');
        say(`Non-quota error with ${backendId}`);
        this.log.error(
          { backendId, statusCode: outcome.statusCode, error: outcome.error },
          'Non-quota error -- stopping',
        );
        return this.fail(
          'backend_error',
          `non-quota error on backend ${backendId}: ${outcome.error}`,
          state,
          attempts,
          outcome,
        );
      }

      // --- quota error -------------------------------------------------------
      record('quota');
      say(`Quota error with ${backendId}`);
      this.log.warn({ backendId, retry: state.retry, cycle: state.cycle }, 'Quota error');

      const decision = advanceOnQuota(state, limits);
      state = decision.state;

      switch (decision.action) {
        case 'retry':
          say(`Retrying ${backendId} in ${seconds(this.retryBackoffMs)}...`);
          await sleep(this.retryBackoffMs, signal);
          break;

        case 'rotate': {
          const next = this.backendAt(state.index);
          say(`Max retries reached for ${backendId}; switching to ${next}`);
          this.log.info({ from: backendId, to: next }, 'Rotating to next backend');
          break;
        }

        case 'cycle': {
          const first = this.backendAt(0);
          say(`Cycling back to ${first} (cycle ${state.cycle + 1}/${limits.maxCycles})`);
          this.log.info({ cycle: state.cycle }, 'Backend list exhausted -- starting new cycle');
          await sleep(this.cycleBackoffMs, signal);
          break;
        }

        case 'exhausted':
          say(`All backends exhausted after ${limits.maxCycles} cycles`);
          this.log.error(
            { cycles: limits.maxCycles, attempts: attempts.length },
            'All backends exhausted -- escalating',
          );
          return this.fail(
            'exhausted',
            `all backends exhausted after ${limits.maxCycles} cycles; escalate to caller`,
            state,
            attempts,
            outcome,
          );
      }
    }
  }

  /**
   * Backend identifiers in priority order.
   */
  getBackends(): readonly string[] {
    return this.backends;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private backendAt(index: number): string {
    const backend = this.backends[index];
    if (backend === undefined) {
      throw new Error(`No backend at index ${index}`);
    }
    return backend;
  }

  private fail(
    kind: FailureKind,
    reason: string,
    state: FallbackState,
    attempts: FallbackAttempt[],
    outcome?: InvocationOutcome,
  ): ExecutionFailure {
    return {
      success: false,
      kind,
      reason,
      ...(outcome ? { backendId: this.backendAt(state.index), lastError: outcome.error } : {}),
      cycles: state.cycle,
      attempts,
    };
  }

  /**
   * Race one invocation against its deadline. When the deadline wins the
   * per-attempt signal is aborted so the invoker can kill the call, and a
   * timed-out outcome is returned without waiting for it.
   */
  private async invokeWithDeadline(
    backendId: string,
    prompt: string,
    deadlineMs: number,
    callerSignal?: AbortSignal,
  ): Promise<InvocationOutcome> {
    const controller = new AbortController();
    const onCallerAbort = (): void => controller.abort(callerSignal?.reason);
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<InvocationOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort(new InvocationTimeoutError(backendId, deadlineMs));
        resolve({
          success: false,
          backendId,
          output: '',
          error: `Timeout after ${deadlineMs}ms`,
          statusCode: -1,
          timedOut: true,
        });
      }, deadlineMs);
    });

    try {
      return await Promise.race([
        this.safeInvoke({ backendId, prompt, deadlineMs, signal: controller.signal }),
        deadline,
      ]);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  /** Invoker errors become failed outcomes so they are classified like any other. */
  private async safeInvoke(
    request: InvocationRequest,
  ): Promise<InvocationOutcome> {
    try {
      return await this.invoker.invoke(request);
    } catch (err: unknown) {
      const error = errorMessage(err);
      this.log.warn({ backendId: request.backendId, error }, 'Invoker threw');
      return {
        success: false,
        backendId: request.backendId,
        output: '',
        error,
        statusCode: -1,
        timedOut: false,
      };
    }
  }
}
