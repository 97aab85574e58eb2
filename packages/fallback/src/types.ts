/**
 * @relay/fallback - Shared types
 */

// ---------------------------------------------------------------------------
// Invoker boundary
// ---------------------------------------------------------------------------

/** One call to a backend. */
export interface InvocationRequest {
  backendId: string;
  prompt: string;
  /** Upper bound for this single call, in milliseconds. */
  deadlineMs: number;
  /** Aborted when the deadline passes or the caller cancels. */
  signal: AbortSignal;
}

/** Raw result of one invocation. */
export interface InvocationOutcome {
  success: boolean;
  backendId: string;
  output: string;
  error: string;
  /** Process exit code or HTTP status; -1 when there was none. */
  statusCode: number;
  /** True when the call could not complete within its deadline. */
  timedOut: boolean;
}

/**
 * Executes a prompt against a single backend.
 *
 * Implementations should honour `signal` so a timed-out call can be
 * terminated; the executor enforces the deadline either way.
 */
export interface BackendInvoker {
  invoke(request: InvocationRequest): Promise<InvocationOutcome>;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export type ErrorKind = 'quota' | 'other';

/** Maps a failed outcome to an error kind. */
export type ErrorClassifier = (errorText: string, outcome: InvocationOutcome) => ErrorKind;

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export type AttemptStatus = 'success' | 'quota' | 'error' | 'timeout';

/** Record of a single attempt within an execution. */
export interface FallbackAttempt {
  backendId: string;
  index: number;
  cycle: number;
  retry: number;
  status: AttemptStatus;
  error?: string;
}

export type FailureKind = 'timeout' | 'backend_error' | 'exhausted' | 'cancelled';

export interface ExecutionSuccess {
  success: true;
  backendId: string;
  output: string;
  /** True when the result did not come from the first backend in the first cycle. */
  fallbackUsed: boolean;
  cycles: number;
  attempts: FallbackAttempt[];
}

export interface ExecutionFailure {
  success: false;
  kind: FailureKind;
  reason: string;
  /** Backend of the last attempt, if any attempt was made. */
  backendId?: string;
  lastError?: string;
  cycles: number;
  attempts: FallbackAttempt[];
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

/** Fired before every invocation. */
export interface AttemptEvent {
  backendId: string;
  index: number;
  backendCount: number;
  cycle: number;
  maxCycles: number;
  retry: number;
  maxRetriesPerBackend: number;
}
