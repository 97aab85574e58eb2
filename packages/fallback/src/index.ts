/**
 * @relay/fallback - Model fallback execution
 *
 * Priority-ordered backend fallback with:
 *   - Per-backend retries, rotation and bounded cycling on quota errors
 *   - A pluggable quota classifier
 *   - Per-attempt deadlines and cancellation
 *   - The escalation notice printed on exhaustion
 *
 * @packageDocumentation
 */

// Executor - core state machine
export {
  FallbackExecutor,
  InvocationTimeoutError,
  DEFAULT_MAX_RETRIES_PER_BACKEND,
  DEFAULT_MAX_CYCLES,
  DEFAULT_DEADLINE_MS,
  DEFAULT_RETRY_BACKOFF_MS,
  DEFAULT_CYCLE_BACKOFF_MS,
  type FallbackExecutorOptions,
  type ExecuteOptions,
} from './executor.js';

// State - pure transitions
export {
  advanceOnQuota,
  initialState,
  isFallback,
  type FallbackState,
  type FallbackLimits,
  type QuotaDecision,
} from './state.js';

// Classifier
export {
  DEFAULT_QUOTA_INDICATORS,
  isQuotaError,
  createQuotaClassifier,
  classifyQuotaError,
} from './classifier.js';

// Escalation
export {
  formatHandoffNotice,
  hoursUntilReset,
  type HandoffCause,
  type HandoffNoticeInput,
} from './handoff.js';

export type {
  AttemptEvent,
  AttemptStatus,
  BackendInvoker,
  ErrorClassifier,
  ErrorKind,
  ExecutionFailure,
  ExecutionResult,
  ExecutionSuccess,
  FailureKind,
  FallbackAttempt,
  InvocationOutcome,
  InvocationRequest,
} from './types.js';
