/**
 * @relay/core - Core package for model-relay
 *
 * Re-exports configuration and shared utilities.
 */

// Configuration
export * from './config/index.js';

// Utilities
export {
  sleep,
  truncate,
  isPlainObject,
  errorMessage,
  requireTimerDelay,
  MAX_TIMER_DELAY_MS,
} from './utils/index.js';
