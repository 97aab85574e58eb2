/**
 * @relay/fallback - Quota error classification
 *
 * Decides from raw error text whether a failure was caused by a usage
 * limit. Matching is case-insensitive substring search.
 */

import type { ErrorClassifier } from './types.js';

export const DEFAULT_QUOTA_INDICATORS: readonly string[] = [
  'quota',
  'quota exceeded',
  'limit',
  '429',
  'rate limit',
];

/**
 * True when the lowercased `errorText` contains any indicator.
 */
export function isQuotaError(
  errorText: string,
  indicators: readonly string[] = DEFAULT_QUOTA_INDICATORS,
): boolean {
  const lower = errorText.toLowerCase();
  return indicators.some((indicator) => lower.includes(indicator.toLowerCase()));
}

/**
 * Build a classifier from a list of indicators (e.g. from relay.json).
 */
export function createQuotaClassifier(
  indicators: readonly string[] = DEFAULT_QUOTA_INDICATORS,
): ErrorClassifier {
  const normalised = indicators.map((indicator) => indicator.toLowerCase());
  return (errorText) => (isQuotaError(errorText, normalised) ? 'quota' : 'other');
}

export const classifyQuotaError: ErrorClassifier = createQuotaClassifier();
