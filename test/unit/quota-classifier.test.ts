/**
 * Unit Tests for quota error classification
 */
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_QUOTA_INDICATORS,
  classifyQuotaError,
  createQuotaClassifier,
  isQuotaError,
} from '@relay/fallback';
import type { InvocationOutcome } from '@relay/fallback';

function outcome(error: string): InvocationOutcome {
  return { success: false, backendId: 'alpha', output: '', error, statusCode: 1, timedOut: false };
}

describe('isQuotaError', () => {
  const quotaTexts = [
    'quota',
    'Quota exceeded for quota metric',
    'QUOTA EXCEEDED',
    'Error 429: Too Many Requests',
    'Rate Limit reached, try again later',
    'daily LIMIT hit',
    'RESOURCE_EXHAUSTED: rateLimitExceeded',
  ];

  const otherTexts = [
    '',
    'Invalid API key',
    'permission denied',
    'Timeout after 60000ms',
    'spawn gemini ENOENT',
    'Error 500: internal server error',
    'model not found: 42',
  ];

  for (const text of quotaTexts) {
    it(`classifies "${text}" as quota`, () => {
      expect(isQuotaError(text)).toBe(true);
      expect(classifyQuotaError(text, outcome(text))).toBe('quota');
    });
  }

  for (const text of otherTexts) {
    it(`classifies "${text}" as other`, () => {
      expect(isQuotaError(text)).toBe(false);
      expect(classifyQuotaError(text, outcome(text))).toBe('other');
    });
  }

  it('finds indicators embedded in longer text', () => {
    expect(isQuotaError('request failed (status=429) after retry')).toBe(true);
  });

  it('ships the default indicator list', () => {
    expect(DEFAULT_QUOTA_INDICATORS).toEqual(['quota', 'quota exceeded', 'limit', '429', 'rate limit']);
  });
});

describe('createQuotaClassifier', () => {
  it('uses only the given indicators', () => {
    const classify = createQuotaClassifier(['RESOURCE_EXHAUSTED']);

    expect(classify('resource_exhausted', outcome('resource_exhausted'))).toBe('quota');
    expect(classify('429 Too Many Requests', outcome('429 Too Many Requests'))).toBe('other');
  });

  it('classifies everything as other with no indicators', () => {
    const classify = createQuotaClassifier([]);
    expect(classify('quota exceeded', outcome('quota exceeded'))).toBe('other');
  });
});
