/**
 * @relay/fallback - Escalation notice
 *
 * Text shown to the upstream agent or user when a run ends without an answer
 * and the task has to be taken over by other means: every backend exhausted
 * its quota, or one backend failed with a non-quota error.
 */

import { truncate } from '@relay/core';

export type HandoffCause = 'exhausted' | 'backend_error';

export interface HandoffNoticeInput {
  /** Default 'exhausted'. */
  cause?: HandoffCause;
  backends: readonly string[];
  /** Backend of the final attempt. */
  lastBackend: string;
  cycles: number;
  maxRetriesPerBackend: number;
  lastError: string;
  now?: Date;
}

const RULE = '='.repeat(60);

/** Quotas are assumed to reset once a day at midnight local time. */
export function hoursUntilReset(now: Date): number {
  return 24 - now.getHours();
}

export function formatHandoffNotice(input: HandoffNoticeInput): string {
  const now = input.now ?? new Date();
  const exhausted = (input.cause ?? 'exhausted') === 'exhausted';

  const summary = exhausted
    ? `All backends have been exhausted after ${input.cycles} cycle(s).`
    : `Backend ${input.lastBackend} failed with an error that is not quota related.`;
  const recommendations = exhausted
    ? [
        '  1. Check the API key quota with the provider',
        '  2. Wait for the daily quota reset',
        '  3. Upgrade to a plan with higher limits',
        '  4. Hand this task to the calling agent',
      ]
    : [
        '  1. Check the backend command, model name and credentials',
        '  2. Hand this task to the calling agent',
      ];

  return [
    RULE,
    'MODEL FALLBACK - ESCALATION REQUIRED',
    RULE,
    '',
    summary,
    '',
    'Current status:',
    `  - Last attempted backend: ${input.lastBackend}`,
    `  - Total backends tried: ${input.backends.length}`,
    `  - Retry attempts per backend: ${input.maxRetriesPerBackend}`,
    `  - Last error: ${truncate(input.lastError.trim(), 150)}`,
    '',
    'Recommendations:',
    ...recommendations,
    ...(exhausted ? ['', `Time until reset: approximately ${hoursUntilReset(now)} hours`] : []),
    '',
    'Fallback terminating. The caller should handle this task.',
  ].join('\n');
}
