import type { HandlerResponse } from '@keystroke/core';

import type { ListItem } from './items.js';

/**
 * One result row in the host's script-filter JSON.
 */
export interface FeedbackItem {
  uid?: string;
  title: string;
  subtitle: string;
  arg?: string;
  valid: boolean;
  text?: { copy: string };
}

/**
 * Script-filter JSON printed on stdout.
 *
 * `rerun` (seconds) asks the host to run the filter again with the same query.
 */
export interface Feedback {
  rerun?: number;
  items: FeedbackItem[];
}

/** Range the host accepts for `rerun`, in seconds. */
const MIN_RERUN_SECONDS = 0.1;
const MAX_RERUN_SECONDS = 5;

export function toRerunSeconds(delayMs: number): number {
  const seconds = delayMs / 1000;
  return Math.min(MAX_RERUN_SECONDS, Math.max(MIN_RERUN_SECONDS, seconds));
}

export function toFeedback(response: HandlerResponse<ListItem>, options: { rerunDelayMs: number }): Feedback {
  const feedback: Feedback = { items: [] };
  if (response.rerun) feedback.rerun = toRerunSeconds(options.rerunDelayMs);

  if (response.status === 'empty') {
    feedback.items.push({
      title: 'Loading lists…',
      subtitle: 'Results will refresh momentarily',
      valid: false,
    });
    return feedback;
  }

  if (response.items.length === 0) {
    feedback.items.push({
      title: 'No matching lists',
      subtitle: 'Try a different query.',
      valid: false,
    });
    return feedback;
  }

  for (const item of response.items) {
    feedback.items.push({
      uid: item.id,
      title: item.name,
      subtitle: `${item.account} > ${item.name}`,
      arg: item.id,
      valid: true,
      text: { copy: item.name },
    });
  }
  return feedback;
}
