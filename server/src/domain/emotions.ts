import keywordData from '../data/emotion-keywords.json' with { type: 'json' };
import { DEFAULT_EMOTIONAL_STATE } from '../config/ai-constants.js';
import { EMOTIONAL_STATES, type EmotionalState } from './types.js';

/**
 * Keyword -> state lookup. Each state lists English tokens and Russian stems;
 * a keyword belongs to exactly one state.
 */
export const EMOTION_KEYWORDS: Readonly<Record<EmotionalState, readonly string[]>> = keywordData;

const KEYWORD_TABLE: ReadonlyArray<readonly [string, EmotionalState]> = EMOTIONAL_STATES.flatMap(
  (state) => EMOTION_KEYWORDS[state].map((keyword) => [keyword.toLowerCase(), state] as const)
);

/**
 * Russian names shown to parents
 */
export const EMOTION_NAMES: Readonly<Record<EmotionalState, string>> = {
  angry: 'злость',
  frustrated: 'раздражение',
  sad: 'грусть',
  anxious: 'тревога',
  defensive: 'защищённость',
  overwhelmed: 'перегруженность',
  disconnected: 'отчуждение',
  confused: 'растерянность',
};

/**
 * Finds every state whose keyword occurs in the text, ordered by where it first shows up.
 *
 * Keywords match as plain substrings, so a keyword embedded in an unrelated longer
 * word counts too ("sad" inside "crusade"). Model output mixes languages and word
 * forms, and stems are what make the Russian side work at all.
 */
export function detectEmotionalStates(text: string): EmotionalState[] {
  const haystack = text.toLowerCase();
  const firstSeen = new Map<EmotionalState, number>();

  for (const [keyword, state] of KEYWORD_TABLE) {
    const index = haystack.indexOf(keyword);
    if (index === -1) continue;

    const previous = firstSeen.get(state);
    if (previous === undefined || index < previous) {
      firstSeen.set(state, index);
    }
  }

  if (firstSeen.size === 0) {
    return [DEFAULT_EMOTIONAL_STATE];
  }

  return [...firstSeen.entries()]
    .sort((a, b) => a[1] - b[1])
    .map(([state]) => state);
}
