/**
 * AI analysis constants
 * Section headers, confidence levels and fallback values for model responses
 */

import type { EmotionalState } from '../domain/types.js';

export type SectionKey =
  | 'emotionalState'
  | 'trueMeaning'
  | 'childNeeds'
  | 'suggestedResponses'
  | 'whatToAvoid'
  | 'safetyNotice';

/**
 * Header strings the model is asked to emit, matched against the upper-cased line.
 * Russian labels are what the prompt requests; English ones cover models that answer in English.
 */
export const SECTION_HEADERS: ReadonlyArray<{ header: string; key: SectionKey }> = [
  { header: 'ЭМОЦИОНАЛЬНОЕ СОСТОЯНИЕ:', key: 'emotionalState' },
  { header: 'EMOTIONAL_STATE:', key: 'emotionalState' },
  { header: 'EMOTIONAL STATE:', key: 'emotionalState' },
  { header: 'ИСТИННЫЙ СМЫСЛ:', key: 'trueMeaning' },
  { header: 'TRUE_MEANING:', key: 'trueMeaning' },
  { header: 'TRUE MEANING:', key: 'trueMeaning' },
  { header: 'ПОТРЕБНОСТЬ РЕБЁНКА:', key: 'childNeeds' },
  { header: 'ПОТРЕБНОСТЬ РЕБЕНКА:', key: 'childNeeds' },
  { header: 'CHILD_NEEDS:', key: 'childNeeds' },
  { header: 'CHILD NEEDS:', key: 'childNeeds' },
  { header: 'ВАРИАНТЫ ОТВЕТА:', key: 'suggestedResponses' },
  { header: 'SUGGESTED_RESPONSES:', key: 'suggestedResponses' },
  { header: 'SUGGESTED RESPONSES:', key: 'suggestedResponses' },
  { header: 'ЧЕГО ИЗБЕГАТЬ:', key: 'whatToAvoid' },
  { header: 'WHAT_TO_AVOID:', key: 'whatToAvoid' },
  { header: 'WHAT TO AVOID:', key: 'whatToAvoid' },
  { header: 'ВАЖНО О БЕЗОПАСНОСТИ:', key: 'safetyNotice' },
  { header: 'SAFETY_NOTICE:', key: 'safetyNotice' },
  { header: 'SAFETY NOTICE:', key: 'safetyNotice' },
];

// Confidence is fixed by provenance, not computed
export const PARSED_CONFIDENCE = 0.85;
export const FALLBACK_CONFIDENCE = 0.3;

export const DEFAULT_TRUE_MEANING = 'Не удалось определить';
export const DEFAULT_CHILD_NEEDS = 'Понимание и поддержка';
export const LIST_PLACEHOLDER = 'Информация недоступна';
export const DEFAULT_EMOTIONAL_STATE: EmotionalState = 'confused';

// Returned by the analysis service whenever the model cannot be used
export const FALLBACK_ANALYSIS = {
  emotionalStates: [DEFAULT_EMOTIONAL_STATE],
  trueMeaning: 'Не удалось проанализировать фразу. Попробуйте переформулировать или добавить контекст.',
  childNeeds: DEFAULT_CHILD_NEEDS,
  suggestedResponses: [
    'Я вижу, что тебе сложно. Давай попробуем разобраться вместе.',
    'Расскажи подробнее, что происходит?',
  ],
  whatToAvoid: [
    'Не обесценивайте чувства',
    'Не давите на ребёнка',
  ],
  confidenceScore: FALLBACK_CONFIDENCE,
} as const;

export const DEFAULT_AI_MODEL = 'gpt-4o-mini';
export const DEFAULT_AI_TEMPERATURE = 0.7;
export const DEFAULT_AI_MAX_TOKENS = 1000;
