/**
 * Phrase input validation
 * Runs in the bot before anything is sent to the analysis service
 */

import { MAX_PHRASE_LENGTH, MIN_PHRASE_LENGTH } from '../config/constants.js';

export interface PhraseBounds {
  minLength: number;
  maxLength: number;
}

const DEFAULT_BOUNDS: PhraseBounds = {
  minLength: MIN_PHRASE_LENGTH,
  maxLength: MAX_PHRASE_LENGTH,
};

/**
 * Validates a phrase sent by the user
 * @returns Error message or null if valid
 */
export function validatePhrase(text: unknown, bounds: PhraseBounds = DEFAULT_BOUNDS): string | null {
  if (typeof text !== 'string') {
    return 'Фраза должна быть текстом';
  }

  const phrase = text.trim();

  if (phrase.length === 0) {
    return 'Фраза не может быть пустой';
  }

  if (phrase.length < bounds.minLength) {
    return 'Фраза слишком короткая для анализа';
  }

  if (phrase.length > bounds.maxLength) {
    return `Фраза слишком длинная (макс ${bounds.maxLength} символов)`;
  }

  return null;
}

/**
 * Validates an integer rating against inclusive bounds
 * @returns Error message or null if valid
 */
export function validateIntegerInRange(value: unknown, min: number, max: number, label: string): string | null {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    return `${label} must be an integer`;
  }

  if (value < min || value > max) {
    return `${label} must be between ${min} and ${max}`;
  }

  return null;
}
