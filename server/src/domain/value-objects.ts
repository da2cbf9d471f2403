import { ValidationError } from '../utils/errorHandling.js';
import { validateIntegerInRange } from '../utils/validation.js';
import type { AnalysisRecord, EmotionalState } from './types.js';

export interface ResponseSuggestion {
  readonly text: string;
  readonly tone: string;
  readonly effectivenessRating: number;   // 1-5
}

export function createResponseSuggestion(text: string, tone: string, effectivenessRating: number): ResponseSuggestion {
  const ratingError = validateIntegerInRange(effectivenessRating, 1, 5, 'Effectiveness rating');
  if (ratingError) {
    throw new ValidationError(ratingError, { effectivenessRating });
  }
  if (!text) {
    throw new ValidationError('Response text cannot be empty');
  }

  return Object.freeze({ text, tone, effectivenessRating });
}

export interface EmotionalContext {
  readonly primaryEmotion: string;
  readonly secondaryEmotions: readonly string[];
  readonly intensityLevel: number;   // 1-10
  readonly underlyingNeeds: readonly string[];
  readonly isHighIntensity: boolean;
  readonly allEmotions: readonly string[];
}

const HIGH_INTENSITY_THRESHOLD = 7;

export function createEmotionalContext(input: {
  primaryEmotion: string;
  secondaryEmotions?: readonly string[];
  intensityLevel: number;
  underlyingNeeds?: readonly string[];
}): EmotionalContext {
  const intensityError = validateIntegerInRange(input.intensityLevel, 1, 10, 'Intensity level');
  if (intensityError) {
    throw new ValidationError(intensityError, { intensityLevel: input.intensityLevel });
  }
  if (!input.primaryEmotion) {
    throw new ValidationError('Primary emotion cannot be empty');
  }

  const secondaryEmotions = Object.freeze([...(input.secondaryEmotions ?? [])]);

  return Object.freeze({
    primaryEmotion: input.primaryEmotion,
    secondaryEmotions,
    intensityLevel: input.intensityLevel,
    underlyingNeeds: Object.freeze([...(input.underlyingNeeds ?? [])]),
    isHighIntensity: input.intensityLevel >= HIGH_INTENSITY_THRESHOLD,
    allEmotions: Object.freeze([input.primaryEmotion, ...secondaryEmotions]),
  });
}

// Rough intensity per state, used to tag analytics events
const STATE_INTENSITY: Record<EmotionalState, number> = {
  angry: 8,
  frustrated: 6,
  sad: 6,
  anxious: 7,
  defensive: 5,
  overwhelmed: 7,
  disconnected: 5,
  confused: 3,
};

const SAFETY_INTENSITY_BONUS = 2;

/**
 * Summarizes a finished analysis: first state is primary, intensity is the strongest state
 * plus a bonus when the model raised a safety concern.
 */
export function emotionalContextFromAnalysis(record: AnalysisRecord): EmotionalContext {
  const [primary = 'confused', ...secondary] = record.emotionalStates;
  const base = Math.max(...record.emotionalStates.map((state) => STATE_INTENSITY[state]), 1);
  const intensityLevel = Math.min(10, base + (record.safetyNotice ? SAFETY_INTENSITY_BONUS : 0));

  return createEmotionalContext({
    primaryEmotion: primary,
    secondaryEmotions: secondary,
    intensityLevel,
    underlyingNeeds: [record.childNeeds],
  });
}
