import { ValidationError } from '../utils/errorHandling.js';
import { validatePhrase, type PhraseBounds } from '../utils/validation.js';
import { DEFAULT_CHILD_AGE_RANGE, MAX_PHRASE_LENGTH, MIN_PHRASE_LENGTH } from '../config/constants.js';
import type { AnalysisRecord, AnalysisRequest, EmotionalState } from './types.js';

export interface AnalysisRecordInput {
  originalPhrase: string;
  emotionalStates: readonly EmotionalState[];
  trueMeaning: string;
  childNeeds: string;
  suggestedResponses: readonly string[];
  whatToAvoid: readonly string[];
  confidenceScore: number;
  safetyNotice?: string;
  analyzedAt?: Date;
}

/**
 * Builds an immutable analysis record.
 * Throws ValidationError for an empty phrase, no emotional states or a confidence outside [0, 1].
 */
export function createAnalysisRecord(input: AnalysisRecordInput): AnalysisRecord {
  if (!input.originalPhrase) {
    throw new ValidationError('Original phrase cannot be empty');
  }

  if (!Number.isFinite(input.confidenceScore) || input.confidenceScore < 0 || input.confidenceScore > 1) {
    throw new ValidationError('Confidence score must be between 0 and 1', {
      confidenceScore: input.confidenceScore,
    });
  }

  if (input.emotionalStates.length === 0) {
    throw new ValidationError('At least one emotional state is required');
  }

  const emotionalStates = Object.freeze(Array.from(new Set(input.emotionalStates)));

  return Object.freeze({
    originalPhrase: input.originalPhrase,
    emotionalStates,
    trueMeaning: input.trueMeaning,
    childNeeds: input.childNeeds,
    suggestedResponses: Object.freeze([...input.suggestedResponses]),
    whatToAvoid: Object.freeze([...input.whatToAvoid]),
    confidenceScore: input.confidenceScore,
    ...(input.safetyNotice ? { safetyNotice: input.safetyNotice } : {}),
    analyzedAt: input.analyzedAt ?? new Date(),
  });
}

/**
 * Validates a user phrase and wraps it into a request for the analysis service
 */
export function createAnalysisRequest(
  phrase: string,
  options: { context?: string; childAgeRange?: string; bounds?: PhraseBounds } = {}
): AnalysisRequest {
  const bounds = options.bounds ?? { minLength: MIN_PHRASE_LENGTH, maxLength: MAX_PHRASE_LENGTH };
  const error = validatePhrase(phrase, bounds);

  if (error) {
    throw new ValidationError(error, { length: phrase.length });
  }

  const context = options.context?.trim() ?? '';

  return Object.freeze({
    phrase: phrase.trim(),
    context,
    childAgeRange: options.childAgeRange || DEFAULT_CHILD_AGE_RANGE,
    hasContext: context.length > 0,
  });
}
