/**
 * Domain types shared by the analysis pipeline, the bot and analytics
 */

export const EMOTIONAL_STATES = [
  'angry',
  'frustrated',
  'sad',
  'anxious',
  'defensive',
  'overwhelmed',
  'disconnected',
  'confused',
] as const;

export type EmotionalState = typeof EMOTIONAL_STATES[number];

export interface AnalysisRecord {
  readonly originalPhrase: string;
  readonly emotionalStates: readonly EmotionalState[];
  readonly trueMeaning: string;
  readonly childNeeds: string;
  readonly suggestedResponses: readonly string[];
  readonly whatToAvoid: readonly string[];
  readonly confidenceScore: number;   // 0..1, fixed by provenance
  readonly safetyNotice?: string;
  readonly analyzedAt: Date;
}

export interface AnalysisRequest {
  readonly phrase: string;
  readonly context: string;
  readonly childAgeRange: string;
  readonly hasContext: boolean;
}

export type ExampleCategory =
  | 'boundaries'
  | 'disconnection'
  | 'defense'
  | 'frustration'
  | 'masking'
  | 'overwhelm'
  | 'desperation';

export interface ExamplePhrase {
  readonly phrase: string;
  readonly category: ExampleCategory;
  readonly emotionalContext: string;
  readonly typicalMeaning: string;
  readonly suggestedApproach: string;
}

export type Feedback = 'positive' | 'negative';

export interface InteractionRecord {
  readonly userId: number;
  readonly phrase: string;
  readonly analysis: AnalysisRecord | null;
  readonly timestamp: Date;
  feedback?: Feedback;
}
