/**
 * Analytics - user events with per-user sessions
 *
 * Every event is written to the analytics logger and handed to the event sink
 * without waiting for it. Sink failures are logged and dropped; analytics never
 * affects message handling.
 */

import { randomUUID } from 'node:crypto';
import { analyticsLogger } from '../utils/logger.js';
import { describeError } from '../utils/errorHandling.js';
import { SESSION_TIMEOUT_MS } from '../config/constants.js';
import type { Feedback } from '../domain/types.js';

// ============================================
// ТИПЫ
// ============================================

export enum EventType {
  BOT_STARTED = 'bot_started',
  MAIN_MENU_OPENED = 'main_menu_opened',
  DECODE_INITIATED = 'decode_initiated',
  PHRASE_SUBMITTED = 'phrase_submitted',
  API_REQUEST_SENT = 'api_request_sent',
  DECODE_COMPLETED = 'decode_completed',
  DECODE_FAILED = 'decode_failed',
  BUTTON_CLICKED = 'button_clicked',
  EXAMPLE_VIEWED = 'example_viewed',
  HOW_IT_WORKS_VIEWED = 'how_it_works_viewed',
  TIPS_VIEWED = 'tips_viewed',
  SESSION_STARTED = 'session_started',
  SESSION_ENDED = 'session_ended',
  MORE_OPTIONS_REQUESTED = 'more_options_requested',
  SIMILAR_EXAMPLES_REQUESTED = 'similar_examples_requested',
  FEEDBACK_SUBMITTED = 'feedback_submitted',
}

export type EventProperties = Record<string, unknown> & {
  user_id: string;
  timestamp: string;
};

export interface AnalyticsEvent {
  event: EventType;
  properties: EventProperties;
}

export interface EventSink {
  storeEvent(event: AnalyticsEvent): Promise<boolean>;
}

export type PhraseCategory = 'anger' | 'sadness' | 'dismissive' | 'confusion' | 'neutral';

interface Session {
  id: string;
  started: number;
  lastActivity: number;
  phrasesDecoded: number;
  examplesViewed: number;
  errorsEncountered: number;
  successfulDecodes: number;
  previousSessionId?: string;
  minutesSinceLastSession?: number;
}

export interface AnalyticsOptions {
  sink?: EventSink;
  now?: () => Date;
  generateId?: () => string;
  sessionTimeoutMs?: number;
}

// ============================================
// HELPERS
// ============================================

const CATEGORY_KEYWORDS: ReadonlyArray<[PhraseCategory, readonly string[]]> = [
  ['anger', ['отстань', 'уйди', 'достал', 'ненавижу']],
  ['sadness', ['грустно', 'плохо', 'устал', 'одиноко']],
  ['dismissive', ['всё равно', 'все равно', 'неважно', 'пофиг']],
  ['confusion', ['не понима', 'не знаю', 'запутал']],
];

/**
 * Coarse keyword bucket for a submitted phrase, first matching category wins
 */
export function detectPhraseCategory(phrase: string): PhraseCategory {
  const lower = phrase.toLowerCase();

  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return category;
    }
  }

  return 'neutral';
}

const CYRILLIC = /[а-яё]/i;
// Pictographs and other symbols outside the letter ranges
const EMOJI = /\p{Extended_Pictographic}/u;

export interface StartPayload {
  source: string;
  utmParams: Record<string, string>;
}

/**
 * Parses a /start deep-link payload such as `src-ads__utm_source-vk__utm_campaign-spring`
 */
export function parseStartPayload(payload: string | undefined): StartPayload {
  const result: StartPayload = { source: 'direct', utmParams: {} };
  if (!payload) return result;

  for (const segment of payload.split('__')) {
    const dash = segment.indexOf('-');
    if (dash <= 0) continue;

    const key = segment.slice(0, dash);
    const value = segment.slice(dash + 1);
    if (!value) continue;

    if (key === 'src') {
      result.source = value;
    } else if (key.startsWith('utm_')) {
      result.utmParams[key] = value;
    }
  }

  return result;
}

// ============================================
// ANALYTICS
// ============================================

export class Analytics {
  private readonly sessions = new Map<string, Session>();
  private readonly sink?: EventSink;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly sessionTimeoutMs: number;

  constructor(options: AnalyticsOptions = {}) {
    this.sink = options.sink;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? SESSION_TIMEOUT_MS;
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  trackBotStarted(telegramId: number, payload?: string): void {
    const { source, utmParams } = parseStartPayload(payload);
    if (Object.keys(utmParams).length > 0) {
      analyticsLogger.info({ utmParams }, 'Bot started with UTM params');
    }
    this.emit(telegramId, EventType.BOT_STARTED, {
      source,
      platform: 'telegram',
      language: 'ru',
      ...utmParams,
    });
  }

  trackMainMenuOpened(telegramId: number): void {
    this.emit(telegramId, EventType.MAIN_MENU_OPENED);
  }

  trackDecodeInitiated(telegramId: number, entryPoint: string): void {
    this.emit(telegramId, EventType.DECODE_INITIATED, { entry_point: entryPoint });
  }

  trackPhraseSubmitted(telegramId: number, phrase: string): void {
    const session = this.emit(telegramId, EventType.PHRASE_SUBMITTED, {
      phrase_length: phrase.length,
      phrase_words_count: phrase.split(/\s+/).filter(Boolean).length,
      contains_emoji: EMOJI.test(phrase),
      language_detected: CYRILLIC.test(phrase) ? 'ru' : 'en',
      phrase_category: detectPhraseCategory(phrase),
    });
    session.phrasesDecoded += 1;
  }

  trackApiRequest(telegramId: number, requestId: string): void {
    this.emit(telegramId, EventType.API_REQUEST_SENT, {
      request_id: requestId,
      prompt_template: 'v2',
    });
  }

  trackDecodeCompleted(
    telegramId: number,
    requestId: string,
    responseTimeMs: number,
    details: { category?: PhraseCategory; emotionalStates?: readonly string[]; intensityLevel?: number; suggestionsCount?: number } = {}
  ): void {
    const session = this.emit(telegramId, EventType.DECODE_COMPLETED, {
      request_id: requestId,
      response_time_ms: responseTimeMs,
      phrase_category: details.category ?? null,
      emotional_states: details.emotionalStates ?? [],
      intensity_level: details.intensityLevel ?? null,
      suggestions_count: details.suggestionsCount ?? 0,
    });
    session.successfulDecodes += 1;
  }

  trackDecodeFailed(telegramId: number, error: unknown): void {
    const { type, message } = describeError(error);
    const session = this.emit(telegramId, EventType.DECODE_FAILED, {
      error_type: type,
      error_message: message,
      retry_attempted: false,
    });
    session.errorsEncountered += 1;
  }

  trackButtonClick(telegramId: number, buttonId: string, screen: string, context = 'navigation'): void {
    this.emit(telegramId, EventType.BUTTON_CLICKED, { button_id: buttonId, screen, context });
  }

  trackExampleViewed(telegramId: number, exampleId: string, position: number): void {
    const session = this.emit(telegramId, EventType.EXAMPLE_VIEWED, {
      example_id: exampleId,
      example_position: position,
    });
    session.examplesViewed += 1;
  }

  trackHowItWorksViewed(telegramId: number): void {
    this.emit(telegramId, EventType.HOW_IT_WORKS_VIEWED);
  }

  trackTipsViewed(telegramId: number): void {
    this.emit(telegramId, EventType.TIPS_VIEWED);
  }

  trackMoreOptionsRequested(telegramId: number, category?: PhraseCategory): void {
    this.emit(telegramId, EventType.MORE_OPTIONS_REQUESTED, { original_phrase_category: category ?? null });
  }

  trackSimilarExamplesRequested(telegramId: number, matches: number): void {
    this.emit(telegramId, EventType.SIMILAR_EXAMPLES_REQUESTED, { matches });
  }

  trackFeedback(telegramId: number, feedback: Feedback, attached: boolean): void {
    this.emit(telegramId, EventType.FEEDBACK_SUBMITTED, { feedback, attached });
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  /**
   * Touches the user's session (rolling it over after inactivity) and logs the event
   */
  private emit(telegramId: number, type: EventType, properties: Record<string, unknown> = {}): Session {
    const userId = String(telegramId);
    const session = this.touchSession(userId);

    this.log({
      event: type,
      properties: {
        user_id: userId,
        timestamp: this.now().toISOString(),
        session_id: session.id,
        ...properties,
      },
    });

    return session;
  }

  private touchSession(userId: string): Session {
    const now = this.now().getTime();
    const existing = this.sessions.get(userId);

    if (existing && now - existing.lastActivity <= this.sessionTimeoutMs) {
      existing.lastActivity = now;
      return existing;
    }

    const session: Session = {
      id: this.generateId(),
      started: now,
      lastActivity: now,
      phrasesDecoded: 0,
      examplesViewed: 0,
      errorsEncountered: 0,
      successfulDecodes: 0,
    };

    if (existing) {
      this.endSession(userId, existing);
      session.previousSessionId = existing.id;
      session.minutesSinceLastSession = Math.floor((now - existing.lastActivity) / 60000);
    }

    this.sessions.set(userId, session);
    this.log({
      event: EventType.SESSION_STARTED,
      properties: {
        user_id: userId,
        timestamp: this.now().toISOString(),
        session_id: session.id,
        previous_session_id: session.previousSessionId ?? null,
        time_since_last_session_minutes: session.minutesSinceLastSession ?? null,
      },
    });

    return session;
  }

  private endSession(userId: string, session: Session): void {
    this.log({
      event: EventType.SESSION_ENDED,
      properties: {
        user_id: userId,
        timestamp: this.now().toISOString(),
        session_id: session.id,
        session_duration_ms: session.lastActivity - session.started,
        phrases_decoded: session.phrasesDecoded,
        examples_viewed: session.examplesViewed,
        errors_encountered: session.errorsEncountered,
        successful_decodes: session.successfulDecodes,
      },
    });
  }

  private log(event: AnalyticsEvent): void {
    analyticsLogger.info({ analyticsEvent: event }, `Event: ${event.event} | User: ${event.properties.user_id}`);

    const sink = this.sink;
    if (!sink) return;

    void Promise.resolve()
      .then(() => sink.storeEvent(event))
      .catch((error: unknown) => {
        analyticsLogger.error({ error: describeError(error), event: event.event }, 'Failed to store analytics event');
      });
  }
}
