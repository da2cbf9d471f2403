/**
 * Phrase analysis service
 *
 * One request/response cycle: catalog lookup, prompt, completion, parse.
 * analyzePhrase always resolves; any failure yields the fixed fallback analysis.
 */

import { aiLogger } from '../utils/logger.js';
import { describeError } from '../utils/errorHandling.js';
import { FALLBACK_ANALYSIS } from '../config/ai-constants.js';
import { PROMPT_EXAMPLES_LIMIT } from '../config/constants.js';
import { createAnalysisRecord } from '../domain/analysis.js';
import { findSimilar, getCatalog, getExampleByPhrase } from '../domain/examples.js';
import type { AnalysisRecord, AnalysisRequest, ExamplePhrase } from '../domain/types.js';
import type { CompletionResult, CompletionSource } from './completion.js';
import { parseResponse } from './response-parser.js';

export interface AnalysisServiceDeps {
  completion: CompletionSource;
  now?: () => Date;
}

export type AnalysisOutcome =
  | { status: 'parsed'; record: AnalysisRecord; requestId?: string }
  | { status: 'fallback'; record: AnalysisRecord; reason: string };

// ============================================
// PROMPT
// ============================================

export function buildPrompt(request: AnalysisRequest, similarExamples: readonly ExamplePhrase[]): string {
  let examplesText = '';
  if (similarExamples.length > 0) {
    examplesText = '\n\nПохожие примеры из базы:\n' + similarExamples
      .slice(0, PROMPT_EXAMPLES_LIMIT)
      .map((example) => `- "${example.phrase}": ${example.typicalMeaning}\n`)
      .join('');
  }

  const contextText = request.hasContext ? `\nДополнительный контекст: ${request.context}` : '';

  return `Ты опытный детский психолог, специализирующийся на подростковой психологии.

Родитель прислал фразу, которую сказал его ребёнок/подросток (возраст ${request.childAgeRange} лет):
"${request.phrase}"${contextText}${examplesText}

Проанализируй эту фразу и предоставь структурированный ответ в следующем формате:

ЭМОЦИОНАЛЬНОЕ СОСТОЯНИЕ:
[Опиши основные эмоции, которые испытывает ребёнок. Используй слова: angry, frustrated, sad, anxious, defensive, overwhelmed, disconnected, confused]

ИСТИННЫЙ СМЫСЛ:
[Объясни в 2-3 предложениях, что на самом деле хочет сказать ребёнок]

ПОТРЕБНОСТЬ РЕБЁНКА:
[В 1-2 предложениях опиши, что нужно ребёнку в данный момент]

ВАРИАНТЫ ОТВЕТА:
[Предложи 3 конкретных фразы, которые родитель может использовать в ответ. Каждая фраза должна быть естественной и поддерживающей]

ЧЕГО ИЗБЕГАТЬ:
[Укажи 3 конкретных действия или фразы, которых следует избегать]

Если во фразе есть признаки угрозы жизни или здоровью ребёнка, добавь в начало раздел:
ВАЖНО О БЕЗОПАСНОСТИ:
[Коротко: что родителю сделать прямо сейчас и куда обратиться]

Ответ должен быть:
- Емким и практичным
- Поддерживающим для родителя
- Учитывающим возрастные особенности
- Без осуждения и критики`;
}

// ============================================
// SERVICE
// ============================================

export function createAnalysisService(deps: AnalysisServiceDeps) {
  const now = deps.now ?? (() => new Date());

  function fallback(phrase: string): AnalysisRecord {
    return createAnalysisRecord({
      originalPhrase: phrase,
      ...FALLBACK_ANALYSIS,
      analyzedAt: now(),
    });
  }

  async function requestCompletion(prompt: string): Promise<CompletionResult> {
    try {
      return await deps.completion.complete(prompt);
    } catch (error) {
      return { ok: false, reason: 'error', error };
    }
  }

  /**
   * Same as analyzePhrase, but tells the caller whether the model answer was used
   */
  async function analyzeWithOutcome(request: AnalysisRequest): Promise<AnalysisOutcome> {
    aiLogger.info({ phraseLength: request.phrase.length, hasContext: request.hasContext }, 'Analyzing phrase');

    try {
      const similar = findSimilar(request.phrase);
      const result = await requestCompletion(buildPrompt(request, similar));

      if (!result.ok) {
        aiLogger.warn({
          reason: result.reason,
          ...(result.error !== undefined && { error: describeError(result.error) }),
        }, 'Completion unavailable, using fallback');
        return { status: 'fallback', record: fallback(request.phrase), reason: result.reason };
      }

      const record = parseResponse(result.text, request.phrase, { now });
      aiLogger.info({
        emotionalStates: record.emotionalStates,
        hasSafetyNotice: Boolean(record.safetyNotice),
        matchedExamples: similar.length,
      }, 'Phrase analysis completed');

      return { status: 'parsed', record, requestId: result.requestId };
    } catch (error) {
      aiLogger.error({ error: describeError(error) }, 'Error analyzing phrase');
      return { status: 'fallback', record: fallback(request.phrase), reason: 'error' };
    }
  }

  async function analyzePhrase(request: AnalysisRequest): Promise<AnalysisRecord> {
    const outcome = await analyzeWithOutcome(request);
    return outcome.record;
  }

  return {
    analyzePhrase,
    analyzeWithOutcome,
    getExamples: getCatalog,
    getExampleByPhrase,
  };
}

export type AnalysisService = ReturnType<typeof createAnalysisService>;
