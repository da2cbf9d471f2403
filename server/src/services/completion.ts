import OpenAI from 'openai';
import { aiLogger } from '../utils/logger.js';
import { describeError } from '../utils/errorHandling.js';
import {
  DEFAULT_AI_MODEL,
  DEFAULT_AI_TEMPERATURE,
  DEFAULT_AI_MAX_TOKENS,
} from '../config/ai-constants.js';
import { COMPLETION_TIMEOUT_MS } from '../config/constants.js';

// ============================================
// ТИПЫ
// ============================================

export type CompletionFailureReason = 'timeout' | 'error' | 'empty';

export type CompletionResult =
  | { ok: true; text: string; requestId?: string }
  | { ok: false; reason: CompletionFailureReason; error?: unknown };

/**
 * Anything that turns a prompt into raw model text.
 * Implementations report failures through the result instead of throwing.
 */
export interface CompletionSource {
  complete(prompt: string): Promise<CompletionResult>;
}

export interface OpenAICompletionOptions {
  apiKey: string;
  baseURL?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

// ============================================
// OPENAI-COMPATIBLE CLIENT
// ============================================

/**
 * Chat completions over the OpenAI SDK; works with any compatible endpoint (DeepSeek, proxies).
 * No retries: a failed call goes straight to the fallback analysis.
 */
export function createOpenAICompletionSource(options: OpenAICompletionOptions): CompletionSource {
  const timeoutMs = options.timeoutMs ?? COMPLETION_TIMEOUT_MS;
  const model = options.model ?? DEFAULT_AI_MODEL;

  const client = new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseURL && { baseURL: options.baseURL }),
    maxRetries: 0,
    timeout: timeoutMs,
  });

  aiLogger.info({ model, baseURL: options.baseURL ?? 'default', timeoutMs }, 'Completion client initialized');

  return {
    async complete(prompt: string): Promise<CompletionResult> {
      const startTime = Date.now();

      try {
        const response = await client.chat.completions.create({
          model,
          messages: [{ role: 'user', content: prompt }],
          temperature: options.temperature ?? DEFAULT_AI_TEMPERATURE,
          max_tokens: options.maxTokens ?? DEFAULT_AI_MAX_TOKENS,
        });

        const text = response.choices[0]?.message?.content ?? '';
        const latencyMs = Date.now() - startTime;

        aiLogger.info({
          model,
          requestId: response.id,
          inputTokens: response.usage?.prompt_tokens ?? 0,
          outputTokens: response.usage?.completion_tokens ?? 0,
          latencyMs,
        }, 'Completion received');

        if (!text.trim()) {
          return { ok: false, reason: 'empty' };
        }

        return { ok: true, text, requestId: response.id };
      } catch (error) {
        const reason: CompletionFailureReason =
          error instanceof OpenAI.APIConnectionTimeoutError ? 'timeout' : 'error';

        aiLogger.error({ error: describeError(error), reason, latencyMs: Date.now() - startTime }, 'Completion failed');
        return { ok: false, reason, error };
      }
    },
  };
}
