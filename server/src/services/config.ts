/**
 * Configuration - settings from the environment and bot message templates
 *
 * Settings are read once at startup (dotenv fills process.env first).
 * Malformed numeric values fall back to defaults with a warning.
 */

import { configLogger } from '../utils/logger.js';
import {
  COMPLETION_TIMEOUT_MS,
  DEFAULT_CHILD_AGE_RANGE,
  MAX_PHRASE_LENGTH,
  MIN_PHRASE_LENGTH,
  RATE_LIMIT_MAX_REQUESTS,
  RATE_LIMIT_WINDOW_SECONDS,
} from '../config/constants.js';
import { DEFAULT_AI_MAX_TOKENS, DEFAULT_AI_MODEL, DEFAULT_AI_TEMPERATURE } from '../config/ai-constants.js';

// ============================================
// ТИПЫ
// ============================================

export interface Settings {
  telegramBotToken: string;
  openaiApiKey: string;
  openaiBaseUrl?: string;
  aiModel: string;
  aiTemperature: number;
  aiMaxTokens: number;
  completionTimeoutMs: number;
  rateLimitMessages: number;
  rateLimitWindowSeconds: number;
  minPhraseLength: number;
  maxPhraseLength: number;
  childAgeRange: string;
  databaseUrl?: string;
  port: number;
  webhookUrl?: string;
  internalApiKey?: string;
  environment: string;
}

export const REQUIRED_ENV_VARS = ['TELEGRAM_BOT_TOKEN', 'OPENAI_API_KEY'] as const;

type Env = Record<string, string | undefined>;

// ============================================
// ПАРСИНГ
// ============================================

function readPositiveNumber(env: Env, key: string, fallback: number, integer = true): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = integer ? parseInt(raw, 10) : parseFloat(raw);
  if (!Number.isFinite(value) || value <= 0) {
    configLogger.warn({ key, raw, fallback }, 'Invalid numeric setting, using default');
    return fallback;
  }

  return value;
}

function readOptional(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function missingEnvVars(env: Env = process.env): string[] {
  return REQUIRED_ENV_VARS.filter((key) => !env[key]);
}

export function loadSettings(env: Env = process.env): Settings {
  const minPhraseLength = readPositiveNumber(env, 'MIN_PHRASE_LENGTH', MIN_PHRASE_LENGTH);
  let maxPhraseLength = readPositiveNumber(env, 'MAX_PHRASE_LENGTH', MAX_PHRASE_LENGTH);

  if (maxPhraseLength < minPhraseLength) {
    configLogger.warn({ minPhraseLength, maxPhraseLength }, 'MAX_PHRASE_LENGTH below MIN_PHRASE_LENGTH, using default');
    maxPhraseLength = Math.max(MAX_PHRASE_LENGTH, minPhraseLength);
  }

  return {
    telegramBotToken: env.TELEGRAM_BOT_TOKEN ?? '',
    openaiApiKey: env.OPENAI_API_KEY ?? '',
    openaiBaseUrl: readOptional(env, 'OPENAI_BASE_URL'),
    aiModel: readOptional(env, 'AI_MODEL') ?? DEFAULT_AI_MODEL,
    aiTemperature: readPositiveNumber(env, 'AI_TEMPERATURE', DEFAULT_AI_TEMPERATURE, false),
    aiMaxTokens: readPositiveNumber(env, 'AI_MAX_TOKENS', DEFAULT_AI_MAX_TOKENS),
    completionTimeoutMs: readPositiveNumber(env, 'COMPLETION_TIMEOUT_MS', COMPLETION_TIMEOUT_MS),
    rateLimitMessages: readPositiveNumber(env, 'RATE_LIMIT_MESSAGES', RATE_LIMIT_MAX_REQUESTS),
    rateLimitWindowSeconds: readPositiveNumber(env, 'RATE_LIMIT_WINDOW', RATE_LIMIT_WINDOW_SECONDS),
    minPhraseLength,
    maxPhraseLength,
    childAgeRange: readOptional(env, 'CHILD_AGE_RANGE') ?? DEFAULT_CHILD_AGE_RANGE,
    databaseUrl: readOptional(env, 'DATABASE_URL'),
    port: readPositiveNumber(env, 'PORT', 3000),
    webhookUrl: readOptional(env, 'WEBHOOK_URL'),
    internalApiKey: readOptional(env, 'INTERNAL_API_KEY'),
    environment: env.NODE_ENV || 'development',
  };
}

// ============================================
// СООБЩЕНИЯ
// ============================================

const MESSAGES = {
  'msg.welcome': `👋 Здравствуйте, {name}!

Я помогаю родителям понять, что на самом деле стоит за словами ребёнка или подростка.

Пришлите фразу, которую вы услышали, и я расскажу:
• что ребёнок чувствует
• что он на самом деле хочет сказать
• как лучше ответить и чего избегать`,

  'msg.main_menu': '🏠 Главное меню\n\nВыберите, что хотите сделать:',

  'msg.enter_phrase': `✍️ Напишите фразу, которую сказал ребёнок.

Например: «Отстань!» или «Мне всё равно»`,

  'msg.analyzing': '🔄 Анализирую фразу...',

  'msg.examples': '📚 Частые фразы подростков. Выберите, чтобы узнать, что за ними стоит:',

  'msg.how_it_works': `❓ Как это работает

1️⃣ Вы присылаете фразу ребёнка
2️⃣ Я сравниваю её с частыми ситуациями из базы
3️⃣ ИИ-психолог разбирает эмоции и скрытый смысл
4️⃣ Вы получаете варианты ответа и список того, чего лучше избегать

Анализ не заменяет консультацию специалиста.`,

  'msg.tips': `💡 Советы родителям

• Слушайте, не перебивая — сначала чувства, потом решения
• Называйте эмоции: «Похоже, ты очень злишься»
• Не спорьте с чувствами, даже если не согласны с поступками
• Возвращайтесь к разговору позже, когда все успокоятся
• Показывайте, что вы рядом, даже если ребёнок отталкивает`,

  'msg.help': `📖 Как пользоваться ботом

/start — главное меню
/help — эта справка

Нажмите «Расшифровать фразу» и пришлите слова ребёнка.`,

  'msg.no_previous_phrase': 'Сначала пришлите фразу для анализа 🙂',
  'msg.feedback_positive': 'Спасибо за отзыв! 😊',
  'msg.feedback_negative': 'Спасибо за отзыв. Мы постараемся улучшить анализ.',
  'msg.error_generic': '😔 Не удалось обработать запрос. Попробуйте ещё раз позже.',
} as const;

export type MessageKey = keyof typeof MESSAGES;

/**
 * Message template with `{placeholder}` substitution
 */
export function getMessage(key: MessageKey, replacements: Record<string, string> = {}): string {
  let message: string = MESSAGES[key];

  for (const [placeholder, value] of Object.entries(replacements)) {
    message = message.replace(new RegExp(`\\{${placeholder}\\}`, 'g'), () => value);
  }

  return message;
}
