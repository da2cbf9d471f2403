import { randomUUID } from 'node:crypto';
import { Bot, Context, session, SessionFlavor, GrammyError, HttpError } from 'grammy';
import { hydrate, HydrateFlavor } from '@grammyjs/hydrate';
import { botLogger } from '../utils/logger.js';
import { captureError } from '../utils/sentry.js';
import { AppError, ErrorType } from '../utils/errorHandling.js';
import { validatePhrase, type PhraseBounds } from '../utils/validation.js';
import { createAnalysisRequest } from '../domain/analysis.js';
import { findSimilar, getCatalog } from '../domain/examples.js';
import { emotionalContextFromAnalysis } from '../domain/value-objects.js';
import type { Feedback } from '../domain/types.js';
import type { AnalysisOutcome, AnalysisService } from '../services/analysis.js';
import { detectPhraseCategory, type Analytics } from '../services/analytics.js';
import type { InteractionLog } from '../services/interactions.js';
import type { RateLimiter } from '../services/rate-limiter.js';
import { getMessage } from '../services/config.js';
import {
  formatAnalysis,
  formatErrorMessage,
  formatExample,
  formatRateLimited,
  formatSimilar,
} from '../services/formatter.js';
import { afterAnalysisMenu, backToMenu, errorMenu, examplesMenu, mainMenu } from './keyboards.js';

// ============================================
// ТИПЫ
// ============================================

type Step = 'idle' | 'waiting_for_phrase' | 'processing';

interface SessionData {
  step: Step;
}

export type BotContext = HydrateFlavor<Context> & SessionFlavor<SessionData>;

export interface BotDeps {
  analysis: AnalysisService;
  interactions: InteractionLog;
  rateLimiter: RateLimiter;
  analytics: Analytics;
  phraseBounds: PhraseBounds;
  childAgeRange: string;
}

const MORE_OPTIONS_CONTEXT = 'Родитель уже видел разбор этой фразы и просит другие варианты ответа, отличные от предыдущих.';

// ============================================
// СОЗДАНИЕ БОТА
// ============================================

let botInstance: Bot<BotContext> | null = null;

export function createBot(token: string, deps: BotDeps): Bot<BotContext> {
  const { analysis, interactions, rateLimiter, analytics } = deps;
  const bot = new Bot<BotContext>(token);

  // Errors from any handler end with the generic apology
  bot.use(async (ctx, next) => {
    try {
      await next();
    } catch (error) {
      await reportError(ctx, error);
    }
  });

  // Middleware
  bot.use(session({ initial: (): SessionData => ({ step: 'idle' }) }));
  bot.use(hydrate());

  // Incoming messages count against the per-user quota; button presses do not
  bot.use(async (ctx, next) => {
    const user = ctx.from;
    if (!ctx.message || !user) {
      return next();
    }

    if (!rateLimiter.checkAndRecord(user.id)) {
      await ctx.reply(formatRateLimited(rateLimiter.getWaitTime(user.id)));
      return;
    }

    await next();
  });

  async function showMainMenu(ctx: BotContext, userId: number): Promise<void> {
    ctx.session.step = 'idle';
    analytics.trackMainMenuOpened(userId);
    await ctx.reply(getMessage('msg.main_menu'), { reply_markup: mainMenu() });
  }

  /**
   * Runs one analysis and renders it. The analysis service never rejects;
   * the catch covers Telegram failures while replying. The step always returns to idle.
   */
  async function runAnalysis(ctx: BotContext, userId: number, phrase: string, context = ''): Promise<void> {
    try {
      ctx.session.step = 'processing';
      await ctx.replyWithChatAction('typing');
      const statusMsg = await ctx.reply(getMessage('msg.analyzing'));

      const requestId = randomUUID();
      const startTime = Date.now();
      analytics.trackApiRequest(userId, requestId);

      const request = createAnalysisRequest(phrase, {
        context,
        childAgeRange: deps.childAgeRange,
        bounds: deps.phraseBounds,
      });
      const outcome = await analysis.analyzeWithOutcome(request);

      interactions.record(userId, phrase, outcome.record);
      trackOutcome(userId, phrase, requestId, Date.now() - startTime, outcome);

      await statusMsg.delete().catch((error: unknown) => {
        botLogger.debug({ error }, 'Failed to delete status message');
      });
      await ctx.reply(formatAnalysis(outcome.record), { reply_markup: afterAnalysisMenu() });
    } catch (error) {
      botLogger.error({ error, userId }, 'Failed to process phrase');
      captureError(error, { userId });
      analytics.trackDecodeFailed(userId, error);
      await ctx.reply(formatErrorMessage(), { reply_markup: errorMenu() });
    } finally {
      ctx.session.step = 'idle';
    }
  }

  function trackOutcome(
    userId: number,
    phrase: string,
    requestId: string,
    responseTimeMs: number,
    outcome: AnalysisOutcome
  ): void {
    if (outcome.status === 'fallback') {
      analytics.trackDecodeFailed(
        userId,
        new AppError(`Completion ${outcome.reason}`, 502, ErrorType.EXTERNAL_SERVICE)
      );
      return;
    }

    const emotionalContext = emotionalContextFromAnalysis(outcome.record);
    analytics.trackDecodeCompleted(userId, requestId, responseTimeMs, {
      category: detectPhraseCategory(phrase),
      emotionalStates: outcome.record.emotionalStates,
      intensityLevel: emotionalContext.intensityLevel,
      suggestionsCount: outcome.record.suggestedResponses.length,
    });
  }

  // ============================================
  // КОМАНДЫ
  // ============================================

  bot.command('start', async (ctx) => {
    const user = ctx.from;
    if (!user) return;

    ctx.session.step = 'idle';
    analytics.trackBotStarted(user.id, ctx.match || undefined);
    botLogger.info({ telegramId: user.id }, 'User started bot');

    await ctx.reply(getMessage('msg.welcome', { name: user.first_name }), { reply_markup: mainMenu() });
  });

  bot.command('help', async (ctx) => {
    await ctx.reply(getMessage('msg.help'), { reply_markup: backToMenu() });
  });

  // ============================================
  // CALLBACK QUERIES
  // ============================================

  bot.callbackQuery('decode', async (ctx) => {
    await ctx.answerCallbackQuery();
    analytics.trackButtonClick(ctx.from.id, 'decode', 'menu');
    analytics.trackDecodeInitiated(ctx.from.id, 'button');
    ctx.session.step = 'waiting_for_phrase';
    await ctx.reply(getMessage('msg.enter_phrase'));
  });

  bot.callbackQuery('examples', async (ctx) => {
    await ctx.answerCallbackQuery();
    analytics.trackButtonClick(ctx.from.id, 'examples', 'menu');
    await ctx.reply(getMessage('msg.examples'), { reply_markup: examplesMenu(getCatalog()) });
  });

  bot.callbackQuery(/^example_(\d+)$/, async (ctx) => {
    await ctx.answerCallbackQuery();

    const index = Number(ctx.match[1]);
    const catalog = getCatalog();
    const example = catalog[index];
    if (!example) {
      botLogger.warn({ index }, 'Unknown example index');
      return;
    }

    analytics.trackExampleViewed(ctx.from.id, example.category, index);
    await ctx.reply(formatExample(example), { reply_markup: backToMenu() });
  });

  bot.callbackQuery('how_it_works', async (ctx) => {
    await ctx.answerCallbackQuery();
    analytics.trackHowItWorksViewed(ctx.from.id);
    await ctx.reply(getMessage('msg.how_it_works'), { reply_markup: backToMenu() });
  });

  bot.callbackQuery('tips', async (ctx) => {
    await ctx.answerCallbackQuery();
    analytics.trackTipsViewed(ctx.from.id);
    await ctx.reply(getMessage('msg.tips'), { reply_markup: backToMenu() });
  });

  bot.callbackQuery('home', async (ctx) => {
    await ctx.answerCallbackQuery();
    await showMainMenu(ctx, ctx.from.id);
  });

  bot.callbackQuery('more_options', async (ctx) => {
    await ctx.answerCallbackQuery();
    const userId = ctx.from.id;
    const latest = interactions.getLatest(userId);

    if (!latest) {
      await ctx.reply(getMessage('msg.no_previous_phrase'), { reply_markup: mainMenu() });
      return;
    }

    analytics.trackMoreOptionsRequested(userId, detectPhraseCategory(latest.phrase));

    // A fresh analysis costs a completion call, so it goes through the limiter too
    if (!rateLimiter.checkAndRecord(userId)) {
      await ctx.reply(formatRateLimited(rateLimiter.getWaitTime(userId)));
      return;
    }

    await runAnalysis(ctx, userId, latest.phrase, MORE_OPTIONS_CONTEXT);
  });

  bot.callbackQuery('similar', async (ctx) => {
    await ctx.answerCallbackQuery();
    const userId = ctx.from.id;
    const latest = interactions.getLatest(userId);

    if (!latest) {
      await ctx.reply(getMessage('msg.no_previous_phrase'), { reply_markup: mainMenu() });
      return;
    }

    const matches = findSimilar(latest.phrase);
    analytics.trackSimilarExamplesRequested(userId, matches.length);

    const keyboard = matches.length > 0
      ? examplesMenu(matches, getCatalog())
      : examplesMenu(getCatalog());
    await ctx.reply(formatSimilar(latest.phrase, matches), { reply_markup: keyboard });
  });

  bot.callbackQuery(/^feedback_(positive|negative)$/, async (ctx) => {
    const feedback: Feedback = ctx.match[1] === 'positive' ? 'positive' : 'negative';
    const attached = interactions.addFeedback(ctx.from.id, feedback);
    analytics.trackFeedback(ctx.from.id, feedback, attached);

    await ctx.answerCallbackQuery({
      text: getMessage(feedback === 'positive' ? 'msg.feedback_positive' : 'msg.feedback_negative'),
    });
  });

  // ============================================
  // ОБРАБОТКА ТЕКСТОВЫХ СООБЩЕНИЙ
  // ============================================

  bot.on('message:text', async (ctx) => {
    const user = ctx.from;
    const text = ctx.message.text;

    if (!user || text.startsWith('/')) return;

    if (ctx.session.step === 'processing') {
      await ctx.reply(getMessage('msg.analyzing'));
      return;
    }

    if (ctx.session.step !== 'waiting_for_phrase') {
      await showMainMenu(ctx, user.id);
      return;
    }

    const phrase = text.trim();
    const validationError = validatePhrase(phrase, deps.phraseBounds);

    if (validationError) {
      botLogger.info({ telegramId: user.id, reason: validationError }, 'Phrase rejected');
      analytics.trackDecodeFailed(user.id, new AppError(validationError, 400, ErrorType.VALIDATION));
      ctx.session.step = 'idle';
      await ctx.reply(formatErrorMessage(), { reply_markup: errorMenu() });
      return;
    }

    analytics.trackPhraseSubmitted(user.id, phrase);
    await runAnalysis(ctx, user.id, phrase);
  });

  // ============================================
  // ERROR HANDLING
  // ============================================

  bot.catch((err) => reportError(err.ctx, err.error));

  return bot;
}

async function reportError(ctx: Context, error: unknown): Promise<void> {
  const updateId = ctx.update.update_id;

  botLogger.error({ error, updateId }, 'Bot error');
  captureError(error, { updateId });

  if (error instanceof GrammyError) {
    botLogger.error(`Grammy error: ${error.description}`);
  } else if (error instanceof HttpError) {
    botLogger.error(`HTTP error: ${error}`);
  }

  if (!ctx.chat) return;

  await ctx.reply(getMessage('msg.error_generic')).catch((replyError: unknown) => {
    botLogger.warn({ error: replyError, updateId }, 'Failed to send error message');
  });
}

// ============================================
// ЭКСПОРТ
// ============================================

export function getBot(): Bot<BotContext> | null {
  return botInstance;
}

export function initBot(token: string, deps: BotDeps): Bot<BotContext> {
  botInstance = createBot(token, deps);
  return botInstance;
}
