import 'dotenv/config';
// Sentry MUST be initialized first
import { initSentry } from './utils/sentry.js';
initSentry();

import { initBot } from './bot/index.js';
import { createApp } from './api/index.js';
import { loadSettings, missingEnvVars } from './services/config.js';
import { createOpenAICompletionSource } from './services/completion.js';
import { createAnalysisService } from './services/analysis.js';
import { InteractionLog } from './services/interactions.js';
import { RateLimiter } from './services/rate-limiter.js';
import { Analytics } from './services/analytics.js';
import { AnalyticsStore, createPool } from './services/database.js';
import { logger } from './utils/logger.js';

// ============================================
// ENVIRONMENT VALIDATION
// ============================================

const missing = missingEnvVars();
if (missing.length > 0) {
  for (const envVar of missing) {
    logger.fatal({ envVar }, `❌ Missing required environment variable: ${envVar}`);
  }
  process.exit(1);
}

const settings = loadSettings();

async function main() {
  logger.info({ NODE_ENV: settings.environment }, '🚀 Starting Phrase Decoder Bot...');

  // Analytics storage is optional: without a database events only go to the log
  let store: AnalyticsStore | null = null;
  if (settings.databaseUrl) {
    store = new AnalyticsStore(createPool(settings.databaseUrl));
    const ready = await store.ensureSchema();
    logger.info({ ready }, ready ? '✅ Database connected' : '⚠️ Database unavailable, analytics continue without storage');
  } else {
    logger.warn('⚠️ DATABASE_URL not set, analytics events are only logged');
  }

  const analytics = new Analytics({ sink: store ?? undefined });
  const interactions = new InteractionLog();
  const rateLimiter = new RateLimiter({
    maxRequests: settings.rateLimitMessages,
    windowSeconds: settings.rateLimitWindowSeconds,
  });
  const analysis = createAnalysisService({
    completion: createOpenAICompletionSource({
      apiKey: settings.openaiApiKey,
      baseURL: settings.openaiBaseUrl,
      model: settings.aiModel,
      temperature: settings.aiTemperature,
      maxTokens: settings.aiMaxTokens,
      timeoutMs: settings.completionTimeoutMs,
    }),
  });

  const bot = initBot(settings.telegramBotToken, {
    analysis,
    interactions,
    rateLimiter,
    analytics,
    phraseBounds: { minLength: settings.minPhraseLength, maxLength: settings.maxPhraseLength },
    childAgeRange: settings.childAgeRange,
  });

  const app = createApp({ store, internalApiKey: settings.internalApiKey });
  const server = app.listen(settings.port, () => {
    logger.info({ port: settings.port }, `✅ API server running on port ${settings.port}`);
  });

  // В production используем webhook, в dev — polling
  if (settings.environment === 'production' && settings.webhookUrl) {
    await bot.init();
    const webhookUrl = `${settings.webhookUrl}/webhook`;
    await bot.api.setWebhook(webhookUrl);
    logger.info({ webhookUrl }, '✅ Bot webhook set');
  } else {
    await bot.api.deleteWebhook();
    bot.start({
      onStart: (botInfo) => {
        logger.info({ username: botInfo.username }, '✅ Bot started (polling mode)');
      },
    }).catch((error: unknown) => {
      logger.error({ error }, '❌ Bot polling stopped');
    });
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, '🛑 Shutting down...');

    try {
      await bot.stop();
      server.close();
      if (store) {
        await store.close();
      }
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }

    logger.info('👋 Goodbye!');
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error) => {
  logger.error({ error }, '💥 Fatal error');
  process.exit(1);
});
