import express from 'express';
import helmet from 'helmet';
import { createInternalRoutes } from './routes/internal.js';
import { apiLogger } from '../utils/logger.js';
import { AppError, formatErrorResponse, logError } from '../utils/errorHandling.js';
import { Sentry } from '../utils/sentry.js';
import { getBot } from '../bot/index.js';
import type { AnalyticsStore } from '../services/database.js';

export interface AppDeps {
  store: AnalyticsStore | null;
  internalApiKey?: string;
}

export function createApp(deps: AppDeps) {
  const app = express();

  app.set('trust proxy', 1);
  app.use(helmet());

  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      apiLogger.debug({
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration: Date.now() - start,
      }, 'Request completed');
    });
    next();
  });

  app.use('/api/internal', createInternalRoutes(deps));

  // Health check (публичный)
  app.get('/health', async (_req, res) => {
    const health: {
      status: 'ok' | 'degraded';
      timestamp: string;
      uptime: number;
      database: 'connected' | 'error' | 'disabled';
      bot: 'ready' | 'disabled';
      version: string;
    } = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
      database: 'disabled',
      bot: getBot() ? 'ready' : 'disabled',
      version: process.env.npm_package_version || '1.0.0',
    };

    if (deps.store) {
      const reachable = await deps.store.ping();
      health.database = reachable ? 'connected' : 'error';
      if (!reachable) {
        health.status = 'degraded';
      }
    }

    res.status(health.status === 'ok' ? 200 : 503).json(health);
  });

  // Telegram Bot Webhook handler
  app.post('/webhook', async (req, res) => {
    const bot = getBot();
    if (!bot) {
      apiLogger.warn('Webhook received but bot not initialized');
      res.status(503).json({ error: 'Bot not ready' });
      return;
    }

    try {
      await bot.handleUpdate(req.body);
      res.sendStatus(200);
    } catch (error) {
      logError(error, { path: req.path });
      res.sendStatus(500);
    }
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Sentry error handler (must be before custom error handler)
  Sentry.setupExpressErrorHandler(app);

  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logError(err, { path: req.path, method: req.method });
    const status = err instanceof AppError ? err.statusCode : 500;
    res.status(status).json(status === 500 ? { error: 'Internal server error' } : formatErrorResponse(err));
  });

  return app;
}

export default createApp;
