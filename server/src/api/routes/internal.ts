import { Router, Request, Response } from 'express';
import { internalAuth } from '../middleware/auth.js';
import { internalLimiter } from '../middleware/rateLimit.js';
import { apiLogger } from '../../utils/logger.js';
import { RECENT_EVENTS_DEFAULT_LIMIT } from '../../config/constants.js';
import type { AnalyticsStore } from '../../services/database.js';

export function createInternalRoutes(deps: { store: AnalyticsStore | null; internalApiKey?: string }): Router {
  const router = Router();

  // Внутренние API требуют специальный ключ
  router.use(internalAuth(deps.internalApiKey));
  router.use(internalLimiter);

  /**
   * GET /api/internal/analytics?limit=N
   * Event count and the most recent stored events
   */
  router.get('/analytics', async (req: Request, res: Response) => {
    if (!deps.store) {
      res.status(503).json({ error: 'Analytics storage is disabled' });
      return;
    }

    const rawLimit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : NaN;
    const limit = Number.isFinite(rawLimit) && rawLimit > 0 ? rawLimit : RECENT_EVENTS_DEFAULT_LIMIT;

    const [count, events] = await Promise.all([
      deps.store.getEventsCount(),
      deps.store.getRecentEvents(limit),
    ]);

    apiLogger.debug({ count, returned: events.length }, 'Analytics requested');
    res.json({ count, events });
  });

  return router;
}
