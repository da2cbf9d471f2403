import rateLimit from 'express-rate-limit';
import { apiLogger } from '../../utils/logger.js';

/**
 * Лимитер для внутренних API
 */
export const internalLimiter = rateLimit({
  windowMs: parseInt(process.env.INTERNAL_RATE_LIMIT_WINDOW_MS || '60000', 10),
  max: parseInt(process.env.INTERNAL_RATE_LIMIT_MAX_REQUESTS || '100', 10),
  message: { error: 'Internal API rate limit exceeded' },
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res, _next, options) => {
    apiLogger.warn({ ip: req.ip, path: req.path }, 'Rate limit exceeded');
    res.status(429).json(options.message);
  },
});
