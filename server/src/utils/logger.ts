import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const isDev = process.env.NODE_ENV !== 'production' && !isTest;

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export const botLogger = logger.child({ module: 'bot' });
export const apiLogger = logger.child({ module: 'api' });
export const aiLogger = logger.child({ module: 'ai' });
export const dbLogger = logger.child({ module: 'db' });
export const configLogger = logger.child({ module: 'config' });
export const analyticsLogger = logger.child({ module: 'analytics' });
