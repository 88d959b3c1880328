import pino from 'pino';

/**
 * Application logger using Pino
 *
 * - Structured JSON logging in production
 * - Pretty printing in development
 * - Silent under test unless LOG_LEVEL is set explicitly
 */

const env = process.env.NODE_ENV || 'development';
const isTest = env === 'test';
const isDevelopment = env !== 'production' && !isTest;

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),

  transport: isDevelopment ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  base: {
    env,
  },
});

export type Logger = pino.Logger;

/**
 * Create a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
