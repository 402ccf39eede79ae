import pino from 'pino';

const isTest = process.env.VITEST !== undefined;
const isProduction = process.env.NODE_ENV === 'production';

const transport = isTest
  ? undefined
  : pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
      },
    });

export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  },
  transport
);

export type Logger = typeof logger;
