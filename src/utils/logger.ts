import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: undefined, // cleaner logs in containers
  redact: {
    paths: ['credential', 'accessToken', 'token'],
    remove: true,
  },
  transport:
    process.env.NODE_ENV === 'development'
      ? { target: 'pino-pretty', options: { colorize: true, singleLine: true } }
      : undefined,
});

export type Logger = pino.Logger;
