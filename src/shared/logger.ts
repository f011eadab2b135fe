import pino from 'pino';

const underTest = process.env['VITEST'] !== undefined;

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? (underTest ? 'silent' : 'info'),
  transport:
    process.env['NODE_ENV'] !== 'production' && !underTest
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: ['api_key', 'apiKey', 'authorization', 'password', 'secret', '*.api_key', '*.apiKey'],
    censor: '***REDACTED***',
  },
});
