import pino from 'pino';

// Jest sets NODE_ENV=test; keep test output clean unless LOG_LEVEL asks otherwise.
const defaultLevel = process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';

export const logger = pino({
  name: 'find-flex',
  level: process.env['LOG_LEVEL'] ?? defaultLevel,
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 2 } }
      : undefined,
});
