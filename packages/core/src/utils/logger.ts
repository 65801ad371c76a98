import pino from 'pino';

const logLevel = (typeof process !== 'undefined' && process.env && process.env.LOG_LEVEL) || 'info';

export const logger = pino({
  level: logLevel,
  base: { component: 'cotmesh-core' },
});

export type Logger = typeof logger;
