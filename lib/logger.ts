import pino from 'pino';

const level = process.env.LOG_LEVEL || (process.env.JEST_WORKER_ID ? 'silent' : 'info');

export const logger = pino({
  name: 'ipv6-stats',
  level,
});

export default logger;
