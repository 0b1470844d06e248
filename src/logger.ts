import pino from 'pino';

export type Logger = pino.Logger;

export const logger = pino({
  name: 'node-placeholder-scaler',
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"time":"${new Date().toISOString()}"`,
});

export default logger;
