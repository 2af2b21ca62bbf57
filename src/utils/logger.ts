import { pino } from 'pino';

import { config } from './config.js';

export const logger = pino({
  level: config.LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

