import pino from 'pino';
import { APP_ENV } from './config.js';

/**
 * Application logger
 * Writes to stderr so batch output on stdout stays plain
 */
export const logger = pino(
  {
    name: 'song-catalog',
    level: APP_ENV.LOG_LEVEL
  },
  pino.destination(2)
);

export type Logger = typeof logger;
