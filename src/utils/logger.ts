/**
 * Application logger (pino)
 *
 * Writes JSON lines to stdout and to the configured log file.
 */

import pino, { type Logger } from 'pino';
import { config } from '../config/index.js';

function createLogger(): Logger {
  if (config.app.env === 'test') {
    return pino({ level: 'silent' });
  }

  const level = config.logging.level;
  const streams = pino.multistream([
    { level, stream: process.stdout },
    { level, stream: pino.destination({ dest: config.logging.file, mkdir: true, sync: false }) },
  ]);

  return pino(
    {
      level,
      base: { app: config.app.name },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    streams
  );
}

export const logger = createLogger();
