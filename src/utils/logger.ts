/**
 * Application logger (pino)
 */

import pino from 'pino';
import { config } from '../config/index.js';

export type LogLevel = pino.LevelWithSilent;

function createLogger(): pino.Logger {
  const options: pino.LoggerOptions = {
    name: config.app.name,
    level: config.logging.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { error: pino.stdSerializers.err },
  };

  if (config.logging.file) {
    return pino(options, pino.destination({ dest: config.logging.file, mkdir: true, sync: true }));
  }

  return pino(options);
}

export const logger = createLogger();

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
