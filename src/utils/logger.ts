/**
 * Structured logger (pino)
 *
 * Logs to stdout, and additionally to LOG_FILE when configured.
 */

import pino from 'pino';
import { config } from '../config/index.js';

export interface LoggerSettings {
  name: string;
  env: string;
  level: pino.LevelWithSilent;
  file?: string;
}

function fileDestinations(file: string | undefined): pino.DestinationStream[] {
  if (!file) {
    return [];
  }
  return [process.stdout, pino.destination({ dest: file, mkdir: true, sync: false })];
}

/**
 * Several destinations go through a multistream, whose entries default to
 * info unless each one is given the logger's level.
 */
export function createLogger(
  settings: LoggerSettings,
  destinations: pino.DestinationStream[] = fileDestinations(settings.file)
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: settings.name,
    level: settings.level,
    base: { env: settings.env },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const level = settings.level;
  if (destinations.length === 0 || level === 'silent') {
    return pino(options);
  }

  return pino(options, pino.multistream(destinations.map((stream) => ({ level, stream }))));
}

export const logger = createLogger({
  name: config.app.name,
  env: config.app.env,
  level: config.logging.level,
  file: config.logging.file,
});

export type Logger = pino.Logger;
