/**
 * pino loggers for the core and the CLI.
 *
 * Logs go to stderr as JSON lines; stdout is left for verification output.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export const LOGGER_NAME = 'sumcheck';

/**
 * Create a logger writing to stderr at the given level.
 */
export function createLogger(level: LevelWithSilent): Logger {
  return pino({ name: LOGGER_NAME, level }, pino.destination(2));
}

/** Default logger for library calls that were not given one */
export const silentLogger: Logger = pino({ level: 'silent' });
