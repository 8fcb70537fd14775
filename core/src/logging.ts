/**
 * Logging
 *
 * The catalog logs through pino. Components take a Logger in their options
 * and fall back to a silent one, so library users opt in to output.
 */

import { pino, type Level, type LevelWithSilent, type Logger } from 'pino';

export type { Level, LevelWithSilent, Logger };

/** Options for {@link createLogger} */
export interface LoggerOptions {
  /** Minimum level to write, default `info` */
  level?: LevelWithSilent;
  /** Logger name, default `fibermeta` */
  name?: string;
}

/**
 * Create a JSON logger writing to stdout.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'fibermeta',
    level: options.level ?? 'info',
  });
}

/**
 * Logger that drops everything.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
