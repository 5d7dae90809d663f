import pino, { stdTimeFunctions, type Logger } from 'pino';
import type { LogLevel } from './config';

export type ReleaseLogger = Logger;

/**
 * JSON lines on stderr; stdout is reserved for command results.
 */
export function createReleaseLogger(level: LogLevel = 'info', destination: number | NodeJS.WritableStream = 2): ReleaseLogger {
  const stream = typeof destination === 'number' ? pino.destination({ fd: destination, sync: true }) : destination;
  return pino(
    {
      level,
      base: undefined,
      timestamp: stdTimeFunctions.isoTime
    },
    stream
  );
}

export function createSilentLogger(): ReleaseLogger {
  return pino({ level: 'silent' });
}
