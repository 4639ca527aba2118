import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

/**
 * Structured log for the CLI. Goes to stderr so stdout stays the
 * human-readable report.
 */
export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'scaffold-patch', level }, pino.destination(2));
}
