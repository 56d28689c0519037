import pino from 'pino';
import type { Logger } from 'pino';

/**
 * CLI logger. Writes to stderr so stdout carries only the report.
 * Quiet by default; `LOG_LEVEL=debug` shows fetch and merge diagnostics.
 */
export function createLogger(level: string = process.env['LOG_LEVEL'] ?? 'warn'): Logger {
  return pino({ name: 'standup', level }, pino.destination(2));
}
