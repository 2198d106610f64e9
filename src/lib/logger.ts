/**
 * Logger factory
 *
 * All logs go to stderr: stdout carries the MCP stdio protocol.
 */

import pino, { type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  name: string;
  level?: string;
}

export function createLogger(options: LoggerOptions): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  return pino({ name: options.name, level }, pino.destination(2));
}
