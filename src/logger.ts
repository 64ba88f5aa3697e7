import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export function createLogger(name: string): Logger {
  return pino({ name, level: process.env.LOG_LEVEL ?? 'info' });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
