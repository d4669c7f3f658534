import pino, { type Logger } from 'pino';

// Diagnostics go to stderr so they never interleave with the menu on stdout.
export function createLogger(level: string = process.env.LOG_LEVEL ?? 'warn'): Logger {
  return pino({ name: 'zoo-keeper', level }, pino.destination(2));
}

export type { Logger };
