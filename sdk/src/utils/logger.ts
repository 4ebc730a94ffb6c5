import pino from 'pino';
import type { Logger } from 'pino';

function isTest(): boolean {
  return process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);
}

// Read per call: the CLI loads .env after this module may already be imported.
export function createLogger(name: string): Logger {
  const level = process.env.LOG_LEVEL ?? (isTest() ? 'silent' : 'info');
  // stdout is reserved for command output.
  if (process.env.NODE_ENV === 'production' || isTest()) {
    return pino({ name, level }, pino.destination(2));
  }
  return pino({
    name,
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        destination: 2,
      },
    },
  });
}
