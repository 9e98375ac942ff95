import pino, { type Logger } from 'pino';
import { env } from './env.js';

// Pretty output for local development only; tests stay quiet unless LOG_LEVEL is set
const usePretty = !env.isProduction && !env.isTest;

const transport = usePretty
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    }
  : undefined;

export const logger = pino({
  level: env.LOG_LEVEL || (env.isTest ? 'silent' : 'info'),
  transport,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'findings-summarizer',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['*.apiKey', '*.token', '*.secret', '*.credential', '*.authorization'],
    censor: '[REDACTED]',
  },
});

// Child logger factory for modules
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
