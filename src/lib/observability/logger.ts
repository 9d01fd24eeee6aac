// src/lib/observability/logger.ts
import pino, { type DestinationStream, type Logger } from 'pino';

export type LogService = 'announcements' | 'audit' | 'identity' | 'record-store';

export interface LogMeta {
  service: LogService;
  /** Record store backend: file | supabase | memory. */
  backend?: string;
  actor?: string;
  announcementId?: string;
  remoteAddress?: string;
}

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

// Nunca se escriben tokens de acceso en los logs.
const REDACT_PATHS = ['token', 'accessToken', 'headers.authorization', 'headers.cookie'];

export function createLogger(opts: LoggerOptions = {}, destination?: DestinationStream): Logger {
  const options = {
    level: opts.level ?? 'info',
    base: { app: 'campus-dashboard' },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  if (destination) return pino(options, destination);
  if (opts.pretty) {
    return pino({ ...options, transport: { target: 'pino-pretty', options: { colorize: true } } });
  }
  return pino(options);
}

export const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  pretty: process.env.NODE_ENV === 'development',
});

export const logWithContext = (meta: LogMeta): Logger => logger.child(meta);
