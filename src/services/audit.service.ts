import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { logWithContext } from '@/lib/observability/logger';

export type AuditAction =
  | 'ANNOUNCEMENT_CREATED'
  | 'ANNOUNCEMENT_UPDATED'
  | 'UNAUTHORIZED_ACCESS'
  | 'FORBIDDEN_EDIT';

export interface AuditContext {
  message: string;
  [key: string]: unknown;
}

export interface AuditLog {
  log(actor: string, action: AuditAction, context: AuditContext): Promise<void>;
}

interface AuditServiceOptions {
  /** Append-only text file; one line per entry. */
  logFile?: string;
  now?: () => Date;
  logger?: Logger;
}

export function formatAuditLine(timestamp: string, actor: string, action: AuditAction, message: string): string {
  return `${timestamp} - ${actor} - ${action} - ${message}\n`;
}

/**
 * Action log for announcement management.
 * Every entry goes to pino; when `logFile` is set it is also appended there.
 * A failing sink is reported through pino and never reaches the caller.
 */
export function createAuditService(opts: AuditServiceOptions = {}): AuditLog {
  const log = opts.logger ?? logWithContext({ service: 'audit' });
  const now = opts.now ?? (() => new Date());
  let dirReady = false;

  return {
    async log(actor, action, context) {
      const timestamp = now().toISOString();
      const { message, ...details } = context;

      if (action === 'UNAUTHORIZED_ACCESS' || action === 'FORBIDDEN_EDIT') {
        log.warn({ actor, action, ...details }, message);
      } else {
        log.info({ actor, action, ...details }, message);
      }

      if (!opts.logFile) return;

      try {
        if (!dirReady) {
          await mkdir(path.dirname(opts.logFile), { recursive: true });
          dirReady = true;
        }
        await appendFile(opts.logFile, formatAuditLine(timestamp, actor, action, message), 'utf8');
      } catch (err: unknown) {
        log.error(
          { err, logFile: opts.logFile, action },
          'Failed to append to the action log',
        );
      }
    },
  };
}
