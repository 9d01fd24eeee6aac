/**
 * @fileoverview Application constants and environment configuration.
 * @module lib/constants/config
 */
import path from 'node:path';
import { z } from 'zod';

export const APP_CONFIG = {
  name: 'Campus Dashboard',
  defaultAnnouncementColor: '#3e3e60',
  /** Signage limit for descriptions, in UTF-8 bytes. */
  descriptionMaxBytes: 470,
  announcementIdLength: 12,
  loginPath: '/login',
} as const;

const ENV_KEYS = [
  'ANNOUNCEMENT_STORE',
  'ANNOUNCEMENTS_DIR',
  'ACTION_LOG_FILE',
  'AUTHORIZED_USERS',
  'SUPABASE_URL',
  'SUPABASE_SERVICE_ROLE_KEY',
  'OAUTH_API_BASE_URL',
  'IDENTITY_TIMEOUT_MS',
] as const;

const EnvSchema = z
  .object({
    ANNOUNCEMENT_STORE: z.enum(['file', 'supabase', 'memory']).default('file'),
    ANNOUNCEMENTS_DIR: z.string().default('./data/announcements'),
    ACTION_LOG_FILE: z.string().optional(),
    AUTHORIZED_USERS: z.string().default(''),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
    OAUTH_API_BASE_URL: z.string().url().default('https://api.intra.42.fr'),
    IDENTITY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  })
  .superRefine((env, ctx) => {
    if (env.ANNOUNCEMENT_STORE !== 'supabase') return;
    if (!env.SUPABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'required when ANNOUNCEMENT_STORE=supabase',
      });
    }
    if (!env.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'required when ANNOUNCEMENT_STORE=supabase',
      });
    }
  });

export type StoreConfig =
  | { kind: 'file'; dir: string }
  | { kind: 'supabase'; url: string; serviceRoleKey: string }
  | { kind: 'memory' };

export interface AppConfig {
  store: StoreConfig;
  /** Append-only action log. Entries only go to the logger when unset. */
  actionLogFile?: string;
  /** Non-admin logins allowed to manage announcements. */
  authorizedUsers: ReadonlySet<string>;
  identity: {
    apiBaseUrl: string;
    timeoutMs: number;
  };
}

function parseLoginList(raw: string): Set<string> {
  return new Set(
    raw
      .split(',')
      .map((login) => login.trim())
      .filter((login) => login.length > 0),
  );
}

/**
 * Builds the configuration once from the environment.
 * Empty variables count as unset. Throws with every invalid key listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') raw[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;

  let store: StoreConfig;
  if (e.ANNOUNCEMENT_STORE === 'supabase' && e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY) {
    store = { kind: 'supabase', url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY };
  } else if (e.ANNOUNCEMENT_STORE === 'memory') {
    store = { kind: 'memory' };
  } else {
    store = { kind: 'file', dir: path.resolve(e.ANNOUNCEMENTS_DIR) };
  }

  return {
    store,
    actionLogFile: e.ACTION_LOG_FILE ? path.resolve(e.ACTION_LOG_FILE) : undefined,
    authorizedUsers: parseLoginList(e.AUTHORIZED_USERS),
    identity: {
      apiBaseUrl: e.OAUTH_API_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: e.IDENTITY_TIMEOUT_MS,
    },
  };
}
