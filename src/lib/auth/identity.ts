/**
 * @fileoverview Caller identity from the OAuth provider.
 *
 * The access token comes from `Authorization: Bearer <token>` or the
 * `access_token` cookie and is exchanged for `{ login, kind }` via
 * `GET {apiBaseUrl}/v2/me`. Any failure (no token, timeout, non-2xx,
 * unexpected payload) yields null: the caller is then simply not logged in.
 * @module lib/auth/identity
 */
import { z } from 'zod';
import { logWithContext } from '@/lib/observability/logger';
import type { CallerIdentity } from '@/types/announcement';

const log = logWithContext({ service: 'identity' });

const ACCESS_TOKEN_COOKIE = 'access_token';

const MeSchema = z.object({
  login: z.string().min(1),
  kind: z.string().nullish(),
});

export interface IdentityOptions {
  apiBaseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

function readCookie(header: string | null, name: string): string | null {
  if (!header) return null;
  for (const part of header.split(';')) {
    const [key, ...rest] = part.trim().split('=');
    if (key === name) {
      const value = rest.join('=');
      try {
        return decodeURIComponent(value);
      } catch {
        return value;
      }
    }
  }
  return null;
}

export function extractAccessToken(req: Request): string | null {
  const auth = req.headers.get('authorization');
  if (auth) {
    const match = /^Bearer\s+(.+)$/i.exec(auth.trim());
    if (match) return match[1].trim();
  }
  return readCookie(req.headers.get('cookie'), ACCESS_TOKEN_COOKIE) || null;
}

/** First hop of x-forwarded-for, then x-real-ip. */
export function remoteAddress(req: Request): string | undefined {
  const forwarded = req.headers.get('x-forwarded-for');
  if (forwarded) {
    const first = forwarded.split(',')[0].trim();
    if (first) return first;
  }
  return req.headers.get('x-real-ip')?.trim() || undefined;
}

export async function resolveCaller(
  req: Request,
  opts: IdentityOptions,
): Promise<CallerIdentity | null> {
  const token = extractAccessToken(req);
  if (!token) return null;

  const fetchImpl = opts.fetchImpl ?? fetch;
  const url = `${opts.apiBaseUrl}/v2/me`;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs);

  try {
    const res = await fetchImpl(url, {
      method: 'GET',
      headers: { Authorization: `Bearer ${token}` },
      signal: controller.signal,
    });

    if (!res.ok) {
      log.warn({ status: res.status }, 'Identity provider rejected the access token');
      return null;
    }

    const parsed = MeSchema.safeParse(await res.json());
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues }, 'Unexpected identity payload');
      return null;
    }

    return { login: parsed.data.login, kind: parsed.data.kind ?? 'unknown' };
  } catch (err: unknown) {
    const aborted = controller.signal.aborted;
    log.error(
      { err, timeoutMs: opts.timeoutMs },
      aborted ? 'Identity lookup timed out' : 'Identity lookup failed',
    );
    return null;
  } finally {
    clearTimeout(timer);
  }
}
