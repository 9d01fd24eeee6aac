// src/lib/auth/identity.test.ts
import { describe, it, expect, vi } from 'vitest';
import { extractAccessToken, remoteAddress, resolveCaller } from './identity';

const BASE = 'https://identity.test';

function request(headers: Record<string, string> = {}): Request {
  return new Request('http://localhost:3000/api/announcements', { headers });
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('extractAccessToken', () => {
  it('reads a bearer token from the Authorization header', () => {
    expect(extractAccessToken(request({ authorization: 'Bearer test-token' }))).toBe('test-token');
  });

  it('falls back to the access_token cookie', () => {
    const req = request({ cookie: 'theme=dark; access_token=test%20cookie; lang=es' });
    expect(extractAccessToken(req)).toBe('test cookie');
  });

  it('returns null without header or cookie', () => {
    expect(extractAccessToken(request())).toBeNull();
    expect(extractAccessToken(request({ authorization: 'Basic abc' }))).toBeNull();
  });
});

describe('remoteAddress', () => {
  it('takes the first x-forwarded-for hop', () => {
    expect(remoteAddress(request({ 'x-forwarded-for': '10.1.2.3, 172.16.0.1' }))).toBe('10.1.2.3');
  });

  it('uses x-real-ip when there is no forwarded header', () => {
    expect(remoteAddress(request({ 'x-real-ip': '10.9.9.9' }))).toBe('10.9.9.9');
  });

  it('is undefined when neither header is present', () => {
    expect(remoteAddress(request())).toBeUndefined();
  });
});

describe('resolveCaller', () => {
  it('exchanges the token for login and kind', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ login: 'alice', kind: 'student', email: 'alice@example.test' }),
    );

    const caller = await resolveCaller(request({ authorization: 'Bearer test-token' }), {
      apiBaseUrl: BASE,
      timeoutMs: 1_000,
      fetchImpl,
    });

    expect(caller).toEqual({ login: 'alice', kind: 'student' });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://identity.test/v2/me');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-token' });
  });

  it('reports a missing kind as unknown', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ login: 'bob' }));

    const caller = await resolveCaller(request({ cookie: 'access_token=test-token' }), {
      apiBaseUrl: BASE,
      timeoutMs: 1_000,
      fetchImpl,
    });

    expect(caller).toEqual({ login: 'bob', kind: 'unknown' });
  });

  it('does not call the provider without a token', async () => {
    const fetchImpl = vi.fn<typeof fetch>();

    expect(await resolveCaller(request(), { apiBaseUrl: BASE, timeoutMs: 1_000, fetchImpl })).toBeNull();
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('returns null when the provider rejects the token', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'invalid' }, 401));

    const caller = await resolveCaller(request({ authorization: 'Bearer expired' }), {
      apiBaseUrl: BASE,
      timeoutMs: 1_000,
      fetchImpl,
    });

    expect(caller).toBeNull();
  });

  it('returns null on an unexpected payload', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ user: 'alice' }));

    const caller = await resolveCaller(request({ authorization: 'Bearer test-token' }), {
      apiBaseUrl: BASE,
      timeoutMs: 1_000,
      fetchImpl,
    });

    expect(caller).toBeNull();
  });

  it('gives up after the timeout', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );

    const caller = await resolveCaller(request({ authorization: 'Bearer test-token' }), {
      apiBaseUrl: BASE,
      timeoutMs: 5,
      fetchImpl,
    });

    expect(caller).toBeNull();
  });

  it('returns null when the network call fails', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    const caller = await resolveCaller(request({ authorization: 'Bearer test-token' }), {
      apiBaseUrl: BASE,
      timeoutMs: 1_000,
      fetchImpl,
    });

    expect(caller).toBeNull();
  });
});
