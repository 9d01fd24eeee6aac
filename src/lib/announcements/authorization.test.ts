import { describe, it, expect, vi } from 'vitest';
import type { AuditLog } from '@/services/audit.service';
import { createAuthorizationPolicy, decideAccess } from './authorization';

const authorizedUsers = new Set(['alice', 'bob']);
const admin = { login: 'root', kind: 'admin' };
const alice = { login: 'alice', kind: 'student' };
const mallory = { login: 'mallory', kind: 'student' };
const aliceRecord = { id: 'AliceRecord1', created_by: 'alice' };
const bobRecord = { id: 'BobRecord123', created_by: 'bob' };

function fakeAudit() {
  return { log: vi.fn<AuditLog['log']>().mockResolvedValue(undefined) };
}

describe('decideAccess', () => {
  it('sends callers without identity to login for every action', () => {
    for (const action of ['create', 'list', 'edit'] as const) {
      expect(decideAccess(null, action, { authorizedUsers })).toEqual({
        outcome: 'redirect-to-login',
      });
    }
  });

  it('treats an empty login as no identity', () => {
    expect(decideAccess({ login: '', kind: 'admin' }, 'list', { authorizedUsers })).toEqual({
      outcome: 'redirect-to-login',
    });
  });

  it('lets admins do everything, including editing records of others', () => {
    expect(decideAccess(admin, 'edit', { authorizedUsers, target: bobRecord })).toEqual({
      outcome: 'allow',
      caller: admin,
      scope: 'all',
    });
  });

  it('limits authorized users to their own records', () => {
    expect(decideAccess(alice, 'create', { authorizedUsers })).toMatchObject({
      outcome: 'allow',
      scope: 'own',
    });
    expect(decideAccess(alice, 'list', { authorizedUsers })).toMatchObject({
      outcome: 'allow',
      scope: 'own',
    });
    expect(decideAccess(alice, 'edit', { authorizedUsers, target: aliceRecord })).toMatchObject({
      outcome: 'allow',
    });
    expect(decideAccess(alice, 'edit', { authorizedUsers, target: bobRecord })).toEqual({
      outcome: 'forbidden',
      caller: alice,
      reason: 'not_owner',
    });
  });

  it('forbids users outside the authorized set', () => {
    for (const action of ['create', 'list', 'edit'] as const) {
      expect(decideAccess(mallory, action, { authorizedUsers })).toEqual({
        outcome: 'forbidden',
        caller: mallory,
        reason: 'not_authorized',
      });
    }
  });
});

describe('createAuthorizationPolicy', () => {
  it('logs unauthorized access with login and remote address', async () => {
    const audit = fakeAudit();
    const policy = createAuthorizationPolicy({ authorizedUsers, audit });

    const decision = await policy.authorize(mallory, 'create', { remoteAddress: '10.0.0.7' });

    expect(decision.outcome).toBe('forbidden');
    expect(audit.log).toHaveBeenCalledTimes(1);
    expect(audit.log).toHaveBeenCalledWith('mallory', 'UNAUTHORIZED_ACCESS', {
      message: 'Unauthorized create attempt by mallory (10.0.0.7)',
      action: 'create',
      remoteAddress: '10.0.0.7',
    });
  });

  it('logs an edit of someone else’s record', async () => {
    const audit = fakeAudit();
    const policy = createAuthorizationPolicy({ authorizedUsers, audit });

    const decision = await policy.authorize(alice, 'edit', { target: bobRecord });

    expect(decision).toMatchObject({ outcome: 'forbidden', reason: 'not_owner' });
    expect(audit.log).toHaveBeenCalledWith('alice', 'FORBIDDEN_EDIT', {
      message: 'alice attempted to edit announcement BobRecord123 without permission (unknown)',
      announcementId: 'BobRecord123',
      remoteAddress: 'unknown',
    });
  });

  it('writes the audit entry before returning the decision', async () => {
    const order: string[] = [];
    const audit: AuditLog = {
      log: vi.fn(async () => {
        await Promise.resolve();
        order.push('logged');
      }),
    };
    const policy = createAuthorizationPolicy({ authorizedUsers, audit });

    await policy.authorize(mallory, 'list').then(() => order.push('returned'));

    expect(order).toEqual(['logged', 'returned']);
  });

  it('does not log allowed or redirected requests', async () => {
    const audit = fakeAudit();
    const policy = createAuthorizationPolicy({ authorizedUsers, audit });

    await policy.authorize(admin, 'list');
    await policy.authorize(alice, 'edit', { target: aliceRecord });
    await policy.authorize(null, 'create');

    expect(audit.log).not.toHaveBeenCalled();
  });
});
