/**
 * @fileoverview Access rules for announcement management.
 *
 * Reglas, en orden:
 *  1. Sin identidad → redirect-to-login.
 *  2. kind === 'admin' → todo permitido.
 *  3. Usuario autorizado (AUTHORIZED_USERS) → crear; listar/editar solo lo propio.
 *  4. Cualquier otro usuario → forbidden.
 *
 * `decideAccess` is pure. `createAuthorizationPolicy` wraps it and writes
 * every forbidden decision to the audit log before returning it.
 * @module lib/announcements/authorization
 */
import type { AuditLog } from '@/services/audit.service';
import type {
  Announcement,
  CallerIdentity,
  ForbiddenReason,
  RequestContext,
} from '@/types/announcement';

export type AnnouncementAction = 'create' | 'list' | 'edit';

/** 'all' for admins, 'own' for authorized users (records they created). */
export type AccessScope = 'all' | 'own';

export type AccessDecision =
  | { outcome: 'allow'; caller: CallerIdentity; scope: AccessScope }
  | { outcome: 'redirect-to-login' }
  | { outcome: 'forbidden'; caller: CallerIdentity; reason: ForbiddenReason };

export type OwnedRecord = Pick<Announcement, 'id' | 'created_by'>;

export function isAdmin(caller: CallerIdentity): boolean {
  return caller.kind === 'admin';
}

export function decideAccess(
  caller: CallerIdentity | null,
  action: AnnouncementAction,
  opts: { authorizedUsers: ReadonlySet<string>; target?: OwnedRecord },
): AccessDecision {
  if (!caller || !caller.login) return { outcome: 'redirect-to-login' };

  if (isAdmin(caller)) return { outcome: 'allow', caller, scope: 'all' };

  if (!opts.authorizedUsers.has(caller.login)) {
    return { outcome: 'forbidden', caller, reason: 'not_authorized' };
  }

  if (action === 'edit' && opts.target && opts.target.created_by !== caller.login) {
    return { outcome: 'forbidden', caller, reason: 'not_owner' };
  }

  return { outcome: 'allow', caller, scope: 'own' };
}

export interface AccessRequest extends RequestContext {
  target?: OwnedRecord;
}

export interface AuthorizationPolicy {
  authorize(
    caller: CallerIdentity | null,
    action: AnnouncementAction,
    request?: AccessRequest,
  ): Promise<AccessDecision>;
}

export function createAuthorizationPolicy(deps: {
  authorizedUsers: ReadonlySet<string>;
  audit: AuditLog;
}): AuthorizationPolicy {
  return {
    async authorize(caller, action, request = {}) {
      const decision = decideAccess(caller, action, {
        authorizedUsers: deps.authorizedUsers,
        target: request.target,
      });

      if (decision.outcome !== 'forbidden') return decision;

      const actor = decision.caller.login || 'unknown';
      const remoteAddress = request.remoteAddress ?? 'unknown';

      if (decision.reason === 'not_owner' && request.target) {
        await deps.audit.log(actor, 'FORBIDDEN_EDIT', {
          message: `${actor} attempted to edit announcement ${request.target.id} without permission (${remoteAddress})`,
          announcementId: request.target.id,
          remoteAddress,
        });
      } else {
        await deps.audit.log(actor, 'UNAUTHORIZED_ACCESS', {
          message: `Unauthorized ${action} attempt by ${actor} (${remoteAddress})`,
          action,
          remoteAddress,
        });
      }

      return decision;
    },
  };
}
