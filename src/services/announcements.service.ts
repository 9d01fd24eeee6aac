/**
 * @fileoverview Announcement lifecycle: create, list, edit and the public
 * active view. Authorization always runs before storage is touched.
 *
 * Every operation returns a ServiceResult; nothing here throws to the caller.
 * @module services/announcements.service
 */
import type { Logger } from 'pino';
import type { AccessDecision, AuthorizationPolicy } from '@/lib/announcements/authorization';
import { generateAnnouncementId } from '@/lib/announcements/idGenerator';
import type { RecordStore } from '@/lib/announcements/stores';
import { selectActiveAnnouncements, sortForListing } from '@/lib/announcements/visibility';
import { APP_CONFIG } from '@/lib/constants/config';
import { logWithContext } from '@/lib/observability/logger';
import { truncateUtf8 } from '@/lib/utils/text';
import { parseAnnouncementForm } from '@/lib/validations/announcement.schema';
import type { AuditLog } from '@/services/audit.service';
import type {
  Announcement,
  AnnouncementError,
  AnnouncementRecord,
  CallerIdentity,
  RequestContext,
  ServiceResult,
} from '@/types/announcement';

export interface AnnouncementServiceDeps {
  store: RecordStore;
  policy: AuthorizationPolicy;
  audit: AuditLog;
  now?: () => Date;
  generateId?: () => string;
  logger?: Logger;
}

export interface AnnouncementService {
  createAnnouncement(
    caller: CallerIdentity | null,
    input: unknown,
    ctx?: RequestContext,
  ): Promise<ServiceResult<string>>;
  listAnnouncements(
    caller: CallerIdentity | null,
    ctx?: RequestContext,
  ): Promise<ServiceResult<Announcement[]>>;
  getAnnouncementForEdit(
    caller: CallerIdentity | null,
    id: string,
    ctx?: RequestContext,
  ): Promise<ServiceResult<Announcement>>;
  editAnnouncement(
    caller: CallerIdentity | null,
    id: string,
    input: unknown,
    ctx?: RequestContext,
  ): Promise<ServiceResult<Announcement>>;
  /** Public dashboard view; no caller needed. */
  activeAnnouncements(now?: Date): Promise<Announcement[]>;
}

/* ─── Helpers ─── */

const REQUIRED_FIELDS_MESSAGE = 'All required fields must be filled in.';

type Failure = { ok: false; error: AnnouncementError };

function ok<T>(data: T): ServiceResult<T> {
  return { ok: true, data };
}

function fail(error: AnnouncementError): Failure {
  return { ok: false, error };
}

function denied(decision: Exclude<AccessDecision, { outcome: 'allow' }>): Failure {
  if (decision.outcome === 'redirect-to-login') return fail({ kind: 'unauthenticated' });
  return fail({ kind: 'forbidden', reason: decision.reason });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/* ─── Service ─── */

export function createAnnouncementService(deps: AnnouncementServiceDeps): AnnouncementService {
  const { store, policy, audit } = deps;
  const now = deps.now ?? (() => new Date());
  const generateId = deps.generateId ?? (() => generateAnnouncementId());
  const log = deps.logger ?? logWithContext({ service: 'announcements' });

  async function withStorage<T>(
    operation: string,
    task: () => Promise<T>,
  ): Promise<ServiceResult<T>> {
    try {
      return ok(await task());
    } catch (err: unknown) {
      log.error({ err, operation }, 'Announcement storage failure');
      return fail({ kind: 'storage', message: errorMessage(err) });
    }
  }

  /** Shared by get-for-edit and edit: gate, lookup, ownership. */
  async function loadEditable(
    caller: CallerIdentity | null,
    id: string,
    ctx: RequestContext,
  ): Promise<ServiceResult<{ caller: CallerIdentity; announcement: Announcement }>> {
    const gate = await policy.authorize(caller, 'edit', ctx);
    if (gate.outcome !== 'allow') return denied(gate);

    const lookup = await withStorage('get', () => store.get(id));
    if (!lookup.ok) return lookup;
    const announcement = lookup.data;
    if (!announcement) return fail({ kind: 'not_found', id });

    const decision = await policy.authorize(caller, 'edit', { ...ctx, target: announcement });
    if (decision.outcome !== 'allow') return denied(decision);

    return ok({ caller: decision.caller, announcement });
  }

  return {
    async createAnnouncement(caller, input, ctx = {}) {
      const decision = await policy.authorize(caller, 'create', ctx);
      if (decision.outcome !== 'allow') return denied(decision);

      const form = parseAnnouncementForm(input);
      if (!form.success) {
        return fail({
          kind: 'validation',
          message: REQUIRED_FIELDS_MESSAGE,
          fieldErrors: form.fieldErrors,
          values: form.values,
        });
      }

      const author = decision.caller.login;
      const id = generateId();
      const record: AnnouncementRecord = {
        title: form.data.title,
        description: truncateUtf8(form.data.description, APP_CONFIG.descriptionMaxBytes),
        start_date: form.data.start_date,
        end_date: form.data.end_date,
        color: form.data.color ?? APP_CONFIG.defaultAnnouncementColor,
        link: form.data.link,
        created_by: author,
        created_at: now().toISOString(),
      };

      const saved = await withStorage('put', () => store.put(id, record));
      if (!saved.ok) return saved;

      await audit.log(author, 'ANNOUNCEMENT_CREATED', {
        message: `${author} created announcement ${id}`,
        announcementId: id,
      });
      return ok(id);
    },

    async listAnnouncements(caller, ctx = {}) {
      const decision = await policy.authorize(caller, 'list', ctx);
      if (decision.outcome !== 'allow') return denied(decision);

      const all = await withStorage('listAll', () => store.listAll());
      if (!all.ok) return all;

      const login = decision.caller.login;
      const visible =
        decision.scope === 'all' ? all.data : all.data.filter((a) => a.created_by === login);
      return ok(sortForListing(visible));
    },

    async getAnnouncementForEdit(caller, id, ctx = {}) {
      const loaded = await loadEditable(caller, id, ctx);
      if (!loaded.ok) return loaded;
      return ok(loaded.data.announcement);
    },

    async editAnnouncement(caller, id, input, ctx = {}) {
      const loaded = await loadEditable(caller, id, ctx);
      if (!loaded.ok) return loaded;
      const { caller: editor, announcement: current } = loaded.data;

      const form = parseAnnouncementForm(input);
      if (!form.success) {
        return fail({
          kind: 'validation',
          message: REQUIRED_FIELDS_MESSAGE,
          fieldErrors: form.fieldErrors,
          values: form.values,
        });
      }

      // id, created_by and created_at are carried over untouched.
      const record: AnnouncementRecord = {
        title: form.data.title,
        description: truncateUtf8(form.data.description, APP_CONFIG.descriptionMaxBytes),
        start_date: form.data.start_date,
        end_date: form.data.end_date,
        color: form.data.color ?? current.color,
        link: form.data.link,
        created_by: current.created_by,
        created_at: current.created_at,
        updated_at: now().toISOString(),
      };

      const saved = await withStorage('put', () => store.put(id, record));
      if (!saved.ok) return saved;

      await audit.log(editor.login, 'ANNOUNCEMENT_UPDATED', {
        message: `${editor.login} updated announcement ${id}`,
        announcementId: id,
      });
      return ok({ ...record, id });
    },

    async activeAnnouncements(at = now()) {
      try {
        return selectActiveAnnouncements(await store.listAll(), at);
      } catch (err: unknown) {
        log.error({ err }, 'Active announcements unavailable; showing none');
        return [];
      }
    },
  };
}
