/**
 * @fileoverview Announcement domain types shared by the store, the
 * authorization policy, the service and the route handlers.
 * @module types/announcement
 */

/** Serialized payload of one announcement. `id` lives in the storage key. */
export type AnnouncementRecord = {
  title: string;
  description: string;
  start_date: string; // ISO-8601
  end_date: string; // ISO-8601
  color: string;
  link?: string;
  created_by: string; // login, immutable
  created_at: string; // UTC ISO, immutable
  updated_at?: string; // UTC ISO, set on every edit
};

export type Announcement = AnnouncementRecord & { id: string };

export type AnnouncementField =
  | 'title'
  | 'description'
  | 'start_date'
  | 'end_date'
  | 'color'
  | 'link';

/**
 * Authenticated actor as reported by the identity provider.
 * `kind` is 'admin' for staff administrators; any other value is a regular user.
 */
export type CallerIdentity = {
  login: string;
  kind: string;
};

export type RequestContext = {
  remoteAddress?: string;
};

/* ─── Errors / results ─── */

export type FieldErrors = Partial<Record<AnnouncementField, string[]>>;
export type SubmittedValues = Partial<Record<AnnouncementField, string>>;

export type ForbiddenReason = 'not_authorized' | 'not_owner';

export type AnnouncementError =
  | {
      kind: 'validation';
      message: string;
      fieldErrors: FieldErrors;
      /** What the caller sent, so the form can be shown again. */
      values: SubmittedValues;
    }
  | { kind: 'unauthenticated' }
  | { kind: 'forbidden'; reason: ForbiddenReason }
  | { kind: 'not_found'; id: string }
  | { kind: 'storage'; message: string };

export type ServiceResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: AnnouncementError };
