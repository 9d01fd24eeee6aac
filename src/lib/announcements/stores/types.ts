import type { Announcement, AnnouncementRecord } from '@/types/announcement';

/**
 * Persistence for announcements: one record per id, no cache.
 * Implementations re-read their backing storage on every call.
 */
export interface RecordStore {
  /** Backend identifier (e.g. "file", "supabase", "memory"). */
  readonly id: string;

  /** Write or overwrite the whole record for `id`. */
  put(id: string, record: AnnouncementRecord): Promise<void>;

  /** The record with its id attached, or null when unknown. */
  get(id: string): Promise<Announcement | null>;

  /** Every readable record. Malformed ones are skipped and logged. */
  listAll(): Promise<Announcement[]>;
}

export class RecordStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecordStoreError';
  }
}

/** Field order of the persisted payload; `undefined` values are omitted. */
export function toPersistedPayload(record: AnnouncementRecord): AnnouncementRecord {
  return {
    title: record.title,
    description: record.description,
    start_date: record.start_date,
    end_date: record.end_date,
    color: record.color,
    link: record.link,
    created_by: record.created_by,
    created_at: record.created_at,
    updated_at: record.updated_at,
  };
}
