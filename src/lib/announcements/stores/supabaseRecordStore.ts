/**
 * @fileoverview Record store backed by a Supabase `announcements` table.
 *
 * Expected table:
 *   id text primary key, title text, description text, start_date text,
 *   end_date text, color text, link text null, created_by text,
 *   created_at text, updated_at text null
 * @module lib/announcements/stores/supabaseRecordStore
 */
import type { SupabaseClient } from '@supabase/supabase-js';
import type { Logger } from 'pino';
import { z } from 'zod';
import { logWithContext } from '@/lib/observability/logger';
import { parseStoredAnnouncement } from '@/lib/validations/announcement.schema';
import type { Announcement, AnnouncementRecord } from '@/types/announcement';
import { KeyedMutex } from './keyedMutex';
import { RecordStoreError, type RecordStore } from './types';

const TABLE = 'announcements';

const SELECT_FIELDS =
  'id, title, description, start_date, end_date, color, link, created_by, created_at, updated_at';

const RowIdSchema = z.object({ id: z.string().min(1) });

export class SupabaseRecordStore implements RecordStore {
  readonly id = 'supabase';
  private readonly mutex = new KeyedMutex();
  private readonly log: Logger;

  constructor(
    private readonly client: SupabaseClient,
    opts?: { logger?: Logger },
  ) {
    this.log = opts?.logger ?? logWithContext({ service: 'record-store', backend: 'supabase' });
  }

  async put(id: string, record: AnnouncementRecord): Promise<void> {
    await this.mutex.run(id, async () => {
      const { error } = await this.client.from(TABLE).upsert(
        {
          id,
          title: record.title,
          description: record.description,
          start_date: record.start_date,
          end_date: record.end_date,
          color: record.color,
          link: record.link ?? null,
          created_by: record.created_by,
          created_at: record.created_at,
          updated_at: record.updated_at ?? null,
        },
        { onConflict: 'id' },
      );

      if (error) {
        throw new RecordStoreError(`Failed to write announcement ${id}: ${error.message}`);
      }
    });
  }

  async get(id: string): Promise<Announcement | null> {
    const { data, error } = await this.client
      .from(TABLE)
      .select(SELECT_FIELDS)
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw new RecordStoreError(`Failed to read announcement ${id}: ${error.message}`);
    }

    const row: unknown = data;
    if (!row) return null;

    const parsed = parseStoredAnnouncement(row);
    if (!parsed.success) {
      this.log.warn({ announcementId: id, reason: parsed.reason }, 'Malformed announcement row');
      throw new RecordStoreError(`Announcement ${id} is malformed`);
    }
    return { ...parsed.record, id };
  }

  async listAll(): Promise<Announcement[]> {
    const { data, error } = await this.client
      .from(TABLE)
      .select(SELECT_FIELDS)
      .order('start_date', { ascending: false });

    if (error) {
      throw new RecordStoreError(`Failed to list announcements: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    const announcements: Announcement[] = [];

    for (const row of rows) {
      const rowId = RowIdSchema.safeParse(row);
      if (!rowId.success) {
        this.log.warn('Skipping announcement row without id');
        continue;
      }

      const parsed = parseStoredAnnouncement(row);
      if (!parsed.success) {
        this.log.warn(
          { announcementId: rowId.data.id, reason: parsed.reason },
          'Skipping malformed announcement row',
        );
        continue;
      }
      announcements.push({ ...parsed.record, id: rowId.data.id });
    }
    return announcements;
  }
}
