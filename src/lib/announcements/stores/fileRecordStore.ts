/**
 * @fileoverview Flat-file record store: `<dir>/<id>.json`, one announcement
 * per file, pretty-printed JSON without the id.
 *
 * Writes go to a temp file in the same directory and are renamed into place,
 * serialized per id. Single-process only: there is no cross-process locking.
 * @module lib/announcements/stores/fileRecordStore
 */
import crypto from 'crypto';
import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { isAnnouncementId } from '@/lib/announcements/idGenerator';
import { logWithContext } from '@/lib/observability/logger';
import { parseStoredAnnouncement } from '@/lib/validations/announcement.schema';
import type { Announcement, AnnouncementRecord } from '@/types/announcement';
import { KeyedMutex } from './keyedMutex';
import { RecordStoreError, toPersistedPayload, type RecordStore } from './types';

const RECORD_EXT = '.json';

function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

export class FileRecordStore implements RecordStore {
  readonly id = 'file';
  private readonly mutex = new KeyedMutex();
  private readonly log: Logger;

  constructor(
    private readonly dir: string,
    opts?: { logger?: Logger },
  ) {
    this.log = opts?.logger ?? logWithContext({ service: 'record-store', backend: 'file' });
  }

  private pathFor(id: string): string {
    return path.join(this.dir, `${id}${RECORD_EXT}`);
  }

  async put(id: string, record: AnnouncementRecord): Promise<void> {
    if (!isAnnouncementId(id)) {
      throw new RecordStoreError(`Invalid announcement id: ${JSON.stringify(id)}`);
    }

    await this.mutex.run(id, async () => {
      await mkdir(this.dir, { recursive: true });

      const target = this.pathFor(id);
      const tmp = `${target}.${crypto.randomUUID()}.tmp`;
      const body = JSON.stringify(toPersistedPayload(record), null, 4);

      try {
        await writeFile(tmp, body, 'utf8');
        await rename(tmp, target);
      } catch (err: unknown) {
        await rm(tmp, { force: true });
        throw new RecordStoreError(`Failed to write announcement ${id}`, { cause: err });
      }
    });
  }

  async get(id: string): Promise<Announcement | null> {
    // Ids come from URLs; anything outside the id alphabet never maps to a path.
    if (!isAnnouncementId(id)) return null;

    let raw: string;
    try {
      raw = await readFile(this.pathFor(id), 'utf8');
    } catch (err: unknown) {
      if (hasErrorCode(err, 'ENOENT')) return null;
      throw new RecordStoreError(`Failed to read announcement ${id}`, { cause: err });
    }

    const record = this.decode(id, raw);
    if (!record) {
      throw new RecordStoreError(`Announcement ${id} is malformed`);
    }
    return { ...record, id };
  }

  async listAll(): Promise<Announcement[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err: unknown) {
      if (hasErrorCode(err, 'ENOENT')) return [];
      throw new RecordStoreError(`Failed to list ${this.dir}`, { cause: err });
    }

    const announcements: Announcement[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(RECORD_EXT)) continue;
      const id = entry.slice(0, -RECORD_EXT.length);
      if (!isAnnouncementId(id)) continue;

      try {
        const raw = await readFile(path.join(this.dir, entry), 'utf8');
        const record = this.decode(id, raw);
        if (record) announcements.push({ ...record, id });
      } catch (err: unknown) {
        this.log.warn({ err, announcementId: id }, 'Skipping unreadable announcement file');
      }
    }
    return announcements;
  }

  /** Parsed record, or null (with a warning) when the payload is not a valid record. */
  private decode(id: string, raw: string): AnnouncementRecord | null {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err: unknown) {
      this.log.warn({ err, announcementId: id }, 'Skipping announcement with invalid JSON');
      return null;
    }

    const parsed = parseStoredAnnouncement(payload);
    if (!parsed.success) {
      this.log.warn({ announcementId: id, reason: parsed.reason }, 'Skipping malformed announcement');
      return null;
    }
    return parsed.record;
  }
}
