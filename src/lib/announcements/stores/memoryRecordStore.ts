import type { Announcement, AnnouncementRecord } from '@/types/announcement';
import { toPersistedPayload, type RecordStore } from './types';

/** Process-local store. Records are copied in and out, like a real backend. */
export class MemoryRecordStore implements RecordStore {
  readonly id = 'memory';
  private readonly records = new Map<string, AnnouncementRecord>();

  async put(id: string, record: AnnouncementRecord): Promise<void> {
    this.records.set(id, structuredClone(toPersistedPayload(record)));
  }

  async get(id: string): Promise<Announcement | null> {
    const record = this.records.get(id);
    return record ? { ...structuredClone(record), id } : null;
  }

  async listAll(): Promise<Announcement[]> {
    return [...this.records.entries()].map(([id, record]) => ({ ...structuredClone(record), id }));
  }
}
