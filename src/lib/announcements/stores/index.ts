/**
 * @fileoverview Record store backends: public API.
 * @module lib/announcements/stores
 */
import type { StoreConfig } from '@/lib/constants/config';
import { createAdminClient } from '@/lib/supabase/admin';
import { FileRecordStore } from './fileRecordStore';
import { MemoryRecordStore } from './memoryRecordStore';
import { SupabaseRecordStore } from './supabaseRecordStore';
import type { RecordStore } from './types';

export { FileRecordStore } from './fileRecordStore';
export { MemoryRecordStore } from './memoryRecordStore';
export { SupabaseRecordStore } from './supabaseRecordStore';
export { RecordStoreError, type RecordStore } from './types';

export function createRecordStore(config: StoreConfig): RecordStore {
  switch (config.kind) {
    case 'file':
      return new FileRecordStore(config.dir);
    case 'supabase':
      return new SupabaseRecordStore(createAdminClient(config.url, config.serviceRoleKey));
    case 'memory':
      return new MemoryRecordStore();
  }
}
