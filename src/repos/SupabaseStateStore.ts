import type { SupabaseClient } from '@supabase/supabase-js';
import type { UserRecords } from '../types/domain';
import { StorageError } from '../utils/errors';
import { decodeUserRecord } from './recordCodec';
import type { StateStore } from './StateStore';

const TABLE = 'user_records';

/** Same whole-mapping contract as the file store, one row per user. */
export class SupabaseStateStore implements StateStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async load(): Promise<UserRecords> {
    const { data, error } = await this.supabase.from(TABLE).select('user_id,record');

    if (error) {
      throw new StorageError(`Cannot load ${TABLE}: ${error.message}`, { cause: error });
    }

    const records: UserRecords = {};
    for (const row of data ?? []) {
      if (typeof row.user_id === 'string' && row.user_id) {
        records[row.user_id] = decodeUserRecord(row.record);
      }
    }
    return records;
  }

  async save(records: UserRecords): Promise<void> {
    const updatedAt = new Date().toISOString();
    const rows = Object.entries(records).map(([userId, record]) => ({
      user_id: userId,
      record,
      updated_at: updatedAt
    }));

    if (rows.length === 0) {
      return;
    }

    const { error } = await this.supabase.from(TABLE).upsert(rows, { onConflict: 'user_id' });
    if (error) {
      throw new StorageError(`Cannot save ${TABLE}: ${error.message}`, { cause: error });
    }
  }
}
