import type { UserRecords } from '../types/domain';

/**
 * Durable mapping from user id to record. Every save replaces the whole
 * mapping; there are no partial updates.
 */
export interface StateStore {
  load(): Promise<UserRecords>;
  save(records: UserRecords): Promise<void>;
}
