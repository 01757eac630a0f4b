import type { UserRecord, UserRecords } from '../types/domain';
import { KeyedQueue, withTimeout } from '../utils/async';
import { StorageError } from '../utils/errors';
import { emptyUserRecord } from './recordCodec';
import type { StateStore } from './StateStore';

const WRITE_KEY = 'records';

export class UserRecordRepo {
  private readonly writes = new KeyedQueue();

  constructor(
    private readonly store: StateStore,
    private readonly timeoutMs = 10_000
  ) {}

  async get(userId: string): Promise<UserRecord> {
    const records = await this.load();
    return records[userId] ?? emptyUserRecord();
  }

  async list(): Promise<UserRecords> {
    return this.load();
  }

  /**
   * Load, mutate one record, save the whole mapping. Calls are queued so that
   * two in-flight requests never overwrite each other's changes.
   *
   * The caller is rejected once `timeoutMs` passes, but the queue only moves
   * on when the store has settled. An update that times out before its load
   * returns is dropped; one that times out during its save may still land.
   */
  update<T>(userId: string, mutate: (record: UserRecord) => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      void this.writes.run(WRITE_KEY, async () => {
        let abandoned = false;
        const work = this.applyUpdate(userId, mutate, () => abandoned);

        void withTimeout(work, this.timeoutMs, () => {
          abandoned = true;
          return new StorageError(`State update timed out after ${this.timeoutMs}ms`);
        }).then(resolve, reject);

        // Failures reach the caller through the race above.
        await work.catch(() => undefined);
      });
    });
  }

  private async applyUpdate<T>(
    userId: string,
    mutate: (record: UserRecord) => T,
    isAbandoned: () => boolean
  ): Promise<T> {
    const records = await this.store.load();
    if (isAbandoned()) {
      throw new StorageError('State update abandoned after timeout');
    }

    const record = records[userId] ?? emptyUserRecord();
    const result = mutate(record);
    records[userId] = record;
    await this.store.save(records);
    return result;
  }

  private load(): Promise<UserRecords> {
    return withTimeout(
      this.store.load(),
      this.timeoutMs,
      () => new StorageError(`State load timed out after ${this.timeoutMs}ms`)
    );
  }
}
