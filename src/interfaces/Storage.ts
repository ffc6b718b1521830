import { JsonValue, StoreEntries, StoreSnapshot } from '../common/Types';

/**
 * Persistence for the whole set of entries.
 *
 * read() never fails on a missing or malformed file; it yields no
 * entries instead. write() failures propagate.
 */
export interface IStoreFile {
  readonly filePath: string;
  read(): Promise<StoreEntries>;
  write(entries: StoreEntries): Promise<void>;
}

export interface IExpiringStore {
  /**
   * Re-read the backing file, sweep expired entries and persist.
   * @returns a copy of the fresh snapshot
   */
  load(): Promise<StoreSnapshot>;

  add(key: string, value: JsonValue, ttlMinutes?: number | null): Promise<void>;

  /** No-op when the key is absent. */
  update(key: string, value: JsonValue, ttlMinutes?: number | null): Promise<void>;

  remove(key: string): Promise<void>;

  /** @returns the value, or null when the key is absent or expired */
  get(key: string): Promise<JsonValue | null>;

  has(key: string): Promise<boolean>;

  getAll(): Promise<StoreSnapshot>;

  /**
   * The operations below act on the in-memory state without re-reading
   * the file first.
   */
  expire(key: string): Promise<void>;

  expireAll(): Promise<void>;

  getExpiredDetails(): Promise<StoreSnapshot>;

  getActiveDetails(): Promise<StoreSnapshot>;

  removeAll(): Promise<void>;

  /** @returns the number of entries removed */
  expireAllExpired(): Promise<number>;
}

export interface IStoreFactory {
  createStoreFile(): IStoreFile;
  createStore(): IExpiringStore;
}
