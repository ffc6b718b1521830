/**
 * ExpiringStore - Flat-file key-value store with per-key TTL
 *
 * Every reading or mutating operation starts from a fresh load of the
 * backing file: read → sweep expired entries → persist. The operations
 * that act on the current in-memory state (expire, expireAll,
 * removeAll, expireAllExpired and the detail views) skip that reload.
 *
 * Calls on one instance are serialized; nothing coordinates separate
 * processes sharing a file.
 */

import { IExpiringStore, IStoreFile } from '../interfaces/Storage';
import { StoreConfig, ResolvedStoreConfig, resolveStoreConfig } from '../common/Config';
import { JsonValue, Logger, StoreEntries, StoreSnapshot } from '../common/Types';
import { AsyncMutex } from '../common/AsyncMutex';
import { StoreFile } from './file';
import { computeExpiration, isExpired, partitionByExpiration } from './Expiration';
import { toSnapshot } from './Snapshot';

export interface ExpiringStoreDependencies {
  storeFile?: IStoreFile;
}

export class ExpiringStore implements IExpiringStore {
  private readonly config: ResolvedStoreConfig;
  private readonly storeFile: IStoreFile;
  private readonly logger: Logger;
  private readonly mutex = new AsyncMutex();

  private data: StoreEntries = new Map();
  private loaded: boolean = false;

  /**
   * @param config - Store configuration; unset fields fall back to the
   *   KVSTORE_FILE environment variable and the defaults
   * @param dependencies - Optional injected dependencies (for testing)
   */
  constructor(config: Partial<StoreConfig> = {}, dependencies?: ExpiringStoreDependencies) {
    this.config = resolveStoreConfig(config);
    this.logger = this.config.logger;
    this.storeFile = dependencies?.storeFile ?? new StoreFile({
      filePath: this.config.filePath,
      logger: this.logger,
    });
  }

  public get filePath(): string {
    return this.storeFile.filePath;
  }

  async load(): Promise<StoreSnapshot> {
    return this.mutex.runExclusive(async () => {
      await this.reload();
      return toSnapshot(this.data);
    });
  }

  async add(key: string, value: JsonValue, ttlMinutes?: number | null): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const expiration = computeExpiration(ttlMinutes, this.config.now());
      await this.reload();
      this.data.set(key, { value: structuredClone(value), expiration });
      await this.persist();
    });
  }

  async update(key: string, value: JsonValue, ttlMinutes?: number | null): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const expiration = computeExpiration(ttlMinutes, this.config.now());
      await this.reload();
      if (!this.data.has(key)) {
        return;
      }
      this.data.set(key, { value: structuredClone(value), expiration });
      await this.persist();
    });
  }

  async remove(key: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.reload();
      this.data.delete(key);
      await this.persist();
    });
  }

  async get(key: string): Promise<JsonValue | null> {
    return this.mutex.runExclusive(async () => {
      await this.reload();
      const entry = this.data.get(key);
      return entry ? structuredClone(entry.value) : null;
    });
  }

  async has(key: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      await this.reload();
      return this.data.has(key);
    });
  }

  async getAll(): Promise<StoreSnapshot> {
    return this.load();
  }

  async expire(key: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.ensureLoaded();
      const entry = this.data.get(key);
      if (!entry) {
        return;
      }
      entry.expiration = this.config.now();
      await this.persist();
    });
  }

  async expireAll(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.ensureLoaded();
      const now = this.config.now();
      for (const entry of this.data.values()) {
        entry.expiration = now;
      }
      await this.persist();
    });
  }

  async getExpiredDetails(): Promise<StoreSnapshot> {
    return this.mutex.runExclusive(async () => {
      await this.ensureLoaded();
      return partitionByExpiration(this.data, this.config.now()).expired;
    });
  }

  async getActiveDetails(): Promise<StoreSnapshot> {
    return this.mutex.runExclusive(async () => {
      await this.ensureLoaded();
      return partitionByExpiration(this.data, this.config.now()).active;
    });
  }

  async removeAll(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.data = new Map();
      this.loaded = true;
      await this.persist();
    });
  }

  async expireAllExpired(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      await this.ensureLoaded();
      return this.purgeExpired();
    });
  }

  /**
   * Read the file, drop everything expired as of now, and write the
   * result back. The write happens even when nothing changed, so a
   * missing file is created on first use.
   */
  private async reload(): Promise<void> {
    this.data = await this.storeFile.read();
    this.loaded = true;
    const swept = await this.purgeExpired();
    if (swept > 0) {
      this.logger.log(`Store: Swept ${swept} expired ${swept === 1 ? 'entry' : 'entries'} from ${this.filePath}`);
    }
  }

  // An instance that has never read its file loads once before acting on
  // memory, so it cannot overwrite entries it has not seen.
  private async ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      await this.reload();
    }
  }

  private async purgeExpired(): Promise<number> {
    const now = this.config.now();
    let removed = 0;
    for (const [key, entry] of this.data) {
      if (isExpired(entry, now)) {
        this.data.delete(key);
        removed++;
      }
    }
    await this.persist();
    return removed;
  }

  private async persist(): Promise<void> {
    await this.storeFile.write(this.data);
  }
}
