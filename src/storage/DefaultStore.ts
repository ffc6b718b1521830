/**
 * Process-wide default store, for callers that want module-level access
 * instead of owning an ExpiringStore instance.
 *
 *   import { kv } from 'flatfile-kv-store';
 *   await kv.add('session', { user: 'alice' }, 30);
 *
 * The instance is created on first use from the default configuration
 * (`.env`, or the KVSTORE_FILE environment variable) unless
 * configureDefaultStore() ran first.
 */

import { StoreConfig } from '../common/Config';
import { JsonValue, StoreSnapshot } from '../common/Types';
import { IExpiringStore, IStoreFactory } from '../interfaces/Storage';
import { DefaultStoreFactory } from '../factory/StorageFactory';

let defaultStore: IExpiringStore | null = null;

export function configureDefaultStore(
  config: Partial<StoreConfig> = {},
  factory: IStoreFactory = new DefaultStoreFactory(config)
): IExpiringStore {
  defaultStore = factory.createStore();
  return defaultStore;
}

export function getDefaultStore(): IExpiringStore {
  return defaultStore ?? configureDefaultStore();
}

export function resetDefaultStore(): void {
  defaultStore = null;
}

export const kv = {
  load: (): Promise<StoreSnapshot> => getDefaultStore().load(),
  add: (key: string, value: JsonValue, ttlMinutes?: number | null): Promise<void> =>
    getDefaultStore().add(key, value, ttlMinutes),
  update: (key: string, value: JsonValue, ttlMinutes?: number | null): Promise<void> =>
    getDefaultStore().update(key, value, ttlMinutes),
  remove: (key: string): Promise<void> => getDefaultStore().remove(key),
  get: (key: string): Promise<JsonValue | null> => getDefaultStore().get(key),
  has: (key: string): Promise<boolean> => getDefaultStore().has(key),
  getAll: (): Promise<StoreSnapshot> => getDefaultStore().getAll(),
  expire: (key: string): Promise<void> => getDefaultStore().expire(key),
  expireAll: (): Promise<void> => getDefaultStore().expireAll(),
  getExpiredDetails: (): Promise<StoreSnapshot> => getDefaultStore().getExpiredDetails(),
  getActiveDetails: (): Promise<StoreSnapshot> => getDefaultStore().getActiveDetails(),
  removeAll: (): Promise<void> => getDefaultStore().removeAll(),
  expireAllExpired: (): Promise<number> => getDefaultStore().expireAllExpired(),
};
