export { ExpiringStore } from './storage/ExpiringStore';
export type { ExpiringStoreDependencies } from './storage/ExpiringStore';
export { computeExpiration, isExpired, partitionByExpiration, SECONDS_PER_MINUTE } from './storage/Expiration';
export type { ExpirationPartition } from './storage/Expiration';
export { StoreFile, parseStoreDocument, serializeStoreDocument, isJsonValue, jsonValueSchema, entrySchema } from './storage/file';
export type { StoreFileConfig, ParseResult } from './storage/file';
export { toSnapshot } from './storage/Snapshot';
export { kv, configureDefaultStore, getDefaultStore, resetDefaultStore } from './storage/DefaultStore';
export { DefaultStoreFactory } from './factory/StorageFactory';
export { DEFAULT_CONFIG, STORE_FILE_ENV_VAR, resolveStoreConfig, systemClock } from './common/Config';
export type { StoreConfig, ResolvedStoreConfig } from './common/Config';
export { StorageError, InvalidTtlError, StoreFileError, ConfigError } from './common/Errors';
export type { Clock, Entry, JsonPrimitive, JsonValue, Logger, StoreEntries, StoreSnapshot } from './common/Types';
export type { IExpiringStore, IStoreFile, IStoreFactory } from './interfaces/Storage';
