/**
 * Common type definitions for the KV store.
 * These types are used across the store, its file layer and its callers.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * A stored value plus its absolute expiration in epoch seconds.
 * `null` means the entry never expires.
 */
export interface Entry {
  value: JsonValue;
  expiration: number | null;
}

/** Plain-object view handed to callers and written to disk. */
export type StoreSnapshot = Record<string, Entry>;

/** In-memory form; a Map keeps keys such as `__proto__` as ordinary keys. */
export type StoreEntries = Map<string, Entry>;

/** Returns the current time in epoch seconds. */
export type Clock = () => number;

export type Logger = Pick<Console, 'log' | 'warn'>;
