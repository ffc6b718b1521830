import { Entry, StoreSnapshot } from '../common/Types';

/**
 * Copy entries into a plain object. Object.fromEntries defines own
 * properties, so a `__proto__` key stays a key.
 */
export function toSnapshot(entries: Iterable<[string, Entry]>): StoreSnapshot {
  const pairs: Array<[string, Entry]> = [];
  for (const [key, entry] of entries) {
    pairs.push([key, structuredClone(entry)]);
  }
  return Object.fromEntries(pairs);
}
