import { Entry, StoreSnapshot } from '../common/Types';
import { InvalidTtlError } from '../common/Errors';
import { toSnapshot } from './Snapshot';

export const SECONDS_PER_MINUTE = 60;

/**
 * Convert a TTL in minutes into an absolute expiration in epoch seconds.
 *
 * A missing TTL and a TTL of 0 both mean "never expires". Negative TTLs
 * are allowed and yield an entry that is already expired.
 */
export function computeExpiration(ttlMinutes: number | null | undefined, now: number): number | null {
  if (ttlMinutes === undefined || ttlMinutes === null || ttlMinutes === 0) {
    return null;
  }
  if (!Number.isFinite(ttlMinutes)) {
    throw new InvalidTtlError(ttlMinutes);
  }
  return now + Math.round(ttlMinutes * SECONDS_PER_MINUTE);
}

export function isExpired(entry: Entry, now: number): boolean {
  return entry.expiration !== null && entry.expiration <= now;
}

export interface ExpirationPartition {
  expired: StoreSnapshot;
  active: StoreSnapshot;
}

/**
 * Split entries into expired and active copies. Every key lands in
 * exactly one side.
 */
export function partitionByExpiration(entries: Iterable<[string, Entry]>, now: number): ExpirationPartition {
  const expired: Array<[string, Entry]> = [];
  const active: Array<[string, Entry]> = [];

  for (const pair of entries) {
    if (isExpired(pair[1], now)) {
      expired.push(pair);
    } else {
      active.push(pair);
    }
  }

  return { expired: toSnapshot(expired), active: toSnapshot(active) };
}
