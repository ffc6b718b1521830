/**
 * Store File Type Definitions
 *
 * On-disk layout: one pretty-printed JSON object keyed by entry key,
 * followed by a newline.
 *
 *   {
 *       "name": {
 *           "value": "John",
 *           "expiration": 1700000300
 *       }
 *   }
 */

import { z } from 'zod';
import { JsonValue } from '../../common/Types';

export const STORE_FILE_INDENT = 4;
export const STORE_FILE_TEMP_SUFFIX = '.tmp';

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === 'object') {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

// Validated in place rather than rebuilt, so nested keys survive as-is.
export const jsonValueSchema = z.custom<JsonValue>(isJsonValue, { message: 'Expected a JSON value' });

/**
 * Any object counts as an entry. A missing value reads as null and a
 * missing or non-numeric expiration as "never expires".
 */
export const entrySchema = z.object({
  value: jsonValueSchema.catch(null),
  expiration: z.number().finite().nullable().catch(null),
});
