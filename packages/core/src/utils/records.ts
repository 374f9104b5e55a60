/**
 * Helpers for the string-keyed records stored inside documents.
 *
 * Documents key records by caller-supplied names (agents, skills,
 * investigations), so lookups must only see own properties.
 */

/** The one key that cannot survive a schema round-trip as a record key. */
export function isReservedKey(key: string): boolean {
  return key === '__proto__';
}

export function hasOwnKey(record: Readonly<Record<string, unknown>>, key: string): boolean {
  return Object.hasOwn(record, key);
}

/** Own value under `key`, or undefined when the record has no such entry. */
export function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/** True when `JSON.stringify` accepts the value (no cycles, no BigInt). */
export function isJsonSerializable(value: unknown): boolean {
  try {
    JSON.stringify(value);
    return true;
  } catch {
    return false;
  }
}
