import type { StoredDocument } from './types.js';

/** Decode raw stored text into a StoredDocument without applying any schema. */
export function parseStoredContent(content: string): StoredDocument {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    return { state: 'corrupt', version: 0, reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return { state: 'corrupt', version: 0, reason: 'document is not a JSON object' };
  }
  const version = 'version' in data ? data.version : undefined;
  if (typeof version !== 'number' || !Number.isInteger(version) || version < 1) {
    return { state: 'corrupt', version: 0, reason: 'missing or invalid version counter' };
  }
  return { state: 'present', version, data };
}
