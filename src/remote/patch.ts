import { isRecord } from '../utils';
import { isFieldTransform, type DocumentData } from './types';

/**
 * Apply a merge patch to a stored document and return the new document.
 *
 * - `{ name: 'x' }` replaces the top-level field.
 * - `{ 'readBy.u1': 42 }` sets one entry of the `readBy` map, creating the map
 *   when missing.
 * - `{ participantIds: arrayUnion('u3') }` resolves against the stored array.
 * - `undefined` values are skipped.
 *
 * The input document is not modified.
 */
export function applyPatch(base: DocumentData | null, patch: DocumentData): DocumentData {
  const result: DocumentData = base ? structuredClone(base) : {};

  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;

    const parts = key.split('.');
    const last = parts[parts.length - 1];
    let container = result;
    for (const part of parts.slice(0, -1)) {
      const next = container[part];
      if (isRecord(next)) {
        container = next;
      } else {
        const created: DocumentData = {};
        container[part] = created;
        container = created;
      }
    }

    if (isFieldTransform(value)) {
      const current = container[last];
      const existing = Array.isArray(current)
        ? current.filter((v): v is string => typeof v === 'string')
        : [];
      if (value.__transform === 'arrayUnion') {
        const added = value.values.filter((v, i, all) => !existing.includes(v) && all.indexOf(v) === i);
        container[last] = [...existing, ...added];
      } else {
        container[last] = existing.filter((v) => !value.values.includes(v));
      }
    } else {
      container[last] = structuredClone(value);
    }
  }

  return result;
}
