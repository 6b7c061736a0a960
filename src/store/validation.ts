import type { SecondaryIndex } from '../types.js';
import { parseIndexName } from '../query/index-lookup.js';
import { StoreError } from '../errors.js';
import { INT_INDEX_MAX, INT_INDEX_MIN } from '../config.js';

/**
 * Checks an object before it is written: keys must be non-empty and every
 * index value must match the kind its name declares. `_int` values must lie
 * within the numeric lookup bounds, or open-ended range lookups would miss them.
 */
export function validateObject(key: string, indexes: readonly SecondaryIndex[]): void {
  if (key.length === 0) {
    throw new StoreError('Object key must not be empty');
  }
  for (const { name, value } of indexes) {
    const parsed = parseIndexName(name);
    if (parsed === null) {
      throw new StoreError(`Index name "${name}" must end in _bin or _int`);
    }
    const expected = parsed.kind === 'bin' ? 'string' : 'number';
    if (typeof value !== expected) {
      throw new StoreError(`Index "${name}" takes ${expected} values, got ${typeof value}`);
    }
    if (typeof value === 'number' && !(value >= INT_INDEX_MIN && value <= INT_INDEX_MAX)) {
      throw new StoreError(`Index "${name}" value ${value} is outside [${INT_INDEX_MIN}, ${INT_INDEX_MAX}]`);
    }
  }
}
