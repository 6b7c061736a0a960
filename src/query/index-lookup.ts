import type { IndexKind, IndexLookup } from '../types.js';
import { InvalidOperatorError } from '../errors.js';
import { INT_INDEX_MAX, INT_INDEX_MIN } from '../config.js';
import type { Filter, FilterValue } from './types.js';

/**
 * Translates one filter into a secondary index lookup.
 *
 * Strings go to the `<field>_bin` index, numbers to `<field>_int`. Strict and
 * non-strict comparisons produce the same inclusive range; the predicate stage
 * applies the exact operator afterwards. For `bin` indexes the open bound is the
 * empty string, so `>`/`>=` on a string value yields an empty range.
 */
export function toIndexLookup(bucket: string, filter: Filter): IndexLookup {
  const { field, op, value } = filter;
  const kind: IndexKind = typeof value === 'string' ? 'bin' : 'int';
  const [min, max]: [FilterValue, FilterValue] = kind === 'bin' ? ['', ''] : [INT_INDEX_MIN, INT_INDEX_MAX];
  const index = `${field}_${kind}`;

  switch (op) {
    case '==':
      return { kind: 'exact', bucket, index, value };
    case '>':
    case '>=':
      return { kind: 'range', bucket, index, start: value, end: max };
    case '<':
    case '<=':
      return { kind: 'range', bucket, index, start: min, end: value };
    default:
      throw new InvalidOperatorError(op);
  }
}

/**
 * Splits `<field>_<kind>` into its parts. Returns null for names without a
 * recognised suffix.
 */
export function parseIndexName(name: string): { field: string; kind: IndexKind } | null {
  const match = /^(.+)_(bin|int)$/.exec(name);
  if (match === null) return null;
  const [, field, kind] = match;
  if (field === undefined || (kind !== 'bin' && kind !== 'int')) return null;
  return { field, kind };
}
