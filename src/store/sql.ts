import type { IndexLookup } from '../types.js';
import { parseIndexName } from '../query/index-lookup.js';
import { StoreError } from '../errors.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

/**
 * Compiles an index lookup into a SELECT over kv_secondary_indexes. The index
 * name suffix picks the value column; both range bounds are inclusive.
 */
export function compileLookupQuery(lookup: IndexLookup): CompiledQuery {
  const parsed = parseIndexName(lookup.index);
  if (parsed === null) {
    throw new StoreError(`Index name "${lookup.index}" must end in _bin or _int`);
  }
  const column = parsed.kind === 'int' ? 'int_value' : 'bin_value';
  const params: unknown[] = [lookup.bucket, lookup.index];

  let condition: string;
  if (lookup.kind === 'exact') {
    params.push(lookup.value);
    condition = `${column} = $3`;
  } else {
    params.push(lookup.start, lookup.end);
    condition = `${column} BETWEEN $3 AND $4`;
  }

  const sql = [
    'SELECT DISTINCT key',
    'FROM kv_secondary_indexes',
    `WHERE bucket = $1 AND index_name = $2 AND ${condition}`,
    'ORDER BY key',
  ].join('\n');

  return { sql, params };
}

export function compileFetchKeysQuery(bucket: string, keys: readonly string[]): CompiledQuery {
  const sql = [
    'SELECT key, value',
    'FROM kv_objects',
    'WHERE bucket = $1 AND key = ANY($2::text[])',
    'ORDER BY key',
  ].join('\n');

  return { sql, params: [bucket, [...keys]] };
}

/**
 * Keyset-paginated scan of a whole bucket, ordered by key.
 */
export function compileScanQuery(bucket: string, afterKey: string, batchSize: number): CompiledQuery {
  const sql = [
    'SELECT key, value',
    'FROM kv_objects',
    'WHERE bucket = $1 AND key > $2',
    'ORDER BY key',
    'LIMIT $3',
  ].join('\n');

  return { sql, params: [bucket, afterKey, batchSize] };
}

export const SQL_UPSERT_OBJECT = `
INSERT INTO kv_objects (bucket, key, value)
VALUES ($1, $2, $3::jsonb)
ON CONFLICT (bucket, key) DO UPDATE SET value = EXCLUDED.value
`.trim();

export const SQL_DELETE_INDEXES = 'DELETE FROM kv_secondary_indexes WHERE bucket = $1 AND key = $2';

export const SQL_INSERT_INDEX = `
INSERT INTO kv_secondary_indexes (bucket, key, index_name, int_value, bin_value)
VALUES ($1, $2, $3, $4, $5)
`.trim();

export const SQL_DELETE_OBJECT = 'DELETE FROM kv_objects WHERE bucket = $1 AND key = $2';
