import type pg from 'pg';
import type {
  Document,
  IndexEntry,
  IndexLookup,
  JobInput,
  JobSpec,
  KeyValueStore,
  ResultTuple,
  SecondaryIndex,
  SubmitOptions,
} from '../types.js';
import { StoreError } from '../errors.js';
import { DEFAULT_BATCH_SIZE } from '../config.js';
import type { Now } from '../config.js';
import { runJob } from '../engine/local-job.js';
import { parseIndexName } from '../query/index-lookup.js';
import { applySchema } from './schema.js';
import { mapIndexRow, mapObjectRow } from './row-mapper.js';
import type { IndexRow, ObjectRow } from './row-mapper.js';
import {
  compileFetchKeysQuery,
  compileLookupQuery,
  compileScanQuery,
  SQL_DELETE_INDEXES,
  SQL_DELETE_OBJECT,
  SQL_INSERT_INDEX,
  SQL_UPSERT_OBJECT,
} from './sql.js';
import type { CompiledQuery } from './sql.js';
import { validateObject } from './validation.js';

export interface PostgresStoreConfig {
  pool: pg.Pool;
  /** Keys per fetch and rows per scan page. Defaults to DEFAULT_BATCH_SIZE. */
  batchSize?: number;
  now?: Now;
}

/**
 * Key-value store with `_bin`/`_int` secondary indexes kept in PostgreSQL.
 * Jobs fetch their input documents in batches and run in-process.
 */
export class PostgresStore implements KeyValueStore {
  private readonly pool: pg.Pool;
  private readonly batchSize: number;
  private readonly now: Now | undefined;

  constructor(config: PostgresStoreConfig) {
    this.pool = config.pool;
    this.batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
    this.now = config.now;
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applySchema(client);
    } finally {
      client.release();
    }
  }

  async *lookup(request: IndexLookup): AsyncGenerator<IndexEntry> {
    const { sql, params } = compileLookupQuery(request);
    let result: pg.QueryResult<IndexRow>;
    try {
      result = await this.pool.query<IndexRow>(sql, params);
    } catch (err) {
      throw new StoreError(`Failed to look up index ${request.index}: ${String(err)}`, err);
    }
    for (const row of result.rows) {
      yield mapIndexRow(row);
    }
  }

  submit(job: JobSpec, options: SubmitOptions): AsyncGenerator<ResultTuple> {
    return runJob(job, this.documents(job.input), { timeoutMs: options.timeoutMs, now: this.now });
  }

  async put(bucket: string, key: string, document: Document, indexes: readonly SecondaryIndex[] = []): Promise<void> {
    validateObject(key, indexes);
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(SQL_UPSERT_OBJECT, [bucket, key, document]);
      await client.query(SQL_DELETE_INDEXES, [bucket, key]);
      for (const index of indexes) {
        const isInt = parseIndexName(index.name)?.kind === 'int';
        await client.query(SQL_INSERT_INDEX, [
          bucket,
          key,
          index.name,
          isInt ? index.value : null,
          isInt ? null : index.value,
        ]);
      }
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK').catch(() => undefined);
      throw new StoreError(`Failed to store ${bucket}/${key}: ${String(err)}`, err);
    } finally {
      client.release();
    }
  }

  async delete(bucket: string, key: string): Promise<void> {
    try {
      await this.pool.query(SQL_DELETE_OBJECT, [bucket, key]);
    } catch (err) {
      throw new StoreError(`Failed to delete ${bucket}/${key}: ${String(err)}`, err);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async fetch(query: CompiledQuery): Promise<pg.QueryResult<ObjectRow>> {
    try {
      return await this.pool.query<ObjectRow>(query.sql, query.params);
    } catch (err) {
      throw new StoreError(`Failed to fetch job input: ${String(err)}`, err);
    }
  }

  private async *documents(input: JobInput): AsyncGenerator<ResultTuple> {
    if (input.kind === 'keys') {
      for (let i = 0; i < input.keys.length; i += this.batchSize) {
        const chunk = input.keys.slice(i, i + this.batchSize);
        const result = await this.fetch(compileFetchKeysQuery(input.bucket, chunk));
        for (const row of result.rows) {
          yield mapObjectRow(row);
        }
      }
      return;
    }

    let afterKey = '';
    while (true) {
      const result = await this.fetch(compileScanQuery(input.bucket, afterKey, this.batchSize));
      for (const row of result.rows) {
        yield mapObjectRow(row);
        afterKey = row.key;
      }
      if (result.rows.length < this.batchSize) break;
    }
  }
}
