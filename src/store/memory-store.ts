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
import type { FilterValue } from '../query/types.js';
import { runJob } from '../engine/local-job.js';
import { validateObject } from './validation.js';
import type { Now } from '../config.js';

export interface MemoryStoreConfig {
  now?: Now;
}

interface StoredObject {
  document: Document;
  indexes: readonly SecondaryIndex[];
}

function matches(lookup: IndexLookup, value: FilterValue): boolean {
  if (lookup.kind === 'exact') return value === lookup.value;
  if (typeof value === 'string' && typeof lookup.start === 'string' && typeof lookup.end === 'string') {
    return lookup.start <= value && value <= lookup.end;
  }
  if (typeof value === 'number' && typeof lookup.start === 'number' && typeof lookup.end === 'number') {
    return lookup.start <= value && value <= lookup.end;
  }
  return false;
}

/**
 * In-process key-value store with secondary indexes. Buckets keep insertion
 * order, which is also the order whole-bucket jobs see documents in.
 */
export class MemoryStore implements KeyValueStore {
  private readonly buckets = new Map<string, Map<string, StoredObject>>();
  private readonly now: Now | undefined;

  constructor(config: MemoryStoreConfig = {}) {
    this.now = config.now;
  }

  async put(bucket: string, key: string, document: Document, indexes: readonly SecondaryIndex[] = []): Promise<void> {
    validateObject(key, indexes);
    let objects = this.buckets.get(bucket);
    if (objects === undefined) {
      objects = new Map();
      this.buckets.set(bucket, objects);
    }
    objects.set(key, { document: structuredClone(document), indexes: [...indexes] });
  }

  async delete(bucket: string, key: string): Promise<void> {
    this.buckets.get(bucket)?.delete(key);
  }

  async *lookup(request: IndexLookup): AsyncGenerator<IndexEntry> {
    const objects = this.buckets.get(request.bucket);
    if (objects === undefined) return;
    for (const [key, object] of objects) {
      const hit = object.indexes.some((index) => index.name === request.index && matches(request, index.value));
      if (hit) yield { key };
    }
  }

  submit(job: JobSpec, options: SubmitOptions): AsyncGenerator<ResultTuple> {
    return runJob(job, this.documents(job.input), { timeoutMs: options.timeoutMs, now: this.now });
  }

  async close(): Promise<void> {
    this.buckets.clear();
  }

  private async *documents(input: JobInput): AsyncGenerator<ResultTuple> {
    const objects = this.buckets.get(input.bucket);
    if (objects === undefined) return;
    if (input.kind === 'bucket') {
      for (const [key, object] of objects) {
        yield [key, structuredClone(object.document)];
      }
      return;
    }
    for (const key of input.keys) {
      // keys whose object was deleted since the lookup are skipped
      const object = objects.get(key);
      if (object !== undefined) yield [key, structuredClone(object.document)];
    }
  }
}
