import { MemoryStore } from '../../src/store/memory-store.js';
import type { IndexEntry, IndexLookup, JobSpec, ResultTuple, StoreClient, SubmitOptions } from '../../src/types.js';

export const BUCKET = 'people';

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export async function* fromArray<T>(items: readonly T[]): AsyncGenerator<T> {
  yield* items;
}

/** Store with the two documents used throughout the query tests. */
export async function seedPeople(store = new MemoryStore()): Promise<MemoryStore> {
  await store.put(BUCKET, 'sree', { name: 'Sreejith', age: 25 }, [
    { name: 'name_bin', value: 'Sreejith' },
    { name: 'age_int', value: 25 },
  ]);
  await store.put(BUCKET, 'vishnu', { name: 'Vishnu', age: 31 }, [
    { name: 'name_bin', value: 'Vishnu' },
    { name: 'age_int', value: 31 },
  ]);
  return store;
}

/**
 * Records every lookup and submitted job. Lookups answer from `keysByIndex`,
 * jobs answer with `results`.
 */
export function makeRecordingClient(
  keysByIndex: Record<string, string[]> = {},
  results: ResultTuple[] = [],
): StoreClient & { lookups: IndexLookup[]; jobs: Array<{ job: JobSpec; options: SubmitOptions }> } {
  const lookups: IndexLookup[] = [];
  const jobs: Array<{ job: JobSpec; options: SubmitOptions }> = [];
  return {
    lookups,
    jobs,
    lookup(request: IndexLookup): AsyncIterable<IndexEntry> {
      lookups.push(request);
      return fromArray((keysByIndex[request.index] ?? []).map((key) => ({ key })));
    },
    submit(job: JobSpec, options: SubmitOptions): AsyncIterable<ResultTuple> {
      jobs.push({ job, options });
      return fromArray(results);
    },
  };
}
