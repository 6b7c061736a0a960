import type { FilterValue, Operator, SortDirection } from './query/types.js';

export type Document = Record<string, unknown>;

export type ResultTuple = readonly [key: string, document: Document];

export type IndexKind = 'bin' | 'int';

export type IndexLookup =
  | { kind: 'exact'; bucket: string; index: string; value: FilterValue }
  | { kind: 'range'; bucket: string; index: string; start: FilterValue; end: FilterValue };

export interface IndexEntry {
  key: string;
}

export interface SecondaryIndex {
  /** `<field>_bin` for string values, `<field>_int` for numbers. */
  name: string;
  value: FilterValue;
}

export interface Condition {
  readonly field: string;
  readonly operator: Operator;
  readonly value: FilterValue;
}

/**
 * Conjunction of conditions, evaluated once per document in the map stage.
 */
export interface Predicate {
  readonly conditions: readonly Condition[];
  /** Diagnostic rendering, e.g. `document.age < 50 && document.name == "Vishnu"`. */
  readonly expression: string;
  test(document: Document): boolean;
}

export type JobInput =
  | { kind: 'keys'; bucket: string; keys: readonly string[] }
  | { kind: 'bucket'; bucket: string };

export interface MapPhase {
  kind: 'map';
  predicate: Predicate;
}

export interface SortPhase {
  kind: 'sort';
  field: string;
  direction: SortDirection;
  compare(a: ResultTuple, b: ResultTuple): number;
}

export interface SlicePhase {
  kind: 'slice';
  start: number;
  end: number;
}

export type ReducePhase = SortPhase | SlicePhase;

export interface JobSpec {
  input: JobInput;
  map: MapPhase;
  reduce: readonly ReducePhase[];
}

export interface SubmitOptions {
  timeoutMs: number;
}

/**
 * What the query core needs from a store: secondary index lookups and
 * submission of a map/reduce job.
 */
export interface StoreClient {
  lookup(request: IndexLookup): AsyncIterable<IndexEntry>;
  submit(job: JobSpec, options: SubmitOptions): AsyncIterable<ResultTuple>;
}

export interface KeyValueStore extends StoreClient {
  put(bucket: string, key: string, document: Document, indexes?: readonly SecondaryIndex[]): Promise<void>;
  delete(bucket: string, key: string): Promise<void>;
  close(): Promise<void>;
}
