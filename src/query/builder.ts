import type { IndexLookup, ReducePhase, ResultTuple, StoreClient } from '../types.js';
import { DEFAULT_TIMEOUT_MS } from '../config.js';
import { toIndexLookup } from './index-lookup.js';
import { collectCandidateKeys, toJobInput } from './candidates.js';
import { compilePredicate, renderCondition } from './predicate.js';
import { assembleJob, assembleReducePhases } from './pipeline.js';
import type { Filter, FilterValue, Order, QueryState } from './types.js';

/**
 * Phases of one run, reported in order through `onStateChange`.
 * `lookups-issued` is reported once the store has accepted the first index
 * lookup (immediately when there are no filters).
 */
export type RunState =
  | 'idle'
  | 'lookups-issued'
  | 'candidates-aggregated'
  | 'predicate-compiled'
  | 'job-assembled'
  | 'job-submitted'
  | 'streaming'
  | 'done';

export interface MultiIndexQueryConfig {
  client: StoreClient;
  /** Bucket every query built by this instance targets. */
  bucket: string;
  /** Job timeout used when run() is called without one. Defaults to DEFAULT_TIMEOUT_MS. */
  timeoutMs?: number;
  /** Called on every state transition of a run, in order. */
  onStateChange?: (from: RunState, to: RunState) => void;
}

/** What a run would do, computed without touching the store. */
export interface QueryPlan {
  lookups: IndexLookup[];
  predicate: string;
  reduce: ReducePhase[];
}

/**
 * Chainable, mutable query over one bucket. Index lookups narrow the key space;
 * a map/reduce job applies the full predicate, ordering and pagination.
 *
 * @example
 * const query = new MultiIndexQuery({ client: store, bucket: 'people' });
 * for await (const [key, person] of query.filter('age', '<', 50).order('age').run()) {
 *   console.log(key, person);
 * }
 */
export class MultiIndexQuery {
  private readonly client: StoreClient;
  private readonly bucket: string;
  private readonly timeoutMs: number;
  private readonly onStateChange: ((from: RunState, to: RunState) => void) | undefined;

  private _filters: Filter[] = [];
  private _order: Order | null = null;
  private _offset = 0;
  private _limit = 0;

  constructor(config: MultiIndexQueryConfig) {
    this.client = config.client;
    this.bucket = config.bucket;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.onStateChange = config.onStateChange;
  }

  /** Add a condition, e.g. `filter('age', '>=', 25)`. The operator is checked at run time. */
  filter(field: string, op: string, value: FilterValue): this {
    this._filters.push({ field, op, value });
    return this;
  }

  offset(offset: number): this {
    this._offset = offset;
    return this;
  }

  /** Number of results to return; 0 fetches everything. */
  limit(limit: number = 0): this {
    this._limit = limit;
    return this;
  }

  /** Sort numerically on `field`. Anything other than 'DESC' sorts ascending. */
  order(field: string, direction: string = 'ASC'): this {
    this._order = { field, direction };
    return this;
  }

  /** Clear filters, order and pagination so the instance can build a new query. */
  reset(): this {
    this._filters = [];
    this._order = null;
    this._offset = 0;
    this._limit = 0;
    return this;
  }

  /** Snapshot of the current query. Later builder calls do not affect it. */
  get state(): QueryState {
    return Object.freeze({
      bucket: this.bucket,
      filters: Object.freeze([...this._filters]),
      order: this._order,
      offset: this._offset,
      limit: this._limit,
    });
  }

  explain(): QueryPlan {
    const { bucket, filters, order, offset, limit } = this.state;
    const lookups = filters.map((filter) => toIndexLookup(bucket, filter));
    return {
      lookups,
      predicate: compilePredicate(filters).expression,
      reduce: assembleReducePhases(order, offset, limit),
    };
  }

  /**
   * Execute the query. The builder state is captured now; nothing happens
   * until the returned generator is iterated.
   */
  run(timeoutMs: number = this.timeoutMs): AsyncGenerator<ResultTuple> {
    return this.execute(this.state, timeoutMs);
  }

  private async *execute(state: QueryState, timeoutMs: number): AsyncGenerator<ResultTuple> {
    let current: RunState = 'idle';
    const transition = (next: RunState): void => {
      const previous = current;
      current = next;
      this.onStateChange?.(previous, next);
    };

    const lookups = state.filters.map((filter) => toIndexLookup(state.bucket, filter));
    const keys = await collectCandidateKeys(this.client, lookups, () => transition('lookups-issued'));
    transition('candidates-aggregated');

    const predicate = compilePredicate(state.filters);
    transition('predicate-compiled');

    const job = assembleJob({
      input: toJobInput(state.bucket, keys),
      predicate,
      order: state.order,
      offset: state.offset,
      limit: state.limit,
    });
    transition('job-assembled');

    const results = this.client.submit(job, { timeoutMs });
    transition('job-submitted');

    transition('streaming');
    for await (const result of results) {
      yield result;
    }
    transition('done');
  }

  toString(): string {
    const filters = this._filters.map(({ field, op, value }) => `filter(${renderCondition(field, op, value)})`);
    const order = this._order === null
      ? 'order(none)'
      : `order(${this._order.field}, ${this._order.direction})`;
    return [
      `MultiIndexQuery(bucket=${this.bucket})`,
      ...filters,
      order,
      `offset(${this._offset})`,
      `limit(${this._limit})`,
    ].join('.');
  }
}
