export { MultiIndexQuery } from './query/builder.js';
export type { MultiIndexQueryConfig, QueryPlan, RunState } from './query/builder.js';
export { OPERATORS } from './query/types.js';
export type { Filter, FilterValue, Operator, Order, QueryState, SortDirection } from './query/types.js';
export type {
  Document,
  ResultTuple,
  IndexKind,
  IndexLookup,
  IndexEntry,
  SecondaryIndex,
  Condition,
  Predicate,
  JobInput,
  JobSpec,
  MapPhase,
  SortPhase,
  SlicePhase,
  ReducePhase,
  SubmitOptions,
  StoreClient,
  KeyValueStore,
} from './types.js';
export { MemoryStore } from './store/memory-store.js';
export type { MemoryStoreConfig } from './store/memory-store.js';
export { PostgresStore } from './store/postgres-store.js';
export type { PostgresStoreConfig } from './store/postgres-store.js';
export { DEFAULT_TIMEOUT_MS } from './config.js';
export { InvalidOperatorError, StoreError, JobTimeoutError } from './errors.js';
