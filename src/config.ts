/** Job submission timeout used when neither the builder nor the run names one. */
export const DEFAULT_TIMEOUT_MS = 9000;

/** Documents fetched per round trip by store adapters. */
export const DEFAULT_BATCH_SIZE = 100;

/**
 * Open-ended bound for numeric range lookups. The index needs concrete bounds,
 * so `age > 30` becomes the inclusive range [30, INT_INDEX_MAX].
 */
export const INT_INDEX_MAX = Number.MAX_SAFE_INTEGER;
export const INT_INDEX_MIN = -INT_INDEX_MAX;

/** Milliseconds since the epoch; injectable so timeouts can be tested. */
export type Now = () => number;

export const systemNow: Now = () => Date.now();
