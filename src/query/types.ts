export const OPERATORS = ['==', '>', '>=', '<', '<='] as const;

export type Operator = (typeof OPERATORS)[number];

export type FilterValue = string | number;

/**
 * One predicate as recorded by the builder. `op` is kept as given and only
 * checked against OPERATORS when the query runs.
 */
export interface Filter {
  readonly field: string;
  readonly op: string;
  readonly value: FilterValue;
}

export type SortDirection = 'ASC' | 'DESC';

export interface Order {
  readonly field: string;
  readonly direction: string;
}

/**
 * Immutable view of a builder taken when run() is called.
 */
export interface QueryState {
  readonly bucket: string;
  readonly filters: readonly Filter[];
  readonly order: Order | null;
  readonly offset: number;
  readonly limit: number;
}

export function isOperator(op: string): op is Operator {
  return (OPERATORS as readonly string[]).includes(op);
}

export function toSortDirection(direction: string): SortDirection {
  return direction === 'DESC' ? 'DESC' : 'ASC';
}
