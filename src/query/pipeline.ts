import type { JobInput, JobSpec, Predicate, ReducePhase, ResultTuple } from '../types.js';
import { readField } from './predicate.js';
import { toSortDirection } from './types.js';
import type { Order, SortDirection } from './types.js';

/**
 * Numeric comparator over result tuples: `a.field - b.field` for ASC and the
 * reverse for DESC. Non-numeric values compare as NaN, leaving their order
 * unspecified.
 */
export function orderingComparator(
  field: string,
  direction: SortDirection,
): (a: ResultTuple, b: ResultTuple) => number {
  const valueOf = ([, document]: ResultTuple): number => Number(readField(document, field));
  return direction === 'DESC'
    ? (a, b) => valueOf(b) - valueOf(a)
    : (a, b) => valueOf(a) - valueOf(b);
}

export interface JobPlan {
  input: JobInput;
  predicate: Predicate;
  order: Order | null;
  offset: number;
  limit: number;
}

export function assembleReducePhases(order: Order | null, offset: number, limit: number): ReducePhase[] {
  const phases: ReducePhase[] = [];
  if (order !== null) {
    const direction = toSortDirection(order.direction);
    phases.push({
      kind: 'sort',
      field: order.field,
      direction,
      compare: orderingComparator(order.field, direction),
    });
  }
  // limit 0 means unbounded, so offset alone never slices
  if (limit > 0) {
    phases.push({ kind: 'slice', start: offset, end: offset + limit });
  }
  return phases;
}

/**
 * Builds a fresh job spec: the map stage is always present, followed by the
 * optional sort and slice reduces in that order.
 */
export function assembleJob(plan: JobPlan): JobSpec {
  return {
    input: plan.input,
    map: { kind: 'map', predicate: plan.predicate },
    reduce: assembleReducePhases(plan.order, plan.offset, plan.limit),
  };
}
