import type { Condition, Document, Predicate } from '../types.js';
import { InvalidOperatorError } from '../errors.js';
import { isOperator } from './types.js';
import type { Filter, FilterValue, Operator } from './types.js';

/**
 * Reads a possibly dotted field (`address.city`) from a document.
 * Returns undefined when any step along the path is missing.
 */
export function readField(document: Document, field: string): unknown {
  let current: unknown = document;
  for (const part of field.split('.')) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Object.getOwnPropertyDescriptor(current, part)?.value;
  }
  return current;
}

function toNumber(actual: unknown): number {
  if (typeof actual === 'number') return actual;
  if (typeof actual === 'string' || typeof actual === 'boolean' || actual === null) {
    return Number(actual);
  }
  return NaN;
}

function looseEquals(actual: unknown, expected: FilterValue): boolean {
  if (actual === undefined || actual === null) return false;
  if (typeof actual === typeof expected) return actual === expected;
  // "25" == 25
  return toNumber(actual) === toNumber(expected);
}

function evaluate(condition: Condition, document: Document): boolean {
  const actual = readField(document, condition.field);
  if (condition.operator === '==') return looseEquals(actual, condition.value);
  if (actual === undefined) return false;
  return compareOrdered(condition.operator, actual, condition.value);
}

function compareOrdered(operator: Exclude<Operator, '=='>, actual: unknown, expected: FilterValue): boolean {
  let left: string | number;
  let right: string | number;
  if (typeof actual === 'string' && typeof expected === 'string') {
    left = actual;
    right = expected;
  } else {
    left = toNumber(actual);
    right = toNumber(expected);
  }

  switch (operator) {
    case '>':
      return left > right;
    case '>=':
      return left >= right;
    case '<':
      return left < right;
    case '<=':
      return left <= right;
  }
}

function renderLiteral(value: FilterValue): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

export function renderCondition(field: string, op: string, value: FilterValue): string {
  return `${field} ${op} ${renderLiteral(value)}`;
}

/**
 * Compiles the filter list into one conjunction. Conditions stay tagged data;
 * no source text is generated for evaluation. An empty list compiles to a
 * predicate that accepts every document.
 */
export function compilePredicate(filters: readonly Filter[]): Predicate {
  const conditions: Condition[] = filters.map(({ field, op, value }) => {
    if (!isOperator(op)) throw new InvalidOperatorError(op);
    return { field, operator: op, value };
  });

  const expression = conditions.length === 0
    ? 'true'
    : conditions
        .map((c) => renderCondition(`document.${c.field}`, c.operator, c.value))
        .join(' && ');

  return {
    conditions,
    expression,
    test: (document) => conditions.every((c) => evaluate(c, document)),
  };
}
