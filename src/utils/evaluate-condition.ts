import { MatchEvaluationError } from '../errors/match-evaluation.error';
import type {
  ComparisonCondition,
  ComparisonOperator,
  Condition,
} from '../interfaces/workflow-definition.interface';
import { isPlainObject, resolvePath } from './resolve-path';

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = [
  '==',
  '!=',
  'in',
  '>',
  '>=',
  '<',
  '<=',
  'contains',
];

export type ConditionErrorHandler = (error: MatchEvaluationError) => void;

function isComparisonOperator(value: unknown): value is ComparisonOperator {
  return COMPARISON_OPERATORS.some((op) => op === value);
}

function valuesEqual(left: unknown, right: unknown): boolean {
  const l = left ?? null;
  const r = right ?? null;
  if (l === null || r === null) {
    return l === r;
  }
  if (Array.isArray(l) && Array.isArray(r)) {
    return l.length === r.length && l.every((item, i) => valuesEqual(item, r[i]));
  }
  if (isPlainObject(l) && isPlainObject(r)) {
    const keys = Object.keys(l);
    return (
      keys.length === Object.keys(r).length &&
      keys.every((key) => key in r && valuesEqual(l[key], r[key]))
    );
  }
  return l === r;
}

/**
 * A condition object with neither a `path` nor a combinator, such as `{}`.
 * It holds for every context.
 */
export function isAlwaysCondition(input: unknown): boolean {
  return (
    isPlainObject(input) &&
    !('all' in input) &&
    !('any' in input) &&
    (input.path === undefined || input.path === null)
  );
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function compareNumbers(
  op: '>' | '>=' | '<' | '<=',
  left: unknown,
  right: unknown,
): boolean {
  if (!isFiniteNumber(left) || !isFiniteNumber(right)) {
    return false;
  }
  switch (op) {
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

function applyOperator(
  op: ComparisonOperator,
  resolved: unknown,
  expected: unknown,
): boolean {
  switch (op) {
    case '==':
      return valuesEqual(resolved, expected);
    case '!=':
      return !valuesEqual(resolved, expected);
    case 'in':
      if (Array.isArray(expected)) {
        return expected.some((item) => valuesEqual(item, resolved));
      }
      if (typeof expected === 'string' && typeof resolved === 'string') {
        return expected.includes(resolved);
      }
      return false;
    case '>':
    case '>=':
    case '<':
    case '<=':
      return compareNumbers(op, resolved, expected);
    case 'contains':
      if (typeof resolved === 'string') {
        return (
          (typeof expected === 'string' || isFiniteNumber(expected)) &&
          resolved.includes(String(expected))
        );
      }
      if (Array.isArray(resolved)) {
        return resolved.some((item) => valuesEqual(item, expected));
      }
      return false;
  }
}

function evaluateComparison(
  condition: ComparisonCondition,
  context: Record<string, unknown>,
): boolean {
  if (typeof condition.path !== 'string' || condition.path.length === 0) {
    throw new MatchEvaluationError(condition, 'path must be a non-empty string');
  }
  if (!isComparisonOperator(condition.op)) {
    throw new MatchEvaluationError(
      condition,
      `unsupported operator ${JSON.stringify(condition.op)}`,
    );
  }
  return applyOperator(
    condition.op,
    resolvePath(context, condition.path),
    condition.value,
  );
}

function evaluateStrict(
  condition: Condition,
  context: Record<string, unknown>,
): boolean {
  if (!isPlainObject(condition)) {
    throw new MatchEvaluationError(condition, 'condition must be an object');
  }
  if ('all' in condition) {
    if (!Array.isArray(condition.all)) {
      throw new MatchEvaluationError(condition, '"all" must be a list');
    }
    return condition.all.every((child) => evaluateStrict(child, context));
  }
  if ('any' in condition) {
    if (!Array.isArray(condition.any)) {
      throw new MatchEvaluationError(condition, '"any" must be a list');
    }
    return condition.any.some((child) => evaluateStrict(child, context));
  }
  if (isAlwaysCondition(condition)) {
    return true;
  }
  return evaluateComparison(condition, context);
}

/**
 * Evaluates a condition against a context. Never throws: a malformed
 * condition is reported to `onError` and evaluates to false. An absent
 * condition, or one without a `path`, evaluates to true.
 */
export function evaluateCondition(
  condition: Condition | undefined | null,
  context: Record<string, unknown>,
  onError?: ConditionErrorHandler,
): boolean {
  if (condition === undefined || condition === null) {
    return true;
  }
  try {
    return evaluateStrict(condition, context);
  } catch (error) {
    onError?.(
      error instanceof MatchEvaluationError
        ? error
        : new MatchEvaluationError(
            condition,
            error instanceof Error ? error.message : String(error),
          ),
    );
    return false;
  }
}
