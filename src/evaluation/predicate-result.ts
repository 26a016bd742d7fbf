import { PredicateResult } from '../types/predicate.js';

/**
 * Kleene conjunction: negative wins, then uncertain, then positive.
 */
export function and3(left: PredicateResult, right: PredicateResult): PredicateResult {
  if (left === PredicateResult.Negative || right === PredicateResult.Negative) {
    return PredicateResult.Negative;
  }
  if (left === PredicateResult.Uncertain || right === PredicateResult.Uncertain) {
    return PredicateResult.Uncertain;
  }
  return PredicateResult.Positive;
}

/**
 * Kleene disjunction: positive wins, then uncertain, then negative.
 */
export function or3(left: PredicateResult, right: PredicateResult): PredicateResult {
  if (left === PredicateResult.Positive || right === PredicateResult.Positive) {
    return PredicateResult.Positive;
  }
  if (left === PredicateResult.Uncertain || right === PredicateResult.Uncertain) {
    return PredicateResult.Uncertain;
  }
  return PredicateResult.Negative;
}

export function not3(result: PredicateResult): PredicateResult {
  switch (result) {
    case PredicateResult.Positive:
      return PredicateResult.Negative;
    case PredicateResult.Negative:
      return PredicateResult.Positive;
    case PredicateResult.Uncertain:
      return PredicateResult.Uncertain;
  }
}

export function fromBoolean(value: boolean): PredicateResult {
  return value ? PredicateResult.Positive : PredicateResult.Negative;
}

export function isPredicateResult(value: unknown): value is PredicateResult {
  return (
    value === PredicateResult.Positive ||
    value === PredicateResult.Negative ||
    value === PredicateResult.Uncertain
  );
}
