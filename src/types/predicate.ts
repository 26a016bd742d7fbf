import type { CapturedEvents } from './event.js';
import type { Scalar } from './scalar.js';
import type { EvaluationError } from '../evaluation/errors.js';

/**
 * Three-valued outcome of evaluating a predicate against a partial binding.
 */
export const PredicateResult = {
  /** The condition holds */
  Positive: 'positive',
  /** The condition does not hold, or can never hold: terminates the candidate */
  Negative: 'negative',
  /** A referenced alias is not bound yet; re-evaluate once more events arrive */
  Uncertain: 'uncertain'
} as const;

export type PredicateResult = (typeof PredicateResult)[keyof typeof PredicateResult];

/** Comparison operators of an operator predicate */
export type Operator = 'eq' | 'neq' | 'gt' | 'lt' | 'gte' | 'lte';

/** Outcome of resolving a value expression */
export type ValueResult =
  | { readonly ok: true; readonly value: Scalar }
  | { readonly ok: false; readonly error: EvaluationError };

/**
 * Expression that reads a value out of a partially bound event sequence.
 *
 * Implementations are immutable and may be shared between candidates.
 */
export interface ValueExpression {
  /**
   * Resolves the expression against the binding.
   *
   * Fails with `EventNotFoundError` when an alias it reads is not bound.
   * Never throws on type mismatches; those come back as failures too.
   */
  value(events: CapturedEvents): ValueResult;

  /** Canonical query text, used for diagnostics and tooling */
  queryText(): string;

  /** Aliases the expression reads (may contain duplicates) */
  usedAliases(): readonly string[];
}

/**
 * Boolean condition over one or more value expressions.
 */
export interface Predicate {
  /** Never throws; errors are logged and reported as {@link PredicateResult.Negative} */
  evaluate(events: CapturedEvents): PredicateResult;

  queryText(): string;

  /** Union of the aliases used by the operands, in operand order, not deduplicated */
  usedAliases(): readonly string[];
}
