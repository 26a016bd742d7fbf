import type { CapturedEvents } from '../types/event.js';
import { PredicateResult, type Predicate } from '../types/predicate.js';
import { and3, not3, or3 } from './predicate-result.js';

function requireChildren(children: readonly Predicate[], kind: string): readonly Predicate[] {
  if (children.length === 0) {
    throw new Error(`${kind} predicate requires at least one child`);
  }
  return Object.freeze([...children]);
}

function collectAliases(children: readonly Predicate[]): readonly string[] {
  const result: string[] = [];
  for (const child of children) {
    result.push(...child.usedAliases());
  }
  return result;
}

/**
 * Conjunction under three-valued logic.
 *
 * Negative as soon as one child is negative, otherwise uncertain while any
 * child is uncertain.
 */
export class AndPredicate implements Predicate {
  readonly children: readonly Predicate[];

  constructor(children: readonly Predicate[]) {
    this.children = requireChildren(children, 'AND');
  }

  evaluate(events: CapturedEvents): PredicateResult {
    let result: PredicateResult = PredicateResult.Positive;
    for (const child of this.children) {
      result = and3(result, child.evaluate(events));
      if (result === PredicateResult.Negative) break;
    }
    return result;
  }

  queryText(): string {
    return `(${this.children.map(c => c.queryText()).join(' AND ')})`;
  }

  usedAliases(): readonly string[] {
    return collectAliases(this.children);
  }
}

/**
 * Disjunction under three-valued logic.
 *
 * Positive as soon as one child is positive, otherwise uncertain while any
 * child is uncertain.
 */
export class OrPredicate implements Predicate {
  readonly children: readonly Predicate[];

  constructor(children: readonly Predicate[]) {
    this.children = requireChildren(children, 'OR');
  }

  evaluate(events: CapturedEvents): PredicateResult {
    let result: PredicateResult = PredicateResult.Negative;
    for (const child of this.children) {
      result = or3(result, child.evaluate(events));
      if (result === PredicateResult.Positive) break;
    }
    return result;
  }

  queryText(): string {
    return `(${this.children.map(c => c.queryText()).join(' OR ')})`;
  }

  usedAliases(): readonly string[] {
    return collectAliases(this.children);
  }
}

/** Negation; an uncertain child stays uncertain */
export class NotPredicate implements Predicate {
  readonly child: Predicate;

  constructor(child: Predicate) {
    this.child = child;
  }

  evaluate(events: CapturedEvents): PredicateResult {
    return not3(this.child.evaluate(events));
  }

  queryText(): string {
    return `NOT ${this.child.queryText()}`;
  }

  usedAliases(): readonly string[] {
    return this.child.usedAliases();
  }
}
