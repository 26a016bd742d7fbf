import type { CapturedEvents } from '../types/event.js';
import type { Predicate, ValueExpression } from '../types/predicate.js';

/**
 * Aliases used by a predicate or expression, deduplicated, in first-use order.
 */
export function uniqueAliases(node: Predicate | ValueExpression): string[] {
  return [...new Set(node.usedAliases())];
}

/**
 * Whether every alias the predicate reads is bound, i.e. evaluation cannot
 * come back uncertain.
 */
export function isDecidable(predicate: Predicate, events: CapturedEvents): boolean {
  return predicate.usedAliases().every(alias => events.has(alias));
}

/** Aliases the predicate reads that are not bound yet */
export function missingAliases(predicate: Predicate, events: CapturedEvents): string[] {
  return uniqueAliases(predicate).filter(alias => !events.has(alias));
}
