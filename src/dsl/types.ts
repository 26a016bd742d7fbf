import type { PlainValue } from '../types/scalar.js';
import type { ValueExpression } from '../types/predicate.js';
import type { PredicateOptions } from '../evaluation/operator-predicate.js';

/**
 * A reference to a field of an aliased event, written `alias.path`.
 *
 * @see {@link ref} — factory function for creating `Ref` instances
 */
export interface Ref {
  ref: string;
}

/**
 * Operand accepted by the comparison builders: a literal, a {@link Ref}, or
 * any value expression (including another builder).
 */
export type Operand = PlainValue | Ref | ValueExpression;

/** Options applied to every predicate a DSL instance builds */
export type DslOptions = PredicateOptions;
