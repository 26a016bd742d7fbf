import type { Predicate } from '../../types/predicate.js';
import type { PlainValue } from '../../types/scalar.js';
import type { DslOptions } from '../types.js';
import { FieldExpression } from '../../evaluation/field-expression.js';
import { LiteralExpression } from '../../evaluation/literal-expression.js';
import { AndPredicate, NotPredicate, OrPredicate } from '../../evaluation/logical-predicates.js';
import { DslValidationError } from '../helpers/errors.js';
import { requireAlias, splitFieldRef } from '../helpers/validators.js';
import { ExprBuilder } from './expr-builder.js';

/** Builder functions bound to one set of {@link DslOptions} */
export interface Dsl {
  field(ref: string): ExprBuilder;
  field(alias: string, path: string): ExprBuilder;
  literal(value: PlainValue): ExprBuilder;
  all(...predicates: Predicate[]): AndPredicate;
  any(...predicates: Predicate[]): OrPredicate;
  not(predicate: Predicate): NotPredicate;
}

function requirePredicates(predicates: Predicate[], label: string): void {
  if (predicates.length === 0) {
    throw new DslValidationError(`${label} requires at least one predicate`);
  }
}

/**
 * Creates DSL builder functions whose predicates share `options`
 * (e.g. a logger).
 *
 * @example
 * ```typescript
 * const logger = new MemoryLogger();
 * const { field, all } = createDsl({ logger });
 *
 * const p = all(field('a.amount').gt(100), field('b.status').eq('paid'));
 * ```
 */
export function createDsl(options: DslOptions = {}): Dsl {
  function field(refOrAlias: string, path?: string): ExprBuilder {
    if (path === undefined) {
      const parts = splitFieldRef(refOrAlias, 'field() reference');
      return new ExprBuilder(new FieldExpression(parts.alias, parts.path), options);
    }
    requireAlias(refOrAlias, 'field() alias');
    splitFieldRef(`${refOrAlias}.${path}`, 'field() path');
    return new ExprBuilder(new FieldExpression(refOrAlias, path), options);
  }

  return {
    field,
    literal: (value) => new ExprBuilder(LiteralExpression.of(value), options),
    all: (...predicates) => {
      requirePredicates(predicates, 'all()');
      return new AndPredicate(predicates);
    },
    any: (...predicates) => {
      requirePredicates(predicates, 'any()');
      return new OrPredicate(predicates);
    },
    not: (predicate) => new NotPredicate(predicate),
  };
}

const defaultDsl = createDsl();

/**
 * Reference to a field of an aliased event.
 *
 * @example
 * field('a.amount').gt(5)
 * field('a', 'customer.tier').eq('gold')
 * field('a.$topic').eq('order.created')
 */
export const field: Dsl['field'] = defaultDsl.field;

/**
 * Constant operand, useful when the literal should be on the left side.
 *
 * @example
 * literal(100).lt(field('a.amount'))
 */
export const literal: Dsl['literal'] = defaultDsl.literal;

/** All predicates must hold (three-valued AND) */
export const all: Dsl['all'] = defaultDsl.all;

/** At least one predicate must hold (three-valued OR) */
export const any: Dsl['any'] = defaultDsl.any;

/** Negates a predicate; uncertain stays uncertain */
export const not: Dsl['not'] = defaultDsl.not;
