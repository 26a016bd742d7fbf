/**
 * DSL for building predicates.
 *
 * Fluent, type-safe builders for value expressions and predicates.
 *
 * @example
 * ```typescript
 * import { field, all } from 'cep-predicates/dsl';
 *
 * const built = all(
 *   field('a.amount').gt(100),
 *   field('b.customerId').eq(field('a.customerId')),
 * );
 *
 * built.queryText(); // '(a.amount > 100 AND b.customerId == a.customerId)'
 * ```
 *
 * @module dsl
 */

// Builders
export { createDsl, field, literal, all, any, not, ExprBuilder } from './expression/index.js';
export type { Dsl } from './expression/index.js';

// Helpers
export { ref, isRef, isValueExpression, toExpression } from './helpers/index.js';

// Errors
export { DslError, DslValidationError } from './helpers/index.js';

// Types
export type { Ref, Operand, DslOptions } from './types.js';
