/**
 * Error class hierarchy of the DSL module.
 *
 * Every DSL error extends {@link DslError}, so all of them can be caught at
 * once:
 *
 * ```typescript
 * try {
 *   all(...predicates);
 * } catch (err) {
 *   if (err instanceof DslError) {
 *     // Any error from the builders
 *   }
 * }
 * ```
 */

/**
 * Base error class for all DSL operations.
 *
 * Common ancestor of {@link DslValidationError}.
 */
export class DslError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DslError';
  }
}

/**
 * Invalid input passed to a DSL builder function.
 *
 * @example
 * ```typescript
 * import { DslValidationError, field } from 'cep-predicates/dsl';
 *
 * try {
 *   field('amount').gt(5); // missing alias
 * } catch (err) {
 *   if (err instanceof DslValidationError) {
 *     console.error('Invalid input:', err.message);
 *   }
 * }
 * ```
 */
export class DslValidationError extends DslError {
  constructor(message: string) {
    super(message);
    this.name = 'DslValidationError';
  }
}
