/**
 * Errors produced while resolving value expressions.
 *
 * They are reported through {@link ValueResult} failures rather than thrown.
 * The predicate turns {@link EventNotFoundError} into an uncertain result
 * and every other subclass into a negative one.
 */

/**
 * Base class for all value resolution failures.
 */
export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationError';
  }
}

/**
 * The alias has no event bound yet.
 */
export class EventNotFoundError extends EvaluationError {
  public readonly alias: string;

  constructor(alias: string) {
    super(`Event not found for alias "${alias}"`);
    this.name = 'EventNotFoundError';
    this.alias = alias;
  }
}

/**
 * The alias is bound but the event has no value at the path.
 */
export class FieldNotFoundError extends EvaluationError {
  public readonly alias: string;
  public readonly path: string;

  constructor(alias: string, path: string) {
    super(`Field "${path}" not found on event "${alias}"`);
    this.name = 'FieldNotFoundError';
    this.alias = alias;
    this.path = path;
  }
}

/**
 * The value at the path cannot be represented as a scalar.
 */
export class FieldTypeError extends EvaluationError {
  public readonly alias: string;
  public readonly path: string;
  public readonly actualType: string;

  constructor(alias: string, path: string, actualType: string) {
    super(`Field "${alias}.${path}" has unsupported type ${actualType}`);
    this.name = 'FieldTypeError';
    this.alias = alias;
    this.path = path;
    this.actualType = actualType;
  }
}

/**
 * The expression itself is not well formed.
 */
export class MalformedExpressionError extends EvaluationError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedExpressionError';
  }
}

/** Type guard for the unbound alias condition */
export function isEventNotFound(error: unknown): error is EventNotFoundError {
  return error instanceof EventNotFoundError;
}
