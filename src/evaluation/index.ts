export {
  EvaluationError,
  EventNotFoundError,
  FieldNotFoundError,
  FieldTypeError,
  MalformedExpressionError,
  isEventNotFound,
} from './errors.js';
export { ok, fail } from './value-result.js';
export { FieldExpression } from './field-expression.js';
export { LiteralExpression } from './literal-expression.js';
export { OperatorPredicate, type PredicateOptions } from './operator-predicate.js';
export { AndPredicate, OrPredicate, NotPredicate } from './logical-predicates.js';
export { and3, or3, not3, fromBoolean, isPredicateResult } from './predicate-result.js';
export { uniqueAliases, isDecidable, missingAliases } from './analysis.js';
