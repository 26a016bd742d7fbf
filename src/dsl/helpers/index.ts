export { DslError, DslValidationError } from './errors.js';
export { requireNonEmptyString, requireAlias, splitFieldRef, ALIAS_RE } from './validators.js';
export { ref, isRef, isValueExpression, toExpression } from './ref.js';
