/**
 * Validation helpers for DSL builder inputs.
 *
 * These guards reject invalid input at the call-site, before any predicate
 * is constructed.
 *
 * @module
 */

import { DslValidationError } from './errors.js';

export const ALIAS_RE = /^[A-Za-z_][\w]*$/;

/**
 * Asserts that `value` is a non-empty string.
 *
 * @param label - A human-readable parameter name used in the error message.
 * @throws {DslValidationError} If `value` is not a string or is empty.
 */
export function requireNonEmptyString(value: unknown, label: string): asserts value is string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new DslValidationError(`${label} must be a non-empty string`);
  }
}

/**
 * Asserts that `value` is a valid alias name (letters, digits, underscore;
 * not starting with a digit).
 *
 * @throws {DslValidationError} If `value` is not a valid alias.
 */
export function requireAlias(value: unknown, label: string): asserts value is string {
  requireNonEmptyString(value, label);
  if (!ALIAS_RE.test(value)) {
    throw new DslValidationError(`${label} must be a valid alias name, got ${JSON.stringify(value)}`);
  }
}

/**
 * Splits an `alias.path` reference into its alias and field path.
 *
 * @throws {DslValidationError} If the reference has no path or an empty segment.
 */
export function splitFieldRef(ref: unknown, label: string): { alias: string; path: string } {
  requireNonEmptyString(ref, label);
  const dotIndex = ref.indexOf('.');
  if (dotIndex === -1) {
    throw new DslValidationError(`${label} must have the form <alias>.<field>, got ${JSON.stringify(ref)}`);
  }
  const alias = ref.slice(0, dotIndex);
  const path = ref.slice(dotIndex + 1);
  requireAlias(alias, `${label} alias`);
  if (path.split('.').some(segment => segment.length === 0)) {
    throw new DslValidationError(`${label} has an empty path segment: ${JSON.stringify(ref)}`);
  }
  return { alias, path };
}
