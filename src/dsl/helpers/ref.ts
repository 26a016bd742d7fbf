import type { Ref } from '../types.js';
import type { ValueExpression } from '../../types/predicate.js';
import type { PlainValue } from '../../types/scalar.js';
import { FieldExpression } from '../../evaluation/field-expression.js';
import { LiteralExpression } from '../../evaluation/literal-expression.js';
import { splitFieldRef } from './validators.js';

/**
 * Creates a reference to a field of an aliased event.
 *
 * @param path - `alias.field` path, e.g. `"a.amount"` or `"b.customer.id"`.
 *
 * @example
 * field('a.amount').gt(ref('b.amount'))
 */
export function ref(path: string): Ref {
  splitFieldRef(path, 'ref() path');
  return { ref: path };
}

/**
 * Type-guard that checks whether a value is a {@link Ref}.
 */
export function isRef(value: unknown): value is Ref {
  if (value === null || typeof value !== 'object' || !('ref' in value)) {
    return false;
  }
  return typeof value.ref === 'string' && Object.keys(value).length === 1;
}

/**
 * Type-guard for objects implementing the value expression contract.
 */
export function isValueExpression(value: unknown): value is ValueExpression {
  if (value === null || typeof value !== 'object') return false;
  return (
    'value' in value && typeof value.value === 'function' &&
    'queryText' in value && typeof value.queryText === 'function' &&
    'usedAliases' in value && typeof value.usedAliases === 'function'
  );
}

/**
 * Turns a DSL operand into a value expression.
 */
export function toExpression(operand: PlainValue | Ref | ValueExpression): ValueExpression {
  if (isValueExpression(operand)) {
    return operand;
  }
  if (isRef(operand)) {
    const { alias, path } = splitFieldRef(operand.ref, 'ref');
    return new FieldExpression(alias, path);
  }
  return LiteralExpression.of(operand);
}
