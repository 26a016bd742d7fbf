import { describe, it, expect } from 'vitest';
import { ref, isRef, isValueExpression, toExpression } from '../../../../src/dsl/helpers/ref.js';
import { requireAlias, splitFieldRef } from '../../../../src/dsl/helpers/validators.js';
import { DslValidationError } from '../../../../src/dsl/helpers/errors.js';
import { FieldExpression } from '../../../../src/evaluation/field-expression.js';
import { LiteralExpression } from '../../../../src/evaluation/literal-expression.js';

describe('ref', () => {
  it('creates a reference object', () => {
    expect(ref('a.amount')).toEqual({ ref: 'a.amount' });
  });

  it('validates the path', () => {
    expect(() => ref('amount')).toThrow('ref() path must have the form <alias>.<field>, got "amount"');
  });
});

describe('isRef', () => {
  it('accepts only objects with a single string ref key', () => {
    expect(isRef({ ref: 'a.x' })).toBe(true);
    expect(isRef({ ref: 'a.x', extra: 1 })).toBe(false);
    expect(isRef({ ref: 1 })).toBe(false);
    expect(isRef('a.x')).toBe(false);
    expect(isRef(null)).toBe(false);
  });
});

describe('isValueExpression', () => {
  it('recognises expression objects', () => {
    expect(isValueExpression(new FieldExpression('a', 'x'))).toBe(true);
    expect(isValueExpression({ value: 1 })).toBe(false);
  });
});

describe('toExpression', () => {
  it('converts refs to field expressions', () => {
    const expr = toExpression({ ref: 'b.customer.id' });

    expect(expr).toBeInstanceOf(FieldExpression);
    expect(expr.queryText()).toBe('b.customer.id');
  });

  it('passes expressions through and wraps plain values', () => {
    const field = new FieldExpression('a', 'x');

    expect(toExpression(field)).toBe(field);
    expect(toExpression({ tier: 'gold' })).toBeInstanceOf(LiteralExpression);
    expect(toExpression({ tier: 'gold' }).queryText()).toBe('{tier: "gold"}');
  });
});

describe('validators', () => {
  it('splits at the first dot', () => {
    expect(splitFieldRef('a.items.0.sku', 'ref')).toEqual({ alias: 'a', path: 'items.0.sku' });
  });

  it('rejects empty segments', () => {
    expect(() => splitFieldRef('a.x..y', 'ref')).toThrow('ref has an empty path segment: "a.x..y"');
  });

  it('rejects invalid aliases', () => {
    expect(() => requireAlias('9a', 'alias')).toThrow(DslValidationError);
    expect(() => requireAlias('', 'alias')).toThrow('alias must be a non-empty string');
  });
});
