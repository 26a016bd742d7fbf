import { describe, it, expect } from 'vitest';
import { FieldExpression } from '../../../src/evaluation/field-expression.js';
import { LiteralExpression } from '../../../src/evaluation/literal-expression.js';
import {
  EventNotFoundError,
  FieldNotFoundError,
  FieldTypeError,
  MalformedExpressionError,
} from '../../../src/evaluation/errors.js';
import { CapturedEventSequence, createEvent } from '../../../src/core/captured-event-sequence.js';
import type { ValueResult } from '../../../src/types/predicate.js';

const events = CapturedEventSequence.from({
  a: createEvent({
    id: 'e-1',
    topic: 'order.created',
    timestamp: 1000,
    source: 'checkout',
    data: {
      amount: 250,
      customer: { tier: 'gold' },
      items: [{ sku: 'A-1' }, { sku: 'B-2' }],
      note: null,
      callback: () => 'x',
    },
  }),
});

function errorOf(result: ValueResult): unknown {
  return result.ok ? undefined : result.error;
}

describe('FieldExpression', () => {
  describe('value', () => {
    it('reads a top-level field', () => {
      expect(new FieldExpression('a', 'amount').value(events)).toEqual({
        ok: true,
        value: { kind: 'number', value: 250 },
      });
    });

    it('reads nested object and array paths', () => {
      expect(new FieldExpression('a', 'customer.tier').value(events)).toEqual({
        ok: true,
        value: { kind: 'string', value: 'gold' },
      });
      expect(new FieldExpression('a', 'items.1.sku').value(events)).toEqual({
        ok: true,
        value: { kind: 'string', value: 'B-2' },
      });
    });

    it('reads null as a value', () => {
      expect(new FieldExpression('a', 'note').value(events)).toEqual({ ok: true, value: { kind: 'null' } });
    });

    it('reads event metadata through $-prefixed names', () => {
      expect(new FieldExpression('a', '$topic').value(events)).toEqual({
        ok: true,
        value: { kind: 'string', value: 'order.created' },
      });
      expect(new FieldExpression('a', '$timestamp').value(events)).toEqual({
        ok: true,
        value: { kind: 'number', value: 1000 },
      });
      expect(new FieldExpression('a', '$id').value(events)).toEqual({
        ok: true,
        value: { kind: 'string', value: 'e-1' },
      });
      expect(new FieldExpression('a', '$source').value(events)).toEqual({
        ok: true,
        value: { kind: 'string', value: 'checkout' },
      });
    });

    it('fails with EventNotFoundError for an unbound alias', () => {
      const error = errorOf(new FieldExpression('b', 'amount').value(events));

      expect(error).toBeInstanceOf(EventNotFoundError);
      expect(error).toMatchObject({ alias: 'b', message: 'Event not found for alias "b"' });
    });

    it('fails with FieldNotFoundError for a missing field', () => {
      const error = errorOf(new FieldExpression('a', 'customer.name').value(events));

      expect(error).toBeInstanceOf(FieldNotFoundError);
      expect(error).toMatchObject({ message: 'Field "customer.name" not found on event "a"' });
    });

    it('does not walk into inherited properties', () => {
      expect(errorOf(new FieldExpression('a', 'customer.toString').value(events))).toBeInstanceOf(
        FieldNotFoundError,
      );
    });

    it('does not read below metadata or unknown $ names', () => {
      expect(errorOf(new FieldExpression('a', '$topic.length').value(events))).toBeInstanceOf(
        FieldNotFoundError,
      );
      expect(errorOf(new FieldExpression('a', '$data').value(events))).toBeInstanceOf(FieldNotFoundError);
    });

    it('fails with FieldTypeError for a value without scalar form', () => {
      const error = errorOf(new FieldExpression('a', 'callback').value(events));

      expect(error).toBeInstanceOf(FieldTypeError);
      expect(error).toMatchObject({ message: 'Field "a.callback" has unsupported type function' });
    });

    it('fails with MalformedExpressionError for empty segments', () => {
      expect(errorOf(new FieldExpression('a', 'customer..tier').value(events))).toBeInstanceOf(
        MalformedExpressionError,
      );
      expect(errorOf(new FieldExpression('', 'amount').value(events))).toBeInstanceOf(
        MalformedExpressionError,
      );
    });

    it('reports an unbound alias before checking the path', () => {
      const error = errorOf(new FieldExpression('a', '').value(CapturedEventSequence.empty()));

      expect(error).toBeInstanceOf(EventNotFoundError);
      expect(error).toMatchObject({ alias: 'a' });
    });
  });

  it('renders query text and used aliases', () => {
    const expr = new FieldExpression('a', 'customer.tier');

    expect(expr.queryText()).toBe('a.customer.tier');
    expect(expr.usedAliases()).toEqual(['a']);
  });
});

describe('LiteralExpression', () => {
  it('always resolves to its value', () => {
    expect(LiteralExpression.of(5).value()).toEqual({ ok: true, value: { kind: 'number', value: 5 } });
    expect(LiteralExpression.of('paid').value()).toEqual({ ok: true, value: { kind: 'string', value: 'paid' } });
  });

  it('renders as a literal and reads no alias', () => {
    const expr = LiteralExpression.of(['a', 1]);

    expect(expr.queryText()).toBe('["a", 1]');
    expect(expr.usedAliases()).toEqual([]);
  });
});
