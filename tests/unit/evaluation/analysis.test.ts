import { describe, it, expect } from 'vitest';
import { uniqueAliases, isDecidable, missingAliases } from '../../../src/evaluation/analysis.js';
import { OperatorPredicate } from '../../../src/evaluation/operator-predicate.js';
import { FieldExpression } from '../../../src/evaluation/field-expression.js';
import { AndPredicate } from '../../../src/evaluation/logical-predicates.js';
import { CapturedEventSequence, createEvent } from '../../../src/core/captured-event-sequence.js';

const predicate = new AndPredicate([
  new OperatorPredicate(new FieldExpression('b', 'x'), 'eq', new FieldExpression('a', 'x')),
  new OperatorPredicate(new FieldExpression('a', 'y'), 'gt', new FieldExpression('c', 'y')),
]);

describe('uniqueAliases', () => {
  it('deduplicates in first-use order', () => {
    expect(predicate.usedAliases()).toEqual(['b', 'a', 'a', 'c']);
    expect(uniqueAliases(predicate)).toEqual(['b', 'a', 'c']);
  });

  it('works on value expressions', () => {
    expect(uniqueAliases(new FieldExpression('a', 'x'))).toEqual(['a']);
  });
});

describe('isDecidable and missingAliases', () => {
  it('reports aliases that are not bound yet', () => {
    const events = CapturedEventSequence.from({ a: createEvent({ data: {} }) });

    expect(isDecidable(predicate, events)).toBe(false);
    expect(missingAliases(predicate, events)).toEqual(['b', 'c']);
  });

  it('is decidable once every alias is bound', () => {
    const event = createEvent({ data: {} });
    const events = CapturedEventSequence.from({ a: event, b: event, c: event });

    expect(isDecidable(predicate, events)).toBe(true);
    expect(missingAliases(predicate, events)).toEqual([]);
  });
});
