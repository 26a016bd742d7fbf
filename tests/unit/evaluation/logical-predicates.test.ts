import { describe, it, expect } from 'vitest';
import { AndPredicate, NotPredicate, OrPredicate } from '../../../src/evaluation/logical-predicates.js';
import { CapturedEventSequence } from '../../../src/core/captured-event-sequence.js';
import { PredicateResult, type Predicate } from '../../../src/types/predicate.js';

/** Predicate with a fixed result that counts its evaluations */
class FixedPredicate implements Predicate {
  calls = 0;

  constructor(
    private readonly result: PredicateResult,
    private readonly text: string,
    private readonly aliases: string[] = [],
  ) {}

  evaluate(): PredicateResult {
    this.calls++;
    return this.result;
  }

  queryText(): string {
    return this.text;
  }

  usedAliases(): readonly string[] {
    return this.aliases;
  }
}

const { Positive, Negative, Uncertain } = PredicateResult;
const events = CapturedEventSequence.empty();

function fixed(result: PredicateResult): FixedPredicate {
  return new FixedPredicate(result, result);
}

describe('AndPredicate', () => {
  it.each<[PredicateResult[], PredicateResult]>([
    [[Positive, Positive], Positive],
    [[Positive, Uncertain], Uncertain],
    [[Uncertain, Negative], Negative],
    [[Positive, Negative, Uncertain], Negative],
  ])('combines %j into %s', (results, expected) => {
    expect(new AndPredicate(results.map(fixed)).evaluate(events)).toBe(expected);
  });

  it('stops at the first negative child', () => {
    const last = fixed(Positive);

    new AndPredicate([fixed(Negative), last]).evaluate(events);

    expect(last.calls).toBe(0);
  });

  it('renders children joined with AND', () => {
    const predicate = new AndPredicate([new FixedPredicate(Positive, 'a.x > 1'), new FixedPredicate(Positive, 'b.y == 2')]);

    expect(predicate.queryText()).toBe('(a.x > 1 AND b.y == 2)');
  });

  it('requires at least one child', () => {
    expect(() => new AndPredicate([])).toThrow('AND predicate requires at least one child');
  });

  it('does not see later changes to the input array', () => {
    const children: Predicate[] = [fixed(Positive)];
    const predicate = new AndPredicate(children);
    children.push(fixed(Negative));

    expect(predicate.evaluate(events)).toBe(Positive);
  });
});

describe('OrPredicate', () => {
  it.each<[PredicateResult[], PredicateResult]>([
    [[Negative, Negative], Negative],
    [[Negative, Uncertain], Uncertain],
    [[Uncertain, Positive], Positive],
  ])('combines %j into %s', (results, expected) => {
    expect(new OrPredicate(results.map(fixed)).evaluate(events)).toBe(expected);
  });

  it('stops at the first positive child', () => {
    const last = fixed(Negative);

    new OrPredicate([fixed(Positive), last]).evaluate(events);

    expect(last.calls).toBe(0);
  });

  it('renders children joined with OR and collects aliases in order', () => {
    const predicate = new OrPredicate([
      new FixedPredicate(Positive, 'a.x > 1', ['a']),
      new FixedPredicate(Positive, 'a.y == b.y', ['a', 'b']),
    ]);

    expect(predicate.queryText()).toBe('(a.x > 1 OR a.y == b.y)');
    expect(predicate.usedAliases()).toEqual(['a', 'a', 'b']);
  });

  it('requires at least one child', () => {
    expect(() => new OrPredicate([])).toThrow('OR predicate requires at least one child');
  });
});

describe('NotPredicate', () => {
  it('negates decided results and keeps uncertain', () => {
    expect(new NotPredicate(fixed(Positive)).evaluate(events)).toBe(Negative);
    expect(new NotPredicate(fixed(Negative)).evaluate(events)).toBe(Positive);
    expect(new NotPredicate(fixed(Uncertain)).evaluate(events)).toBe(Uncertain);
  });

  it('renders with a NOT prefix and passes aliases through', () => {
    const predicate = new NotPredicate(new FixedPredicate(Positive, 'a.x == 1', ['a']));

    expect(predicate.queryText()).toBe('NOT a.x == 1');
    expect(predicate.usedAliases()).toEqual(['a']);
  });
});
