import { randomUUID } from 'node:crypto';
import type { CapturedEvent, CapturedEvents } from '../types/event.js';

/** Input accepted by {@link createEvent}; everything but `data` is optional */
export interface CapturedEventInput {
  id?: string;
  topic?: string;
  data?: Record<string, unknown>;
  timestamp?: number;
  source?: string;
}

/**
 * Builds a {@link CapturedEvent}, filling in missing metadata.
 */
export function createEvent(input: CapturedEventInput, now: () => number = Date.now): CapturedEvent {
  return {
    id: input.id ?? randomUUID(),
    topic: input.topic ?? '',
    data: input.data ?? {},
    timestamp: input.timestamp ?? now(),
    source: input.source ?? 'unknown',
  };
}

/**
 * Immutable, ordered alias → event binding of one candidate match.
 *
 * Extending returns a new snapshot that shares nothing mutable with the
 * previous one, so an in-flight evaluation never sees a binding change
 * under it.
 *
 * @example
 * ```typescript
 * const empty = CapturedEventSequence.empty();
 * const withA = empty.extend('a', createEvent({ topic: 'order.created', data: { amount: 10 } }));
 *
 * predicate.evaluate(empty);  // 'uncertain'
 * predicate.evaluate(withA);  // 'positive' | 'negative'
 * ```
 */
export class CapturedEventSequence implements CapturedEvents {
  private static readonly EMPTY = new CapturedEventSequence([], new Map());

  private constructor(
    private readonly order: readonly string[],
    private readonly byAlias: ReadonlyMap<string, CapturedEvent>
  ) {}

  static empty(): CapturedEventSequence {
    return CapturedEventSequence.EMPTY;
  }

  /**
   * Builds a sequence from `[alias, event]` pairs or a record, in iteration order.
   *
   * @throws {Error} If an alias appears twice.
   */
  static from(
    bindings: Iterable<readonly [string, CapturedEvent]> | Readonly<Record<string, CapturedEvent>>
  ): CapturedEventSequence {
    const pairs = isIterable(bindings) ? bindings : Object.entries(bindings);
    let sequence = CapturedEventSequence.EMPTY;
    for (const [alias, event] of pairs) {
      sequence = sequence.extend(alias, event);
    }
    return sequence;
  }

  get size(): number {
    return this.order.length;
  }

  lookup(alias: string): CapturedEvent | undefined {
    return this.byAlias.get(alias);
  }

  has(alias: string): boolean {
    return this.byAlias.has(alias);
  }

  aliases(): readonly string[] {
    return this.order;
  }

  /**
   * Returns a new sequence with `event` bound to `alias`.
   *
   * @throws {Error} If `alias` is empty or already bound.
   */
  extend(alias: string, event: CapturedEvent): CapturedEventSequence {
    if (alias.length === 0) {
      throw new Error('Alias must be a non-empty string');
    }
    if (this.byAlias.has(alias)) {
      throw new Error(`Alias "${alias}" is already bound`);
    }
    const byAlias = new Map(this.byAlias);
    byAlias.set(alias, event);
    return new CapturedEventSequence(Object.freeze([...this.order, alias]), byAlias);
  }

  /** Bound events in binding order */
  events(): CapturedEvent[] {
    return this.order
      .map(alias => this.byAlias.get(alias))
      .filter((e): e is CapturedEvent => e !== undefined);
  }

  toJSON(): Record<string, CapturedEvent> {
    const result: Record<string, CapturedEvent> = {};
    for (const alias of this.order) {
      const event = this.byAlias.get(alias);
      if (event) result[alias] = event;
    }
    return result;
  }
}

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}
