import type { CapturedEvent, CapturedEvents } from '../types/event.js';
import type { ValueExpression, ValueResult } from '../types/predicate.js';
import { EVENT_META_FIELDS, type EventMetaField } from '../validation/constants.js';
import { describeType, toScalar } from '../utils/scalar.js';
import {
  EventNotFoundError,
  FieldNotFoundError,
  FieldTypeError,
  MalformedExpressionError,
} from './errors.js';
import { fail, ok } from './value-result.js';

const META_PREFIX = '$';

function isMetaField(name: string): name is EventMetaField {
  return (EVENT_META_FIELDS as readonly string[]).includes(name);
}

/**
 * Reads a field of the event bound to an alias: `a.amount`, `a.customer.tier`,
 * `a.items.0.sku`.
 *
 * Paths read the event payload. A first segment of `$id`, `$topic`,
 * `$timestamp` or `$source` reads the event metadata instead.
 */
export class FieldExpression implements ValueExpression {
  readonly alias: string;
  readonly path: string;
  private readonly segments: readonly string[];

  constructor(alias: string, path: string) {
    this.alias = alias;
    this.path = path;
    this.segments = Object.freeze(path.split('.'));
  }

  value(events: CapturedEvents): ValueResult {
    if (this.alias.length === 0) {
      return fail(new MalformedExpressionError(`Invalid field reference "${this.queryText()}"`));
    }

    const event = events.lookup(this.alias);
    if (!event) {
      return fail(new EventNotFoundError(this.alias));
    }

    if (this.segments.some(s => s.length === 0)) {
      return fail(new MalformedExpressionError(`Invalid field reference "${this.queryText()}"`));
    }

    const raw = this.read(event);
    if (raw === undefined) {
      return fail(new FieldNotFoundError(this.alias, this.path));
    }

    const scalar = toScalar(raw);
    if (scalar === undefined) {
      return fail(new FieldTypeError(this.alias, this.path, describeType(raw)));
    }
    return ok(scalar);
  }

  queryText(): string {
    return `${this.alias}.${this.path}`;
  }

  usedAliases(): readonly string[] {
    return [this.alias];
  }

  private read(event: CapturedEvent): unknown {
    const [first, ...rest] = this.segments;
    if (first === undefined) return undefined;

    if (first.startsWith(META_PREFIX)) {
      const name = first.slice(META_PREFIX.length);
      if (!isMetaField(name)) return undefined;
      return rest.length === 0 ? event[name] : undefined;
    }

    let current: unknown = event.data;
    for (const segment of this.segments) {
      if (current === null || typeof current !== 'object') return undefined;
      const descriptor = Object.getOwnPropertyDescriptor(current, segment);
      if (!descriptor) return undefined;
      current = descriptor.value;
    }
    return current;
  }
}
