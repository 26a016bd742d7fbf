import type { PlainValue, Scalar } from '../types/scalar.js';
import type { ValueExpression, ValueResult } from '../types/predicate.js';
import { formatScalar, fromPlain } from '../utils/scalar.js';
import { ok } from './value-result.js';

/**
 * Constant value. Reads no alias and always resolves.
 */
export class LiteralExpression implements ValueExpression {
  readonly scalar: Scalar;

  constructor(scalar: Scalar) {
    this.scalar = scalar;
  }

  static of(value: PlainValue): LiteralExpression {
    return new LiteralExpression(fromPlain(value));
  }

  value(): ValueResult {
    return ok(this.scalar);
  }

  queryText(): string {
    return formatScalar(this.scalar);
  }

  usedAliases(): readonly string[] {
    return [];
  }
}
