import type { CapturedEvents } from '../../types/event.js';
import type { Operator, ValueExpression, ValueResult } from '../../types/predicate.js';
import type { Operand, DslOptions } from '../types.js';
import { OperatorPredicate } from '../../evaluation/operator-predicate.js';
import { toExpression } from '../helpers/ref.js';

/**
 * Value expression with chainable comparison operators.
 *
 * Created via {@link field} or {@link literal}. Each operator method returns
 * a new {@link OperatorPredicate}; the builder itself stays unchanged and can
 * be reused for several comparisons.
 *
 * @example
 * ```typescript
 * field('a.amount').gte(100)
 * field('a.customerId').eq(field('b.customerId'))
 * field('b.price').lt(ref('a.price'))
 * ```
 */
export class ExprBuilder implements ValueExpression {
  constructor(
    readonly expression: ValueExpression,
    private readonly options: DslOptions = {}
  ) {}

  value(events: CapturedEvents): ValueResult {
    return this.expression.value(events);
  }

  queryText(): string {
    return this.expression.queryText();
  }

  usedAliases(): readonly string[] {
    return this.expression.usedAliases();
  }

  /**
   * Equal — positive when both values are structurally equal.
   */
  eq(value: Operand): OperatorPredicate {
    return this.compare('eq', value);
  }

  /**
   * Not equal — positive when the values differ structurally.
   */
  neq(value: Operand): OperatorPredicate {
    return this.compare('neq', value);
  }

  /**
   * Greater than. Both sides must resolve to numbers.
   */
  gt(value: Operand): OperatorPredicate {
    return this.compare('gt', value);
  }

  /**
   * Greater than or equal. Both sides must resolve to numbers.
   */
  gte(value: Operand): OperatorPredicate {
    return this.compare('gte', value);
  }

  /**
   * Less than. Both sides must resolve to numbers.
   */
  lt(value: Operand): OperatorPredicate {
    return this.compare('lt', value);
  }

  /**
   * Less than or equal. Both sides must resolve to numbers.
   */
  lte(value: Operand): OperatorPredicate {
    return this.compare('lte', value);
  }

  /**
   * Comparison with an operator chosen at runtime.
   */
  compare(operator: Operator, value: Operand): OperatorPredicate {
    return new OperatorPredicate(this.expression, operator, toExpression(value), this.options);
  }
}
