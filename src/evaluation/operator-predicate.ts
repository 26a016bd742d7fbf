import type { CapturedEvents } from '../types/event.js';
import type { Scalar } from '../types/scalar.js';
import {
  PredicateResult,
  type Operator,
  type Predicate,
  type ValueExpression,
} from '../types/predicate.js';
import { OPERATOR_SYMBOLS, type OrderingOperator } from '../validation/constants.js';
import { asNumber, scalarEquals } from '../utils/scalar.js';
import { defaultLogger, type DiagnosticLogger } from '../logging/logger.js';
import { isEventNotFound, MalformedExpressionError, type EvaluationError } from './errors.js';
import { fromBoolean } from './predicate-result.js';

/** Construction options shared by all predicates */
export interface PredicateOptions {
  /** Sink for diagnostics on error paths (default: console logger at warn level) */
  logger?: DiagnosticLogger;
}

type Operands =
  | { readonly ok: true; readonly left: Scalar; readonly right: Scalar }
  | { readonly ok: false; readonly error: EvaluationError };

/**
 * Compares two value expressions with one operator.
 *
 * `==` and `!=` compare any two values structurally. `>`, `<`, `>=` and `<=`
 * only accept numbers; anything else is logged and evaluates negative.
 * An operand reading an alias that is not bound yet makes the result
 * uncertain.
 *
 * @example
 * ```typescript
 * const p = new OperatorPredicate(new FieldExpression('a', 'x'), 'gt', LiteralExpression.of(5));
 * p.queryText(); // 'a.x > 5'
 * ```
 */
export class OperatorPredicate implements Predicate {
  readonly left: ValueExpression | undefined;
  readonly operator: Operator;
  readonly right: ValueExpression | undefined;
  private readonly logger: DiagnosticLogger;

  constructor(
    left: ValueExpression | undefined,
    operator: Operator,
    right: ValueExpression | undefined,
    options: PredicateOptions = {}
  ) {
    this.left = left;
    this.operator = operator;
    this.right = right;
    this.logger = options.logger ?? defaultLogger;
  }

  evaluate(events: CapturedEvents): PredicateResult {
    const operands = this.resolveOperands(events);

    if (!operands.ok) {
      if (isEventNotFound(operands.error)) {
        return PredicateResult.Uncertain;
      }
      this.logger.error(
        `Could not evaluate operands of "${this.queryText()}": ${operands.error.message}`,
        { queryText: this.queryText(), error: operands.error.name }
      );
      // Terminate this candidate
      return PredicateResult.Negative;
    }

    const { left, right } = operands;

    switch (this.operator) {
      case 'eq':
        return fromBoolean(scalarEquals(left, right));

      case 'neq':
        return fromBoolean(!scalarEquals(left, right));

      case 'gt':
      case 'lt':
      case 'gte':
      case 'lte':
        return this.compareNumbers(this.operator, left, right);

      default:
        this.logger.error(
          `Unhandled operator ${String(this.operator)} in "${this.queryText()}"`,
          { queryText: this.queryText(), operator: String(this.operator) }
        );
        return PredicateResult.Negative;
    }
  }

  queryText(): string {
    let text = this.left ? this.left.queryText() : '';
    text += ' ';
    text += OPERATOR_SYMBOLS[this.operator] ?? '';
    if (this.right) {
      text += ' ' + this.right.queryText();
    }
    return text;
  }

  usedAliases(): readonly string[] {
    return [
      ...(this.left?.usedAliases() ?? []),
      ...(this.right?.usedAliases() ?? []),
    ];
  }

  private resolveOperands(events: CapturedEvents): Operands {
    if (!this.left || !this.right) {
      return { ok: false, error: new MalformedExpressionError('Left and right operands must not be missing') };
    }

    const left = this.left.value(events);
    if (!left.ok) return left;

    const right = this.right.value(events);
    if (!right.ok) return right;

    return { ok: true, left: left.value, right: right.value };
  }

  private compareNumbers(
    operator: OrderingOperator,
    left: Scalar,
    right: Scalar
  ): PredicateResult {
    const l = asNumber(left);
    const r = asNumber(right);

    if (l === undefined || r === undefined) {
      this.logger.error(
        `Could not compare ${operator} for non-numeric operands: ${this.queryText()}`,
        { queryText: this.queryText(), left: left.kind, right: right.kind }
      );
      // Terminate this candidate
      return PredicateResult.Negative;
    }

    switch (operator) {
      case 'gt':
        return fromBoolean(l > r);
      case 'lt':
        return fromBoolean(l < r);
      case 'gte':
        return fromBoolean(l >= r);
      case 'lte':
        return fromBoolean(l <= r);
    }
  }
}
