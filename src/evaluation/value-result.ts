import type { Scalar } from '../types/scalar.js';
import type { ValueResult } from '../types/predicate.js';
import type { EvaluationError } from './errors.js';

export function ok(value: Scalar): ValueResult {
  return { ok: true, value };
}

export function fail(error: EvaluationError): ValueResult {
  return { ok: false, error };
}
