import type { PlainValue, Scalar } from '../types/scalar.js';

const IDENTIFIER_RE = /^[A-Za-z_$][\w$]*$/;

export const NULL_SCALAR: Scalar = { kind: 'null' };

export function numberScalar(value: number): Scalar {
  return { kind: 'number', value };
}

export function stringScalar(value: string): Scalar {
  return { kind: 'string', value };
}

export function booleanScalar(value: boolean): Scalar {
  return { kind: 'boolean', value };
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Converts a plain value into a {@link Scalar}. Total for {@link PlainValue}.
 */
export function fromPlain(value: PlainValue): Scalar {
  if (value === null) return NULL_SCALAR;
  if (typeof value === 'number') return numberScalar(value);
  if (typeof value === 'string') return stringScalar(value);
  if (typeof value === 'boolean') return booleanScalar(value);
  if (isPlainList(value)) {
    return { kind: 'list', items: value.map(fromPlain) };
  }
  const entries = new Map<string, Scalar>();
  for (const key of Object.keys(value)) {
    const item = value[key];
    if (item !== undefined) entries.set(key, fromPlain(item));
  }
  return { kind: 'record', entries };
}

function isPlainList(value: PlainValue): value is readonly PlainValue[] {
  return Array.isArray(value);
}

/**
 * Converts an arbitrary runtime value (typically event payload data) into a
 * {@link Scalar}.
 *
 * Returns `undefined` when the value, or anything nested in it, has no scalar
 * representation: `undefined`, functions, symbols, bigints, cyclic structures
 * and objects that are not plain records. `Date` maps to its epoch millis.
 * `undefined` record entries are skipped.
 */
export function toScalar(raw: unknown): Scalar | undefined {
  return convert(raw, new Set());
}

function convert(raw: unknown, seen: Set<object>): Scalar | undefined {
  if (typeof raw === 'number') return numberScalar(raw);
  if (typeof raw === 'string') return stringScalar(raw);
  if (typeof raw === 'boolean') return booleanScalar(raw);
  if (raw === null) return NULL_SCALAR;
  if (typeof raw !== 'object') return undefined;
  if (raw instanceof Date) return numberScalar(raw.getTime());
  if (seen.has(raw)) return undefined;

  seen.add(raw);
  try {
    if (Array.isArray(raw)) {
      const items: Scalar[] = [];
      for (const item of raw) {
        const converted = convert(item, seen);
        if (converted === undefined) return undefined;
        items.push(converted);
      }
      return { kind: 'list', items };
    }

    if (!isPlainObject(raw)) return undefined;

    const entries = new Map<string, Scalar>();
    for (const [key, item] of Object.entries(raw)) {
      if (item === undefined) continue;
      const converted = convert(item, seen);
      if (converted === undefined) return undefined;
      entries.set(key, converted);
    }
    return { kind: 'record', entries };
  } finally {
    seen.delete(raw);
  }
}

/**
 * Describes the runtime type of a value for diagnostics.
 */
export function describeType(raw: unknown): string {
  if (raw === null) return 'null';
  if (Array.isArray(raw)) return 'array';
  if (typeof raw === 'object') {
    const proto: unknown = Object.getPrototypeOf(raw);
    if (typeof proto !== 'object' || proto === null || proto === Object.prototype) return 'object';
    const ctor: unknown = proto.constructor;
    if (typeof ctor !== 'function') return 'object';
    return ctor.name.length > 0 ? ctor.name : 'object';
  }
  return typeof raw;
}

/**
 * Structural equality over scalars.
 *
 * Numbers compare with `===`: `NaN` is not equal to itself and `0` equals
 * `-0`. Record entry order does not matter, list order does.
 */
export function scalarEquals(left: Scalar, right: Scalar): boolean {
  switch (left.kind) {
    case 'number':
      return right.kind === 'number' && left.value === right.value;
    case 'string':
      return right.kind === 'string' && left.value === right.value;
    case 'boolean':
      return right.kind === 'boolean' && left.value === right.value;
    case 'null':
      return right.kind === 'null';
    case 'list': {
      if (right.kind !== 'list' || left.items.length !== right.items.length) return false;
      const others = right.items;
      return left.items.every((item, i) => {
        const other = others[i];
        return other !== undefined && scalarEquals(item, other);
      });
    }
    case 'record': {
      if (right.kind !== 'record' || left.entries.size !== right.entries.size) return false;
      for (const [key, value] of left.entries) {
        const other = right.entries.get(key);
        if (other === undefined || !scalarEquals(value, other)) return false;
      }
      return true;
    }
  }
}

/** Numeric value of a scalar, or `undefined` for every non-number kind */
export function asNumber(value: Scalar): number | undefined {
  return value.kind === 'number' ? value.value : undefined;
}

function formatKey(key: string): string {
  return IDENTIFIER_RE.test(key) ? key : JSON.stringify(key);
}

/**
 * Renders a scalar the way it is written in condition text.
 */
export function formatScalar(value: Scalar): string {
  switch (value.kind) {
    case 'number':
      return String(value.value);
    case 'string':
      return JSON.stringify(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'null':
      return 'null';
    case 'list':
      return `[${value.items.map(formatScalar).join(', ')}]`;
    case 'record': {
      const parts: string[] = [];
      for (const [key, item] of value.entries) {
        parts.push(`${formatKey(key)}: ${formatScalar(item)}`);
      }
      return `{${parts.join(', ')}}`;
    }
  }
}

/**
 * Converts a scalar back into a plain JS value (e.g. for JSON output).
 */
export function toPlain(value: Scalar): PlainValue {
  switch (value.kind) {
    case 'number':
    case 'string':
    case 'boolean':
      return value.value;
    case 'null':
      return null;
    case 'list':
      return value.items.map(toPlain);
    case 'record': {
      const result: Record<string, PlainValue> = {};
      for (const [key, item] of value.entries) {
        result[key] = toPlain(item);
      }
      return result;
    }
  }
}
