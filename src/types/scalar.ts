/**
 * Runtime value produced by a value expression.
 *
 * Closed tagged union so that equality and numeric extraction are defined
 * explicitly per kind instead of by inspecting arbitrary JS values.
 */
export type Scalar =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'null' }
  | { readonly kind: 'list'; readonly items: readonly Scalar[] }
  | { readonly kind: 'record'; readonly entries: ReadonlyMap<string, Scalar> };

export type ScalarKind = Scalar['kind'];

/** Plain JS value a {@link Scalar} converts from and back to */
export type PlainValue =
  | number
  | string
  | boolean
  | null
  | readonly PlainValue[]
  | { readonly [key: string]: PlainValue };
