import type { FieldKind } from './enums';

/**
 * A scalar kind, or a one-element tuple for a homogeneous sequence of it.
 */
export type FieldKindSpec = FieldKind | readonly [FieldKind];

/**
 * Annotation per namespace, `key` or `key,modifier`.
 */
export type FieldTags = Readonly<Record<string, string>>;

export type BindableKind = Exclude<FieldKind, FieldKind.Object>;

export type ScalarValue = number | bigint | boolean | string;

export type ScalarFieldValue<K extends FieldKind> = K extends FieldKind.Bool
  ? boolean
  : K extends FieldKind.String
    ? string
    : K extends FieldKind.Object
      ? unknown
      : K extends FieldKind.BigInt | FieldKind.BigUint
        ? bigint
        : number;

export type FieldValue<S extends FieldKindSpec> = S extends readonly [FieldKind.Byte]
  ? Uint8Array
  : S extends readonly [infer E extends FieldKind]
    ? ScalarFieldValue<E>[]
    : S extends FieldKind
      ? ScalarFieldValue<S>
      : never;
