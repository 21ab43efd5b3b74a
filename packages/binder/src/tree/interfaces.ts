import type { CanonicalScalarValue, CanonicalTree } from './types';

export interface CanonicalObject {
  kind: 'object';
  /** Keys in insertion order. */
  entries: Map<string, CanonicalTree>;
}

export interface CanonicalArray {
  kind: 'array';
  items: CanonicalTree[];
}

export interface CanonicalScalar {
  kind: 'scalar';
  value: CanonicalScalarValue;
}

export interface TreeBuilderOptions {
  /**
   * Reject malformed bracket keys. When disabled, a malformed key is kept as
   * one literal name and a warning is logged.
   * @default true
   */
  strictMode?: boolean;
  /**
   * Maximum number of bracket segments below the root name.
   * @default 20
   */
  depth?: number;
}
