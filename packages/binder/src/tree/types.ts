import type { CanonicalArray, CanonicalObject, CanonicalScalar } from './interfaces';

export type CanonicalScalarValue = string | number | boolean | null;

export type CanonicalTree = CanonicalObject | CanonicalArray | CanonicalScalar;

/**
 * Root name followed by its bracket segments. `''` stands for `[]`.
 */
export type KeySegments = [name: string, ...path: string[]];
