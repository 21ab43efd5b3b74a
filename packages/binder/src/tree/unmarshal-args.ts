import type { TypeOf, ZodTypeAny } from 'zod';

import type { ArgumentSource } from '../args';
import { StructuredDecodeError } from '../errors';

import type { CanonicalObject, TreeBuilderOptions } from './interfaces';
import { serializeTree } from './serializer';
import { TreeBuilder } from './tree-builder';

export function buildArgsTree(args: ArgumentSource, options?: TreeBuilderOptions): CanonicalObject {
  return new TreeBuilder(options).build(args);
}

/**
 * `a[b][c]=1&a[d][]=x` becomes `{"a":{"b":{"c":1},"d":["x"]}}`.
 */
export function toCanonicalJson(args: ArgumentSource, options?: TreeBuilderOptions): string {
  return serializeTree(buildArgsTree(args, options));
}

/**
 * Decodes canonical JSON text through `schema`, which maps keys to fields by name.
 */
export function decodeCanonical<S extends ZodTypeAny>(json: string, schema: S): TypeOf<S> {
  let data: unknown;

  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new StructuredDecodeError('failed to decode arguments: invalid JSON', [], { cause: error });
  }

  return decodeStructured(data, schema);
}

/**
 * Decodes already parsed data (a JSON or XML document) through `schema`.
 */
export function decodeStructured<S extends ZodTypeAny>(data: unknown, schema: S): TypeOf<S> {
  const result = schema.safeParse(data);

  if (!result.success) {
    throw StructuredDecodeError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Builds the canonical tree of `args` and decodes it into the shape of `schema`.
 */
export function unmarshalArgs<S extends ZodTypeAny>(
  args: ArgumentSource,
  schema: S,
  options?: TreeBuilderOptions,
): TypeOf<S> {
  return decodeCanonical(toCanonicalJson(args, options), schema);
}
