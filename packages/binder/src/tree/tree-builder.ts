import type { ArgumentSource } from '../args';

import { parseBracketKey } from './bracket-key';
import { arrayNode, inferScalar, mergeObjects, objectNode } from './canonical-tree';
import { DEFAULT_TREE_BUILDER_OPTIONS } from './constants';
import type { CanonicalObject, TreeBuilderOptions } from './interfaces';
import type { CanonicalTree, KeySegments } from './types';

/**
 * Folds bracket-keyed arguments into one {@link CanonicalObject}.
 *
 * Pairs are merged in iteration order. On a conflict between a scalar and a
 * container, or between an object and an array, the later pair wins.
 */
export class TreeBuilder {
  private readonly options: Required<TreeBuilderOptions>;

  constructor(options: TreeBuilderOptions = {}) {
    this.options = { ...DEFAULT_TREE_BUILDER_OPTIONS, ...options };
  }

  public build(args: ArgumentSource): CanonicalObject {
    const root = objectNode();

    for (const [key, value] of args.entries()) {
      mergeObjects(root, buildKeyTree(parseBracketKey(key, this.options), value));
    }

    return root;
  }
}

/**
 * Tree of a single pair: `['a', 'b']` gives `{a: {b: value}}` and an empty
 * segment wraps its child in a one-element array, so `['a', '']` gives `{a: [value]}`.
 * Numeric segments stay object keys.
 */
export function buildKeyTree(segments: KeySegments, raw: string): CanonicalObject {
  const [name, ...path] = segments;
  const value = path.reduceRight<CanonicalTree>(
    (child, segment) => (segment === '' ? arrayNode([child]) : objectNode([[segment, child]])),
    inferScalar(raw),
  );

  return objectNode([[name, value]]);
}
