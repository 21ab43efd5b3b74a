import type { CanonicalArray, CanonicalObject, CanonicalScalar } from './interfaces';
import type { CanonicalScalarValue, CanonicalTree } from './types';

export function objectNode(entries: Iterable<readonly [string, CanonicalTree]> = []): CanonicalObject {
  return { kind: 'object', entries: new Map(entries) };
}

export function arrayNode(items: CanonicalTree[] = []): CanonicalArray {
  return { kind: 'array', items };
}

export function scalarNode(value: CanonicalScalarValue): CanonicalScalar {
  return { kind: 'scalar', value };
}

/**
 * Reads a raw argument as a JSON literal. Finite numbers, booleans, `null` and
 * quoted strings become that scalar; anything else is kept as the raw text.
 */
export function inferScalar(raw: string): CanonicalScalar {
  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch {
    return scalarNode(raw);
  }

  if (
    parsed === null ||
    typeof parsed === 'boolean' ||
    typeof parsed === 'string' ||
    (typeof parsed === 'number' && Number.isFinite(parsed))
  ) {
    return scalarNode(parsed);
  }

  return scalarNode(raw);
}

/**
 * Merges `b` into `a`. Objects merge by key and arrays concatenate; for any
 * other pairing `b` replaces `a`.
 *
 * `a` is mutated and nodes of `b` are adopted, so neither should be reused.
 */
export function mergeTrees(a: CanonicalTree, b: CanonicalTree): CanonicalTree {
  if (a.kind === 'object' && b.kind === 'object') {
    return mergeObjects(a, b);
  }

  if (a.kind === 'array' && b.kind === 'array') {
    a.items.push(...b.items);

    return a;
  }

  return b;
}

export function mergeObjects(a: CanonicalObject, b: CanonicalObject): CanonicalObject {
  for (const [key, value] of b.entries) {
    const existing = a.entries.get(key);

    a.entries.set(key, existing ? mergeTrees(existing, value) : value);
  }

  return a;
}
