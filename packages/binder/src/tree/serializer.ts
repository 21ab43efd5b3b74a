import type { CanonicalTree } from './types';

/**
 * Canonical JSON text of a tree: object keys sorted by code unit, no whitespace.
 * Equal trees always serialize to the same text, whatever order their keys were merged in.
 */
export function serializeTree(tree: CanonicalTree): string {
  switch (tree.kind) {
    case 'scalar':
      return JSON.stringify(tree.value);
    case 'array':
      return `[${tree.items.map(serializeTree).join(',')}]`;
    case 'object': {
      const keys = [...tree.entries.keys()].sort();
      const members: string[] = [];

      for (const key of keys) {
        const value = tree.entries.get(key);

        if (value) {
          members.push(`${JSON.stringify(key)}:${serializeTree(value)}`);
        }
      }

      return `{${members.join(',')}}`;
    }
  }
}
