import { IGNORE_TAG, TAG_MODIFIER_SEPARATOR } from './constants';
import type { FieldDeclaration, FieldDescriptor } from './interfaces';

// Key: Class Constructor, Value: declared fields by property name
const storage = new WeakMap<Function, Map<string, FieldDeclaration>>();
const compiled = new WeakMap<Function, Map<string, readonly FieldDescriptor[]>>();

export class MetadataStorage {
  static addField(constructor: Function, declaration: FieldDeclaration): void {
    let fields = storage.get(constructor);

    if (!fields) {
      fields = new Map();
      storage.set(constructor, fields);
    }

    if (fields.has(declaration.propertyKey)) {
      throw new Error(`@Field is applied more than once to ${constructor.name}.${declaration.propertyKey}`);
    }

    fields.set(declaration.propertyKey, declaration);
  }

  /**
   * Declared fields of a class and its ancestors, base class fields first.
   * A redeclared field replaces the inherited one in place.
   */
  static getDeclarations(constructor: Function): FieldDeclaration[] {
    const chain: Function[] = [];

    for (
      let current: unknown = constructor;
      typeof current === 'function' && current !== Function.prototype;
      current = Object.getPrototypeOf(current)
    ) {
      chain.unshift(current);
    }

    const merged = new Map<string, FieldDeclaration>();

    for (const ctor of chain) {
      for (const [propertyKey, declaration] of storage.get(ctor) ?? []) {
        merged.set(propertyKey, declaration);
      }
    }

    return [...merged.values()];
  }
}

/**
 * Resolves the fields of `constructor` bindable under `namespace`, in declaration order.
 * The table is built once per class and namespace.
 */
export function getFieldDescriptors(constructor: Function, namespace: string): readonly FieldDescriptor[] {
  let byNamespace = compiled.get(constructor);

  if (!byNamespace) {
    byNamespace = new Map();
    compiled.set(constructor, byNamespace);
  }

  const cached = byNamespace.get(namespace);

  if (cached) {
    return cached;
  }

  const descriptors: FieldDescriptor[] = [];

  for (const { propertyKey, kind, tags } of MetadataStorage.getDeclarations(constructor)) {
    const tag = tags[namespace];

    if (tag === undefined || tag === '' || tag === IGNORE_TAG) {
      continue;
    }

    const separatorIndex = tag.indexOf(TAG_MODIFIER_SEPARATOR);
    const key = separatorIndex === -1 ? tag : tag.slice(0, separatorIndex);

    if (key === '') {
      continue;
    }

    descriptors.push(
      typeof kind === 'string'
        ? { propertyKey, key, tag, kind, isSequence: false }
        : { propertyKey, key, tag, kind: kind[0], isSequence: true },
    );
  }

  byNamespace.set(namespace, descriptors);

  return descriptors;
}
