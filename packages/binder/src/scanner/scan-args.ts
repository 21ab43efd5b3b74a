import { Logger } from '@argbind/logger';

import type { ArgumentSource } from '../args';
import { ArgumentDecodeError } from '../errors';

import { CoercionError, coerceScalar } from './coercion';
import { FieldKind } from './enums';
import { getFieldDescriptors } from './metadata-storage';
import type { BindableKind, ScalarValue } from './types';

const logger = new Logger('ArgsScanner');

/**
 * Populates the `@Field` properties of `target` that carry an annotation under
 * `namespace` from `args`, coercing raw text into each declared kind.
 *
 * Fields without a matching argument keep their current value. The first
 * coercion failure throws {@link ArgumentDecodeError}; fields assigned before it
 * stay assigned.
 *
 * @returns the binding keys that were matched and assigned, in field order
 */
export function scanArgs(args: ArgumentSource, target: object, namespace: string): string[] {
  const fields: string[] = [];

  for (const field of getFieldDescriptors(target.constructor, namespace)) {
    if (!isWritable(target, field.propertyKey) || !args.has(field.key)) {
      continue;
    }

    // Raw bytes of the first value, no per-element coercion.
    if (field.isSequence && field.kind === FieldKind.Byte) {
      Reflect.set(target, field.propertyKey, args.peekBytes(field.key) ?? new Uint8Array());
      fields.push(field.key);
      continue;
    }

    if (field.kind === FieldKind.Object) {
      continue;
    }

    const kind = field.kind;

    if (field.isSequence) {
      const values = args.peekMulti(field.key).map((raw) => coerceArgument(field.key, kind, raw));

      Reflect.set(target, field.propertyKey, values);
    } else {
      Reflect.set(target, field.propertyKey, coerceArgument(field.key, kind, args.peek(field.key) ?? ''));
    }

    fields.push(field.key);
  }

  logger.debug('scanned arguments', { target: target.constructor.name, namespace, fields });

  return fields;
}

function coerceArgument(key: string, kind: BindableKind, raw: string): ScalarValue {
  try {
    return coerceScalar(kind, raw);
  } catch (error) {
    if (error instanceof CoercionError) {
      throw new ArgumentDecodeError(key, raw, error.reason, { cause: error });
    }

    throw error;
  }
}

/**
 * Data properties must be writable, accessors need a setter, new properties
 * need an extensible target.
 */
function isWritable(target: object, propertyKey: string): boolean {
  for (let current: object | null = target; current !== null; current = Object.getPrototypeOf(current)) {
    const descriptor = Object.getOwnPropertyDescriptor(current, propertyKey);

    if (!descriptor) {
      continue;
    }

    if (descriptor.get !== undefined || descriptor.set !== undefined) {
      return descriptor.set !== undefined;
    }

    return descriptor.writable === true && (current === target || Object.isExtensible(target));
  }

  return Object.isExtensible(target);
}
