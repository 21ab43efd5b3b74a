import { MetadataStorage } from './metadata-storage';
import type { FieldKindSpec, FieldTags, FieldValue } from './types';

/**
 * Declares the kind of a property and its binding key per annotation namespace.
 *
 * ```ts
 * class OrderQuery {
 *   @Field(FieldKind.String, { url: 'symbol', form: 'trading_symbol' })
 *   symbol = '';
 *
 *   @Field([FieldKind.String], { url: 'tag' })
 *   tags: string[] = [];
 * }
 * ```
 *
 * The property type must match `kind`: a mismatch fails to compile.
 */
export function Field<const S extends FieldKindSpec>(kind: S, tags: FieldTags = {}) {
  return <K extends string>(target: { [P in K]?: FieldValue<S> }, propertyKey: K): void => {
    MetadataStorage.addField(target.constructor, { propertyKey, kind, tags });
  };
}
