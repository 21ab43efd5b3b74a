import type { FieldKind } from './enums';
import type { FieldKindSpec, FieldTags } from './types';

/**
 * What `@Field` records for one property.
 */
export interface FieldDeclaration {
  propertyKey: string;
  kind: FieldKindSpec;
  tags: FieldTags;
}

/**
 * A declared field resolved against one annotation namespace.
 */
export interface FieldDescriptor {
  propertyKey: string;
  /** Lookup key, the annotation up to its first modifier. */
  key: string;
  /** The annotation as declared. */
  tag: string;
  /** Scalar kind, or the element kind of a sequence. */
  kind: FieldKind;
  isSequence: boolean;
}
