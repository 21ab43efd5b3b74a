import { describe, expect, it } from 'vitest';

import { FieldKind } from './enums';
import { Field } from './field.decorator';
import { MetadataStorage, getFieldDescriptors } from './metadata-storage';

class Filter {
  @Field(FieldKind.String, { url: 'q', form: 'query,omitempty' })
  query = '';

  @Field([FieldKind.Int], { url: 'id' })
  ids: number[] = [];

  @Field(FieldKind.Bool, { url: '-', form: 'archived' })
  archived = false;

  @Field(FieldKind.Uint, { url: '', form: ',omitempty' })
  limit = 0;
}

describe('MetadataStorage', () => {
  it('should record declarations in declaration order', () => {
    expect(MetadataStorage.getDeclarations(Filter).map((declaration) => declaration.propertyKey)).toEqual([
      'query',
      'ids',
      'archived',
      'limit',
    ]);
  });

  it('should reject a property decorated twice', () => {
    expect(() => {
      class Twice {
        @Field(FieldKind.Int, { url: 'a' })
        @Field(FieldKind.Int, { url: 'b' })
        value = 0;
      }

      return Twice;
    }).toThrow('@Field is applied more than once to Twice.value');
  });

  it('should let a subclass redeclare an inherited field in place', () => {
    class Base {
      @Field(FieldKind.Int, { url: 'id' })
      id = 0;

      @Field(FieldKind.String, { url: 'name' })
      name = '';
    }

    class Override extends Base {
      @Field(FieldKind.Uint, { url: 'uid' })
      override id = 0;
    }

    expect(MetadataStorage.getDeclarations(Override)).toEqual([
      { propertyKey: 'id', kind: FieldKind.Uint, tags: { url: 'uid' } },
      { propertyKey: 'name', kind: FieldKind.String, tags: { url: 'name' } },
    ]);
  });
});

describe('getFieldDescriptors', () => {
  it('should resolve keys for a namespace, skipping ignored and empty annotations', () => {
    expect(getFieldDescriptors(Filter, 'url')).toEqual([
      { propertyKey: 'query', key: 'q', tag: 'q', kind: FieldKind.String, isSequence: false },
      { propertyKey: 'ids', key: 'id', tag: 'id', kind: FieldKind.Int, isSequence: true },
    ]);
  });

  it('should strip modifiers after the first separator', () => {
    expect(getFieldDescriptors(Filter, 'form')).toEqual([
      { propertyKey: 'query', key: 'query', tag: 'query,omitempty', kind: FieldKind.String, isSequence: false },
      { propertyKey: 'archived', key: 'archived', tag: 'archived', kind: FieldKind.Bool, isSequence: false },
    ]);
  });

  it('should return the same table for repeated lookups', () => {
    expect(getFieldDescriptors(Filter, 'url')).toBe(getFieldDescriptors(Filter, 'url'));
  });

  it('should be empty for undecorated classes', () => {
    class Plain {
      value = 1;
    }

    expect(getFieldDescriptors(Plain, 'url')).toEqual([]);
  });
});
