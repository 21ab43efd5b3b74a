import { BadRequestError } from '@argbind/common';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { ArgumentDecodeError, BracketSyntaxError, StructuredDecodeError } from './errors';

describe('ArgumentDecodeError', () => {
  it('should name the key, the raw value and the reason', () => {
    const error = new ArgumentDecodeError('badnum', 'abc', 'expected int');

    expect(error).toBeInstanceOf(BadRequestError);
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe('failed to decode `badnum`, got: `abc` (expected int)');
    expect(error.key).toBe('badnum');
    expect(error.value).toBe('abc');
    expect(error.reason).toBe('expected int');
    expect(error.name).toBe('ArgumentDecodeError');
  });
});

describe('BracketSyntaxError', () => {
  it('should describe the malformed key', () => {
    const error = new BracketSyntaxError('a[b', 'unclosed bracket');

    expect(error.message).toBe('Malformed query string: unclosed bracket in key "a[b"');
    expect(error.statusCode).toBe(400);
  });
});

describe('StructuredDecodeError', () => {
  it('should list every zod issue with its path', () => {
    const result = z.object({ page: z.number(), user: z.object({ name: z.string() }) }).safeParse({ page: 'x', user: { name: 1 } });

    expect(result.success).toBe(false);
    if (result.success) {
      return;
    }

    const error = StructuredDecodeError.fromZodError(result.error);

    expect(error.issues.map((issue) => issue.path)).toEqual([['page'], ['user', 'name']]);
    expect(error.message).toBe(
      'failed to decode arguments: page: Expected number, received string; user.name: Expected string, received number',
    );
    expect(error.cause).toBe(result.error);
  });

  it('should label root issues', () => {
    const result = z.object({}).safeParse(null);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(StructuredDecodeError.fromZodError(result.error).message).toBe(
        'failed to decode arguments: (root): Expected object, received null',
      );
    }
  });
});
