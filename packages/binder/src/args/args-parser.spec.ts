import { BadRequestError } from '@argbind/common';
import { describe, expect, it } from 'vitest';

import { ArgsParser } from './args-parser';

describe('ArgsParser', () => {
  // ============================================
  // 1. Pair splitting
  // ============================================
  describe('Pair splitting', () => {
    const parser = new ArgsParser();

    it('should parse simple key=value pairs', () => {
      const args = parser.parse('name=ada&page=2');

      expect([...args.entries()]).toEqual([
        ['name', 'ada'],
        ['page', '2'],
      ]);
    });

    it('should keep repeated keys as multiple values', () => {
      expect(parser.parse('tag=a&tag=b&tag=c').peekMulti('tag')).toEqual(['a', 'b', 'c']);
    });

    it('should split on the first equals sign only', () => {
      expect(parser.parse('a=b=c').peek('a')).toBe('b=c');
      expect(parser.parse('a==b').peek('a')).toBe('=b');
    });

    it('should read keys without value as empty flags', () => {
      const args = parser.parse('debug&verbose=');

      expect(args.peek('debug')).toBe('');
      expect(args.peek('verbose')).toBe('');
    });

    it('should ignore a leading question mark', () => {
      expect([...parser.parse('?a=1').keys()]).toEqual(['a']);
      expect([...parser.parse('??a=1').keys()]).toEqual(['?a']);
    });

    it('should skip empty keys and empty segments', () => {
      const args = parser.parse('&&=orphan&a=1&&b=2&');

      expect([...args.entries()]).toEqual([
        ['a', '1'],
        ['b', '2'],
      ]);
    });

    it('should return an empty multimap for empty input', () => {
      expect(parser.parse('').size).toBe(0);
      expect(parser.parse('?').size).toBe(0);
    });

    it('should keep bracket keys verbatim', () => {
      expect([...parser.parse('bar[one][two]=2&items[]=1').keys()]).toEqual(['bar[one][two]', 'items[]']);
    });
  });

  // ============================================
  // 2. Decoding
  // ============================================
  describe('Decoding', () => {
    it('should percent-decode keys and values once', () => {
      const args = new ArgsParser().parse('bar%5Bone%5D=%26%3D&double=%2520');

      expect(args.peek('bar[one]')).toBe('&=');
      expect(args.peek('double')).toBe('%20');
    });

    it('should decode plus as space by default', () => {
      expect(new ArgsParser().parse('full+name=Ada+Lovelace').peek('full name')).toBe('Ada Lovelace');
    });

    it('should keep plus literal when plusAsSpace is off', () => {
      expect(new ArgsParser({ plusAsSpace: false }).parse('q=1+1').peek('q')).toBe('1+1');
    });

    it('should keep an encoded plus as plus', () => {
      expect(new ArgsParser().parse('q=1%2B1').peek('q')).toBe('1+1');
    });

    it('should reject malformed percent-encoding', () => {
      const parse = () => new ArgsParser().parse('q=%E0%A4%A');

      expect(parse).toThrow(BadRequestError);
      expect(parse).toThrow('Malformed query string: invalid percent-encoding in "%E0%A4%A"');
    });

    it('should keep the octets of a value that is not UTF-8', () => {
      const args = new ArgsParser().parse('payload=%FF%00a+b&next=1');

      expect(args.peek('payload')).toBe('\uFFFD\u0000a b');
      expect(Array.from(args.peekBytes('payload') ?? [])).toEqual([255, 0, 97, 32, 98]);
      expect(args.peek('next')).toBe('1');
    });

    it('should still reject a key that is not UTF-8', () => {
      expect(() => new ArgsParser().parse('%FF=1')).toThrow('Malformed query string: invalid percent-encoding in "%FF"');
    });
  });

  // ============================================
  // 3. Limits
  // ============================================
  describe('Option: parameterLimit', () => {
    it('should stop after the configured number of pairs', () => {
      const args = new ArgsParser({ parameterLimit: 2 }).parse('a=1&b=2&c=3');

      expect([...args.keys()]).toEqual(['a', 'b']);
    });

    it('should not count skipped segments against the limit', () => {
      const args = new ArgsParser({ parameterLimit: 2 }).parse('&&a=1&&b=2&c=3');

      expect([...args.keys()]).toEqual(['a', 'b']);
    });

    it('should apply the limit to the last pair', () => {
      const args = new ArgsParser({ parameterLimit: 1 }).parse('a=1&b=2');

      expect([...args.keys()]).toEqual(['a']);
    });
  });
});
