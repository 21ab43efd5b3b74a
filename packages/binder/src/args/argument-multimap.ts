import type { ArgumentEntry, ArgumentSource } from './interfaces';
import type { ArgumentPairs, ArgumentsInit } from './types';

const textEncoder = new TextEncoder();

/**
 * Ordered string multimap.
 * Pairs iterate in submission order, distinct keys in first-occurrence order.
 */
export class ArgumentMultimap implements ArgumentSource, Iterable<[string, string]> {
  private pairs: ArgumentEntry[] = [];
  private readonly index = new Map<string, ArgumentEntry[]>();

  static from(init: ArgumentsInit): ArgumentMultimap {
    const args = new ArgumentMultimap();

    if (isPairIterable(init)) {
      for (const [key, value] of init) {
        args.add(key, value);
      }

      return args;
    }

    for (const [key, value] of Object.entries(init)) {
      if (typeof value === 'string') {
        args.add(key, value);
      } else {
        for (const item of value) {
          args.add(key, item);
        }
      }
    }

    return args;
  }

  get size(): number {
    return this.index.size;
  }

  /**
   * Appends a value. `bytes` carries the submitted octets when they are not
   * valid UTF-8 and `value` only holds their lossy decoding.
   */
  public add(key: string, value: string, bytes?: Uint8Array): this {
    const entry: ArgumentEntry = bytes ? { key, value, bytes } : { key, value };
    const values = this.index.get(key);

    if (values) {
      values.push(entry);
    } else {
      this.index.set(key, [entry]);
    }

    this.pairs.push(entry);

    return this;
  }

  /**
   * Replaces every value of `key`. An existing key keeps the position of its
   * first pair.
   */
  public set(key: string, value: string): this {
    const first = this.index.get(key)?.[0];

    if (!first) {
      return this.add(key, value);
    }

    const entry: ArgumentEntry = { key, value };

    this.pairs = this.pairs.flatMap((pair) => (pair === first ? [entry] : pair.key === key ? [] : [pair]));
    this.index.set(key, [entry]);

    return this;
  }

  public delete(key: string): boolean {
    if (!this.index.delete(key)) {
      return false;
    }

    this.pairs = this.pairs.filter((pair) => pair.key !== key);

    return true;
  }

  public has(key: string): boolean {
    return this.index.has(key);
  }

  public peek(key: string): string | undefined {
    return this.index.get(key)?.[0]?.value;
  }

  public peekMulti(key: string): readonly string[] {
    return (this.index.get(key) ?? []).map((entry) => entry.value);
  }

  public peekBytes(key: string): Uint8Array | undefined {
    const entry = this.index.get(key)?.[0];

    if (!entry) {
      return undefined;
    }

    return entry.bytes ? entry.bytes.slice() : textEncoder.encode(entry.value);
  }

  public keys(): IterableIterator<string> {
    return this.index.keys();
  }

  public *entries(): IterableIterator<[string, string]> {
    for (const { key, value } of this.pairs) {
      yield [key, value];
    }
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }
}

function isPairIterable(init: ArgumentsInit): init is ArgumentPairs {
  return Symbol.iterator in init;
}
