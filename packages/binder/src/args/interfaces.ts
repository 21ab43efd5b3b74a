/**
 * Read-only view of an argument multimap, as produced by query string or
 * urlencoded body parsing.
 */
export interface ArgumentSource {
  has(key: string): boolean;
  /** First value registered under `key`. */
  peek(key: string): string | undefined;
  /** Every value registered under `key`, in submission order. */
  peekMulti(key: string): readonly string[];
  /** Submitted octets of the first value under `key`. */
  peekBytes(key: string): Uint8Array | undefined;
  /** Every pair in submission order. */
  entries(): IterableIterator<[string, string]>;
}

export interface ArgumentEntry {
  key: string;
  value: string;
  bytes?: Uint8Array;
}

export interface ArgsParserOptions {
  /**
   * Maximum number of pairs to read. Later pairs are dropped.
   * @default 1000
   */
  parameterLimit?: number;
  /**
   * Decode `+` as a space, as HTML forms encode it.
   * @default true
   */
  plusAsSpace?: boolean;
}
