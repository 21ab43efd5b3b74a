import { BadRequestError } from '@argbind/common';

import { ArgumentMultimap } from './argument-multimap';
import { DEFAULT_ARGS_PARSER_OPTIONS } from './constants';
import type { ArgsParserOptions } from './interfaces';

const HEX_PAIR = /^[0-9A-Fa-f]{2}$/;
const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/**
 * Splits a query string or `application/x-www-form-urlencoded` body into an
 * {@link ArgumentMultimap}. Keys are kept verbatim, bracket syntax included.
 */
export class ArgsParser {
  private readonly options: Required<ArgsParserOptions>;

  constructor(options: ArgsParserOptions = {}) {
    this.options = { ...DEFAULT_ARGS_PARSER_OPTIONS, ...options };
  }

  public parse(text: string): ArgumentMultimap {
    const args = new ArgumentMultimap();

    if (text.length === 0) {
      return args;
    }

    const len = text.length;
    let i = 0;

    // Ignore leading '?'
    if (text.charCodeAt(0) === 63) {
      i = 1;
    }

    let keyStart = i;
    let keyEnd = -1;
    let pairCount = 0;

    while (i < len) {
      const code = text.charCodeAt(i);

      if (code === 61) {
        // '=' (only the first one splits)
        if (keyEnd === -1) {
          keyEnd = i;
        }
      } else if (code === 38) {
        // '&'
        if (this.processPair(args, text, keyStart, keyEnd === -1 ? i : keyEnd, i)) {
          pairCount++;
          if (pairCount >= this.options.parameterLimit) {
            return args;
          }
        }

        keyStart = i + 1;
        keyEnd = -1;
      }

      i++;
    }

    if (keyStart < len) {
      this.processPair(args, text, keyStart, keyEnd === -1 ? len : keyEnd, len);
    }

    return args;
  }

  private processPair(args: ArgumentMultimap, text: string, keyStart: number, keyEnd: number, valEnd: number): boolean {
    const keyRaw = text.slice(keyStart, keyEnd);
    const key = this.decode(keyRaw);

    // Ignore empty keys
    if (!key) {
      return false;
    }

    if (keyEnd >= valEnd) {
      args.add(key, '');

      return true;
    }

    const valueRaw = text.slice(keyEnd + 1, valEnd);

    try {
      args.add(key, this.decode(valueRaw));
    } catch (error) {
      // Well-formed escapes that are not UTF-8 are kept as raw octets
      const bytes = decodePercentBytes(this.replacePlus(valueRaw));

      if (!bytes) {
        throw error;
      }

      args.add(key, textDecoder.decode(bytes), bytes);
    }

    return true;
  }

  private decode(raw: string): string {
    const text = this.replacePlus(raw);

    if (text.indexOf('%') === -1) {
      return text;
    }

    try {
      return decodeURIComponent(text);
    } catch (error) {
      throw new BadRequestError(`Malformed query string: invalid percent-encoding in "${raw}"`, { cause: error });
    }
  }

  private replacePlus(raw: string): string {
    return this.options.plusAsSpace && raw.indexOf('+') !== -1 ? raw.replace(/\+/g, ' ') : raw;
  }
}

/**
 * Octets of a percent-encoded string, or `undefined` when an escape is malformed.
 */
function decodePercentBytes(text: string): Uint8Array | undefined {
  const bytes: number[] = [];
  let runStart = 0;

  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) !== 37) {
      continue;
    }

    const hex = text.slice(i + 1, i + 3);

    if (!HEX_PAIR.test(hex)) {
      return undefined;
    }

    bytes.push(...textEncoder.encode(text.slice(runStart, i)), Number.parseInt(hex, 16));
    i += 2;
    runStart = i + 1;
  }

  bytes.push(...textEncoder.encode(text.slice(runStart)));

  return Uint8Array.from(bytes);
}
