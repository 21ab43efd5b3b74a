import { Logger } from '@argbind/logger';

import { BracketSyntaxError } from '../errors';

import { DEFAULT_TREE_BUILDER_OPTIONS } from './constants';
import type { TreeBuilderOptions } from './interfaces';
import type { KeySegments } from './types';

const logger = new Logger('BracketKey');

/**
 * Splits `name[a][b][]` into `['name', 'a', 'b', '']`.
 */
export function parseBracketKey(key: string, options: TreeBuilderOptions = {}): KeySegments {
  const { strictMode, depth } = { ...DEFAULT_TREE_BUILDER_OPTIONS, ...options };
  const firstBrace = key.indexOf('[');

  if (firstBrace === -1) {
    return key.indexOf(']') === -1 ? [key] : malformed(key, 'unbalanced brackets', strictMode);
  }

  const name = key.slice(0, firstBrace);

  if (name === '') {
    return malformed(key, 'empty root name', strictMode);
  }

  if (name.indexOf(']') !== -1) {
    return malformed(key, 'unbalanced brackets', strictMode);
  }

  const segments: KeySegments = [name];
  let partStart = -1;

  for (let i = firstBrace; i < key.length; i++) {
    const code = key.charCodeAt(i);

    if (partStart === -1) {
      // Between segments only '[' may follow
      if (code === 93) {
        return malformed(key, 'unbalanced brackets', strictMode);
      }

      if (code !== 91) {
        return malformed(key, 'unexpected text after bracket', strictMode);
      }

      partStart = i + 1;
    } else if (code === 91) {
      return malformed(key, 'nested brackets', strictMode);
    } else if (code === 93) {
      segments.push(key.slice(partStart, i));
      partStart = -1;
    }
  }

  if (partStart !== -1) {
    return malformed(key, 'unclosed bracket', strictMode);
  }

  if (segments.length - 1 > depth) {
    throw new BracketSyntaxError(key, `more than ${depth} nested segments`);
  }

  return segments;
}

function malformed(key: string, detail: string, strictMode: boolean): KeySegments {
  if (strictMode) {
    throw new BracketSyntaxError(key, detail);
  }

  logger.warn('Malformed key kept as a literal name', { key, detail });

  return [key];
}
