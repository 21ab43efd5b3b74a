import { FieldKind } from './enums';
import type { BindableKind, ScalarValue } from './types';

export class CoercionError extends Error {
  constructor(readonly reason: string) {
    super(reason);

    this.name = 'CoercionError';
  }
}

const INT_PATTERN = /^[+-]?\d+$/;
const UINT_PATTERN = /^\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const MAX_BYTE = 255;
const MIN_INT64 = -(2n ** 63n);
const MAX_INT64 = 2n ** 63n - 1n;
const MAX_UINT64 = 2n ** 64n - 1n;

const BOOLEAN_LITERALS: ReadonlyMap<string, boolean> = new Map([
  ['1', true],
  ['t', true],
  ['T', true],
  ['TRUE', true],
  ['true', true],
  ['True', true],
  ['0', false],
  ['f', false],
  ['F', false],
  ['FALSE', false],
  ['false', false],
  ['False', false],
]);

export function parseInteger(raw: string): number {
  const value = Number(raw);

  if (!INT_PATTERN.test(raw) || !Number.isSafeInteger(value)) {
    throw new CoercionError('expected int');
  }

  return normalizeZero(value);
}

export function parseUnsigned(raw: string, max = Number.MAX_SAFE_INTEGER): number {
  const value = Number(raw);

  if (!UINT_PATTERN.test(raw) || !Number.isSafeInteger(value) || value > max) {
    throw new CoercionError('expected unsigned int');
  }

  return value;
}

export function parseBigInteger(raw: string): bigint {
  if (!INT_PATTERN.test(raw)) {
    throw new CoercionError('expected int');
  }

  const value = BigInt(raw);

  if (value < MIN_INT64 || value > MAX_INT64) {
    throw new CoercionError('expected int');
  }

  return value;
}

export function parseBigUnsigned(raw: string): bigint {
  if (!UINT_PATTERN.test(raw)) {
    throw new CoercionError('expected unsigned int');
  }

  const value = BigInt(raw);

  if (value > MAX_UINT64) {
    throw new CoercionError('expected unsigned int');
  }

  return value;
}

/**
 * Decimal literal with optional sign, fraction and exponent.
 * Non-finite results (`NaN`, `Inf`, overflow) are rejected.
 */
export function parseDecimal(raw: string): number {
  const value = Number(raw);

  if (!DECIMAL_PATTERN.test(raw) || !Number.isFinite(value)) {
    throw new CoercionError('expected decimal');
  }

  return normalizeZero(value);
}

export function parseBoolean(raw: string): boolean {
  const value = BOOLEAN_LITERALS.get(raw);

  if (value === undefined) {
    throw new CoercionError('expected boolean');
  }

  return value;
}

export function coerceScalar(kind: BindableKind, raw: string): ScalarValue {
  switch (kind) {
    case FieldKind.Int:
      return parseInteger(raw);
    case FieldKind.Uint:
      return parseUnsigned(raw);
    case FieldKind.BigInt:
      return parseBigInteger(raw);
    case FieldKind.BigUint:
      return parseBigUnsigned(raw);
    case FieldKind.Byte:
      return parseUnsigned(raw, MAX_BYTE);
    case FieldKind.Float:
      return parseDecimal(raw);
    case FieldKind.Bool:
      return parseBoolean(raw);
    case FieldKind.String:
      return raw;
  }
}

function normalizeZero(value: number): number {
  return Object.is(value, -0) ? 0 : value;
}
