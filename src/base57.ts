import { Id57Error, Id57ErrorCode } from './errors';

export const ALPHABET = '23456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';
export const BASE = BigInt(ALPHABET.length);
export const MAX_UINT128 = (BigInt(1) << BigInt(128)) - BigInt(1);

const ZERO = BigInt(0);
const ZERO_DIGIT = ALPHABET[0];
const INVALID = 0xff;

export interface EncodeOptions {
  // Fail with WIDTH_EXCEEDED instead of returning a result wider than padTo
  strict?: boolean;
}

function buildDecodeTable(): Uint8Array {
  const table = new Uint8Array(256).fill(INVALID);
  for (let i = 0; i < ALPHABET.length; i++) {
    table[ALPHABET.charCodeAt(i)] = i;
  }
  return table;
}

const DECODE_TABLE = buildDecodeTable();

function checkedValue(value: bigint | number): bigint {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    throw new Id57Error(Id57ErrorCode.NOT_CONVERTIBLE, `Value must be an integer, got ${value}`);
  }
  const big = BigInt(value);
  if (big < ZERO) {
    throw new Id57Error(Id57ErrorCode.NEGATIVE_VALUE, 'Value must be non-negative');
  }
  if (big > MAX_UINT128) {
    throw new Id57Error(Id57ErrorCode.OVERFLOW, 'Value does not fit in 128 bits');
  }
  return big;
}

function checkedWidth(padTo: number): number {
  if (!Number.isInteger(padTo)) {
    throw new Id57Error(Id57ErrorCode.NOT_CONVERTIBLE, `Padding width must be an integer, got ${padTo}`);
  }
  if (padTo < 0) {
    throw new Id57Error(Id57ErrorCode.NEGATIVE_VALUE, 'Padding width must be non-negative');
  }
  return padTo;
}

function encodeDigits(value: bigint): string {
  if (value === ZERO) {
    return ZERO_DIGIT;
  }

  const digits: string[] = [];
  let num = value;
  while (num > ZERO) {
    digits.push(ALPHABET[Number(num % BASE)]);
    num = num / BASE;
  }
  return digits.reverse().join('');
}

/**
 * Encodes a non-negative integer of at most 128 bits as base57.
 *
 * When `padTo` exceeds the natural length the result is left-padded with the
 * zero digit. A narrower `padTo` never truncates; the longer string is
 * returned unless `options.strict` is set.
 */
export function encode(value: bigint | number, padTo?: number, options: EncodeOptions = {}): string {
  const digits = encodeDigits(checkedValue(value));
  if (padTo === undefined) {
    return digits;
  }

  const width = checkedWidth(padTo);
  if (options.strict && digits.length > width) {
    throw new Id57Error(
      Id57ErrorCode.WIDTH_EXCEEDED,
      `Encoded value needs ${digits.length} characters, exceeding width ${width}`
    );
  }
  return digits.padStart(width, ZERO_DIGIT);
}

/** Number of base57 digits in the canonical encoding of `value`. */
export function encodedLength(value: bigint | number): number {
  return encodeDigits(checkedValue(value)).length;
}

/**
 * Decodes a base57 string, most-significant digit first.
 *
 * Positions reported for invalid characters count code points, not bytes or
 * UTF-16 units.
 */
export function decode(value: string): bigint {
  if (value.length === 0) {
    throw new Id57Error(Id57ErrorCode.EMPTY_INPUT, 'Value cannot be empty');
  }

  let result = ZERO;
  let position = 0;
  for (const character of value) {
    const code = character.codePointAt(0) ?? INVALID;
    const digit = code < 0x80 ? DECODE_TABLE[code] : INVALID;
    if (digit === INVALID) {
      throw new Id57Error(
        Id57ErrorCode.INVALID_CHARACTER,
        `Invalid base57 character: ${JSON.stringify(character)} at position ${position}`,
        { character, position }
      );
    }

    result = result * BASE + BigInt(digit);
    if (result > MAX_UINT128) {
      throw new Id57Error(Id57ErrorCode.OVERFLOW, 'Decoded value overflowed 128 bits');
    }
    position++;
  }
  return result;
}
