import { Binary } from 'bson';
import { Id57Error, Id57ErrorCode } from '../errors';
import { MAX_UINT128 } from '../base57';

export interface IntegerConvertible {
  toBigInt(): bigint;
}

// bson Long satisfies IntegerConvertible
export type Uint128Input = bigint | number | Binary | IntegerConvertible;
export type TimestampInput = Uint128Input | Date;

const UUID_BYTES = 16;

function notConvertible(label: string, detail: string): Id57Error {
  return new Id57Error(Id57ErrorCode.NOT_CONVERTIBLE, `${label} ${detail}`);
}

function toInteger(value: Uint128Input, label: string): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      throw notConvertible(label, `must be an integer, got ${value}`);
    }
    return BigInt(value);
  }
  if (value instanceof Binary) {
    if (value.sub_type !== Binary.SUBTYPE_UUID || value.length() !== UUID_BYTES) {
      throw notConvertible(label, `must be a UUID when passed as Binary (subtype ${value.sub_type})`);
    }
    return BigInt('0x' + value.toUUID().toHexString(false));
  }
  if (typeof value === 'object' && value !== null && typeof value.toBigInt === 'function') {
    const converted: unknown = value.toBigInt();
    if (typeof converted === 'bigint') {
      return converted;
    }
  }
  throw notConvertible(label, 'must be an integer or expose a toBigInt method');
}

export function toUint128(value: Uint128Input, label = 'value'): bigint {
  const result = toInteger(value, label);
  if (result < BigInt(0)) {
    throw new Id57Error(Id57ErrorCode.NEGATIVE_VALUE, `${label} must be non-negative`);
  }
  if (result > MAX_UINT128) {
    throw notConvertible(label, 'does not fit in 128 bits');
  }
  return result;
}

/** Accepts microseconds since the epoch, or a Date. */
export function toTimestamp(value: TimestampInput): bigint {
  if (value instanceof Date) {
    const millis = value.getTime();
    if (Number.isNaN(millis)) {
      throw notConvertible('timestamp', 'must be a valid Date');
    }
    return toUint128(BigInt(millis) * BigInt(1000), 'timestamp');
  }
  return toUint128(value, 'timestamp');
}
