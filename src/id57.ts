import { decode, encode, MAX_UINT128 } from './base57';
import { Id57Error, Id57ErrorCode } from './errors';
import { type Clock, systemClock } from './utils/clock';
import { type RandomSource, randomPayload } from './utils/random';
import { type TimestampInput, type Uint128Input, toTimestamp, toUint128 } from './utils/convert';

export const TIMESTAMP_WIDTH = 11;
export const PAYLOAD_WIDTH = 22;
export const ID_WIDTH = TIMESTAMP_WIDTH + PAYLOAD_WIDTH;

export interface Id57GeneratorOptions {
  random?: RandomSource;
  clock?: Clock;
  // Throw WIDTH_EXCEEDED for timestamps that do not fit in TIMESTAMP_WIDTH digits
  strict?: boolean;
}

export interface ParsedId {
  timestamp: bigint;
  payload: bigint;
}

export class Id57Generator {
  private random: RandomSource;
  private clock: Clock;
  private strict: boolean;

  constructor(options: Id57GeneratorOptions = {}) {
    this.random = options.random ?? randomPayload;
    this.clock = options.clock ?? systemClock;
    this.strict = options.strict ?? false;
  }

  generate(timestamp?: TimestampInput, payload?: Uint128Input): string {
    const ts = timestamp === undefined ? this.now() : toTimestamp(timestamp);
    const body = payload === undefined ? this.nextPayload() : toUint128(payload, 'payload');
    const options = { strict: this.strict };
    return encode(ts, TIMESTAMP_WIDTH, options) + encode(body, PAYLOAD_WIDTH, options);
  }

  private now(): bigint {
    const micros = this.clock();
    if (micros < BigInt(0)) {
      throw new Id57Error(Id57ErrorCode.CLOCK_ERROR, 'Clock reported a time before the Unix epoch');
    }
    return micros;
  }

  private nextPayload(): bigint {
    const value = this.random();
    if (value < BigInt(0)) {
      throw new Id57Error(Id57ErrorCode.NEGATIVE_VALUE, 'Random source returned a negative value');
    }
    if (value > MAX_UINT128) {
      throw new Id57Error(Id57ErrorCode.NOT_CONVERTIBLE, 'Random source returned a value wider than 128 bits');
    }
    return value;
  }
}

// Reports invalid characters by their position in the whole identifier
function decodeSegment(id: string, start: number, end?: number): bigint {
  try {
    return decode(id.slice(start, end));
  } catch (err) {
    if (err instanceof Id57Error && err.code === Id57ErrorCode.INVALID_CHARACTER &&
        err.character !== undefined && err.position !== undefined) {
      const position = err.position + start;
      throw new Id57Error(
        Id57ErrorCode.INVALID_CHARACTER,
        `Invalid base57 character: ${JSON.stringify(err.character)} at position ${position}`,
        { character: err.character, position }
      );
    }
    throw err;
  }
}

const defaultGenerator = new Id57Generator();

/**
 * Builds a 33-character identifier: the timestamp (microseconds since the
 * epoch, default now) padded to 11 digits, then the payload (default a
 * random 128-bit value) padded to 22 digits.
 */
export function generate(timestamp?: TimestampInput, payload?: Uint128Input): string {
  return defaultGenerator.generate(timestamp, payload);
}

/**
 * Splits an identifier into its timestamp and payload. The payload is always
 * the trailing PAYLOAD_WIDTH characters, so identifiers widened by an
 * oversized timestamp still parse.
 */
export function parse(id: string): ParsedId {
  if (id.length < ID_WIDTH) {
    throw new Id57Error(
      Id57ErrorCode.INVALID_LENGTH,
      `Identifier must be at least ${ID_WIDTH} characters, got ${id.length}`
    );
  }
  const split = id.length - PAYLOAD_WIDTH;
  return {
    timestamp: decodeSegment(id, 0, split),
    payload: decodeSegment(id, split)
  };
}

export function isValid(id: string): boolean {
  if (id.length !== ID_WIDTH) {
    return false;
  }
  try {
    parse(id);
    return true;
  } catch (err) {
    if (err instanceof Id57Error) {
      return false;
    }
    throw err;
  }
}

export function timestampToDate(timestamp: bigint): Date {
  return new Date(Number(timestamp / BigInt(1000)));
}
