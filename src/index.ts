export { ALPHABET, BASE, MAX_UINT128, encode, decode, encodedLength } from './base57';
export type { EncodeOptions } from './base57';
export {
  TIMESTAMP_WIDTH,
  PAYLOAD_WIDTH,
  ID_WIDTH,
  Id57Generator,
  generate,
  parse,
  isValid,
  timestampToDate
} from './id57';
export type { Id57GeneratorOptions, ParsedId } from './id57';
export { Id57Error, Id57ErrorCode } from './errors';
export type { InvalidCharacterInfo } from './errors';
export { systemClock } from './utils/clock';
export type { Clock } from './utils/clock';
export { randomPayload } from './utils/random';
export type { RandomSource } from './utils/random';
export { toUint128, toTimestamp } from './utils/convert';
export type { IntegerConvertible, Uint128Input, TimestampInput } from './utils/convert';
