import { UUID } from 'bson';

export type RandomSource = () => bigint;

// 128-bit payload taken from a random version-4 UUID
export const randomPayload: RandomSource = () => BigInt('0x' + new UUID().toHexString(false));
