import { Id57Error, Id57ErrorCode } from '../errors';

/** Returns microseconds since the Unix epoch. */
export type Clock = () => bigint;

// Wall clock at millisecond resolution, scaled to microseconds
export const systemClock: Clock = () => {
  const millis = Date.now();
  if (!Number.isFinite(millis) || millis < 0) {
    throw new Id57Error(Id57ErrorCode.CLOCK_ERROR, `System clock returned an invalid time: ${millis}`);
  }
  return BigInt(Math.floor(millis)) * BigInt(1000);
};
