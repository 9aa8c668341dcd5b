import assert from 'assert';
import sinon from 'sinon';
import { Binary, Long, UUID } from 'bson';
import { MAX_UINT128 } from '@src/base57';
import { Id57ErrorCode } from '@src/errors';
import { systemClock } from '@src/utils/clock';
import { toTimestamp, toUint128 } from '@src/utils/convert';
import { randomPayload } from '@src/utils/random';

describe('randomPayload', () => {
  it('returns a 128-bit value', () => {
    for (let i = 0; i < 100; i++) {
      const value = randomPayload();
      assert(value >= 0n && value <= MAX_UINT128);
    }
  });

  it('returns version-4 UUID values', () => {
    for (let i = 0; i < 100; i++) {
      const value = randomPayload();
      assert.strictEqual((value >> 76n) & 0xfn, 4n);
      assert.strictEqual((value >> 62n) & 0x3n, 2n);
    }
  });

  it('does not repeat', () => {
    const values = new Set<bigint>();
    for (let i = 0; i < 1000; i++) {
      values.add(randomPayload());
    }
    assert.strictEqual(values.size, 1000);
  });
});

describe('systemClock', () => {
  it('returns microseconds since the epoch', () => {
    const before = BigInt(Date.now()) * 1000n;
    const micros = systemClock();
    const drift = micros > before ? micros - before : before - micros;
    assert(drift < 1_000_000n, `clock drift of ${drift}us`);
  });

  it('follows the wall clock', () => {
    const clock = sinon.useFakeTimers({ now: Date.UTC(2030, 0, 1), toFake: ['Date'] });
    try {
      assert.strictEqual(systemClock(), 1893456000000000n);
      clock.tick(1500);
      assert.strictEqual(systemClock(), 1893456001500000n);
    } finally {
      clock.restore();
    }
  });

  it('reports a wall clock before the epoch', () => {
    const clock = sinon.useFakeTimers({ now: -1000, toFake: ['Date'] });
    try {
      assert.throws(() => systemClock(), {
        code: Id57ErrorCode.CLOCK_ERROR,
        message: 'System clock returned an invalid time: -1000'
      });
    } finally {
      clock.restore();
    }
  });

  it('does not go backwards', () => {
    const first = systemClock();
    const second = systemClock();
    assert(second >= first);
  });
});

describe('toUint128', () => {
  it('accepts bigints and integral numbers', () => {
    assert.strictEqual(toUint128(42n), 42n);
    assert.strictEqual(toUint128(42), 42n);
    assert.strictEqual(toUint128(MAX_UINT128), MAX_UINT128);
  });

  it('accepts bson Long', () => {
    assert.strictEqual(toUint128(Long.fromString('18446744073709551615', true)), 2n ** 64n - 1n);
  });

  it('accepts bson UUID and UUID-subtype Binary', () => {
    assert.strictEqual(toUint128(new UUID('ffffffff-ffff-ffff-ffff-ffffffffffff')), MAX_UINT128);
    assert.strictEqual(toUint128(new Binary(Buffer.alloc(16, 0xff), Binary.SUBTYPE_UUID)), MAX_UINT128);
  });

  it('accepts objects exposing toBigInt', () => {
    assert.strictEqual(toUint128({ toBigInt: () => 7n }), 7n);
  });

  it('names the argument in errors', () => {
    assert.throws(() => toUint128(-5, 'payload'), {
      code: Id57ErrorCode.NEGATIVE_VALUE,
      message: 'payload must be non-negative'
    });
    assert.throws(() => toUint128(0.5, 'payload'), {
      code: Id57ErrorCode.NOT_CONVERTIBLE,
      message: 'payload must be an integer, got 0.5'
    });
    assert.throws(() => toUint128(MAX_UINT128 + 1n), {
      code: Id57ErrorCode.NOT_CONVERTIBLE,
      message: 'value does not fit in 128 bits'
    });
  });

  it('rejects Binary that is not a UUID', () => {
    assert.throws(() => toUint128(new Binary(Buffer.alloc(16))), { code: Id57ErrorCode.NOT_CONVERTIBLE });
    assert.throws(() => toUint128(new Binary(Buffer.alloc(8), Binary.SUBTYPE_UUID)), { code: Id57ErrorCode.NOT_CONVERTIBLE });
  });
});

describe('toTimestamp', () => {
  it('converts a Date to microseconds', () => {
    assert.strictEqual(toTimestamp(new Date('2023-11-14T22:13:20.000Z')), 1700000000000000n);
    assert.strictEqual(toTimestamp(new Date(0)), 0n);
  });

  it('passes integers through', () => {
    assert.strictEqual(toTimestamp(1700000000000000n), 1700000000000000n);
  });

  it('rejects invalid dates', () => {
    assert.throws(() => toTimestamp(new Date('not a date')), {
      code: Id57ErrorCode.NOT_CONVERTIBLE,
      message: 'timestamp must be a valid Date'
    });
  });
});
