import { describe, expect, it } from 'vitest';
import { Hash, Hasher } from '../src/index.js';

const EMPTY_BLAKE3 = 'af1349b9f5f9a1a6a0404dea36dcc9499bcb25c9adc112b7cc9a93cae41f3262';

describe('Hash', () => {
  it('digests with BLAKE3', () => {
    expect(Hash.digest(new Uint8Array(0)).hex).toBe(EMPTY_BLAKE3);
  });

  it('round-trips through hex and bytes', () => {
    const hash = Hash.fromHex(EMPTY_BLAKE3);

    expect(Hash.fromBytes(hash.toBytes()).equals(hash)).toBe(true);
    expect(hash.toString()).toBe(EMPTY_BLAKE3);
    expect(JSON.stringify({ hash })).toBe(`{"hash":"${EMPTY_BLAKE3}"}`);
  });

  it('normalises upper-case hex', () => {
    expect(Hash.fromHex(EMPTY_BLAKE3.toUpperCase()).hex).toBe(EMPTY_BLAKE3);
  });

  it('rejects the wrong number of bytes', () => {
    expect(() => Hash.fromBytes(new Uint8Array(31))).toThrow(RangeError);
    expect(() => Hash.fromHex('abcd')).toThrow(RangeError);
  });

  it('does not share its bytes with callers', () => {
    const bytes = new Uint8Array(32);
    const hash = Hash.fromBytes(bytes);
    bytes[0] = 1;
    hash.toBytes()[1] = 1;

    expect(hash.toBytes()).toEqual(new Uint8Array(32));
  });

  it('compares by raw bytes', () => {
    const low = Hash.fromBytes(new Uint8Array(32).fill(0));
    const high = Hash.fromBytes(new Uint8Array(32).fill(1));
    const lastByte = new Uint8Array(32);
    lastByte[31] = 0xff;
    const middle = Hash.fromBytes(lastByte);

    expect(low.compare(high)).toBeLessThan(0);
    expect(high.compare(low)).toBeGreaterThan(0);
    expect(low.compare(Hash.fromBytes(new Uint8Array(32)))).toBe(0);
    expect([high, middle, low].sort((a, b) => a.compare(b))).toEqual([low, middle, high]);
  });
});

describe('Hasher', () => {
  it('matches a one-shot digest', () => {
    const data = new TextEncoder().encode('hello world');

    const hash = new Hasher()
      .update(data.subarray(0, 5))
      .update(data.subarray(5))
      .finalize();

    expect(hash.equals(Hash.digest(data))).toBe(true);
  });
});
