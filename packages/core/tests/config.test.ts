import { describe, it, expect } from 'vitest';
import { CacheGeometry, DEFAULT_CONFIG, parseCacheConfig, resolveConfig } from '../src/config.js';
import { CacheConfigError } from '../src/errors.js';

describe('cache configuration', () => {
  it('fills defaults: 64-byte lines, 128 sets, 4 ways, 8 MSHRs, non-blocking', () => {
    expect(resolveConfig()).toEqual({
      lineSize: 64,
      numSets: 128,
      numWays: 4,
      numMshr: 8,
      mode: 'non-blocking',
      preferInvalidWay: false,
    });
    expect(resolveConfig({ numWays: 2 })).toEqual({ ...DEFAULT_CONFIG, numWays: 2 });
  });

  it('rejects shapes the address slicing cannot express', () => {
    expect(() => resolveConfig({ lineSize: 48 })).toThrow(CacheConfigError);
    expect(() => resolveConfig({ lineSize: 256 })).toThrow(/lineSize/);
    expect(() => resolveConfig({ numSets: 100 })).toThrow(/numSets/);
    expect(() => resolveConfig({ numWays: 3 })).toThrow(/numWays/);
    expect(() => resolveConfig({ numWays: 32 })).toThrow(/numWays/);
    expect(() => resolveConfig({ numMshr: 0 })).toThrow(/numMshr/);
    expect(() => resolveConfig({ numMshr: 17 })).toThrow(/numMshr/);
    expect(() => resolveConfig({ lineSize: 128, numSets: 1 << 25 })).toThrow('no room for a tag');
  });

  it('names the offending field on the error', () => {
    try {
      resolveConfig({ numWays: 6 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CacheConfigError);
      if (e instanceof CacheConfigError) {
        expect(e.field).toBe('numWays');
        expect(e.message).toBe("invalid cache config 'numWays': expected a power of two in 1..16, got 6");
      }
    }
  });

  it('parses JSON objects and rejects unknown keys or wrong types', () => {
    expect(parseCacheConfig({ numWays: 2, mode: 'blocking', preferInvalidWay: true })).toEqual({
      numWays: 2,
      mode: 'blocking',
      preferInvalidWay: true,
    });
    expect(() => parseCacheConfig({ ways: 2 })).toThrow("invalid cache config 'ways': unknown key");
    expect(() => parseCacheConfig({ numSets: '64' })).toThrow('expected a number, got string');
    expect(() => parseCacheConfig({ mode: 'fast' })).toThrow(/mode/);
    expect(() => parseCacheConfig([1, 2])).toThrow('expected an object');
  });

  it('slices addresses into tag, set and word offset', () => {
    const g = new CacheGeometry(resolveConfig());
    expect(g.offsetBits).toBe(6);
    expect(g.indexBits).toBe(7);
    expect(g.tagShift).toBe(13);
    expect(g.wordsPerLine).toBe(16);
    expect(g.setIndex(0x1000)).toBe(64);
    expect(g.tag(0x1000)).toBe(0);
    expect(g.tag(0x3000)).toBe(1);
    expect(g.wordOffset(0x1004)).toBe(1);
    expect(g.wordOffset(0x103f)).toBe(15);
    expect(g.lineAddress(0x103f)).toBe(0x1000);
    expect(g.lineAddressOf(1, 64)).toBe(0x3000);
    expect(g.lineAddress(0xffffffff)).toBe(0xffffffc0);
    expect(g.tag(0xffffffff)).toBe(0x7ffff);
  });
});
