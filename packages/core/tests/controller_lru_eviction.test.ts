import { describe, it, expect } from 'vitest';
import { access, makeRig, rd } from './helpers/test_utils.js';

// 0x0000, 0x2000, 0x4000, 0x6000 and 0x8000 all map to set 0 with tags 0..4.

function wayOf(tag: number, lines: ReadonlyArray<{ valid: boolean; tag: number }>): number {
  return lines.findIndex((l) => l.valid && l.tag === tag);
}

describe('replacement in a 4-way set', () => {
  it('fills ways in tree order, then evicts the pseudo-LRU way', () => {
    const { cache } = makeRig();
    for (const [i, addr] of [0x0, 0x2000, 0x4000, 0x6000].entries()) access(cache, rd(i, addr));
    const lines = [0, 1, 2, 3].map((w) => cache.peekLine(0, w));
    expect([0, 1, 2, 3].map((t) => wayOf(t, lines))).toEqual([0, 2, 1, 3]);
    expect(cache.lruBits(0)).toBe(0);

    // touch ways 0,1,2,3 in order
    const trees: number[] = [];
    for (const addr of [0x0, 0x4000, 0x2000, 0x6000]) {
      expect(cache.tick({ request: rd(10, addr) }).outcome).toBe('hit');
      trees.push(cache.lruBits(0));
    }
    expect(trees).toEqual([0b011, 0b001, 0b100, 0b000]);

    access(cache, rd(20, 0x8000));
    expect(cache.peekLine(0, 0).tag).toBe(4);
    expect(cache.tick({ request: rd(21, 0x0) }).outcome).toBe('miss');
    expect(cache.tick({ request: rd(22, 0x4000) }).outcome).toBe('hit');
  });

  it('takes invalid ways first when preferInvalidWay is set', () => {
    const { cache } = makeRig({ preferInvalidWay: true });
    for (const [i, addr] of [0x0, 0x2000, 0x4000, 0x6000].entries()) access(cache, rd(i, addr));
    expect([0, 1, 2, 3].map((w) => cache.peekLine(0, w).tag)).toEqual([0, 1, 2, 3]);
  });
});
