import { describe, it, expect } from 'vitest';
import { writeU32LE } from '@nbcache/core';
import { DEFAULT_RUN_OPTIONS, crc32, parseTrace, readChecksum, runDemo, runTrace } from '../src/lib.js';

// A write miss, a coalesced read of the same line, a second line and a clean flush,
// against a memory that answers reads two ticks after accepting them.
const TRACE = `
W 0x0 0xdeadbeef
R 0x0
R 0x40
F
`;

describe('headless trace runs', () => {
  it('crc32 matches the IEEE check value', () => {
    expect(crc32(new TextEncoder().encode('123456789'))).toBe('cbf43926');
  });

  it('runs a trace to completion and summarises the counters', () => {
    const summary = runTrace(parseTrace(TRACE), { ...DEFAULT_RUN_OPTIONS, includeResponses: true });
    expect(summary.drained).toBe(true);
    expect(summary.cycles).toBe(12);
    expect(summary.stallCycles).toBe(0);
    // both reads arrive while the write's refill is in READ_MEM
    expect(summary.counters).toEqual({
      hits: 0,
      misses: 1,
      hitsDuringRefill: 0,
      missesDuringRefill: 2,
      evictions: 0,
      coalesced: 1,
      rejected: 0,
      flushWritebacks: 1,
    });
    expect(summary.memory.reads).toBe(2);
    expect(summary.memory.writes).toBe(1);
    expect(summary.responses?.map((r) => [r.id, r.data])).toEqual([[0, null], [1, 0xdeadbeef], [2, 0x40]]);

    const expected = new Uint8Array(8);
    writeU32LE(expected, 0, 0xdeadbeef);
    writeU32LE(expected, 4, 0x40);
    expect(summary.readChecksum).toBe(crc32(expected));
  });

  it('leaves responses out unless asked', () => {
    const summary = runTrace(parseTrace('R 0x100'), DEFAULT_RUN_OPTIONS);
    expect(summary.responses).toBeUndefined();
    expect(summary.readChecksum).toBe(readChecksum([{ id: 0, address: 0x100, isWrite: false, data: 0x100, source: 'refill' }]));
  });

  it('reports an undrained run when maxCycles is too small', () => {
    const summary = runTrace(parseTrace('R 0x100'), { ...DEFAULT_RUN_OPTIONS, maxCycles: 3 });
    expect(summary.drained).toBe(false);
    expect(summary.cycles).toBe(3);
  });

  it('demo reads the same word twice: refill, then hit', () => {
    const { config, steps } = runDemo(DEFAULT_RUN_OPTIONS);
    expect(config.numSets).toBe(128);
    expect(steps).toEqual([
      {
        cycles: 5,
        response: { id: 0, address: 0x1000, isWrite: false, data: 0x1000, source: 'refill' },
        memoryReads: 1,
        counters: { hits: 0, misses: 1, hitsDuringRefill: 0, missesDuringRefill: 0, evictions: 0, coalesced: 0, rejected: 0, flushWritebacks: 0 },
      },
      {
        cycles: 1,
        response: { id: 1, address: 0x1000, isWrite: false, data: 0x1000, source: 'hit' },
        memoryReads: 1,
        counters: { hits: 1, misses: 1, hitsDuringRefill: 0, missesDuringRefill: 0, evictions: 0, coalesced: 0, rejected: 0, flushWritebacks: 0 },
      },
    ]);
  });
});
