import { describe, it, expect } from 'vitest';
import { DataCacheController } from '../src/cache/controller.js';
import { MemoryProtocolError } from '../src/errors.js';
import { writeU32LE } from '../src/utils/bit.js';
import { ScriptedMemory, rd } from './helpers/test_utils.js';

describe('memory-side handshake', () => {
  it('holds the read request until the memory accepts it, then withdraws it', () => {
    const mem = new ScriptedMemory();
    const cache = new DataCacheController(mem);
    cache.tick({ request: rd(1, 0x1000) });
    for (let i = 0; i < 10; i++) cache.tick();
    expect(cache.state).toBe('READ_MEM');
    expect(mem.requests.slice(1).every((r) => r?.address === 0x1000 && !r.isWrite)).toBe(true);
    expect(mem.requests.length).toBe(11);

    mem.ready = true;
    cache.tick();
    cache.tick();
    expect(mem.requests[11]?.address).toBe(0x1000);
    expect(mem.requests[12]).toBeNull();

    const line = new Uint8Array(64);
    writeU32LE(line, 0, 0x12345678);
    mem.respondNext(line);
    cache.tick();
    expect(cache.state).toBe('UPDATE_CACHE');
    expect(cache.tick().response?.data).toBe(0x12345678);
  });

  it('rejects a response nobody asked for', () => {
    const mem = new ScriptedMemory();
    const cache = new DataCacheController(mem);
    mem.respondNext(new Uint8Array(64));
    expect(() => cache.tick()).toThrow(MemoryProtocolError);
  });

  it('rejects a line of the wrong size', () => {
    const mem = new ScriptedMemory();
    const cache = new DataCacheController(mem);
    cache.tick({ request: rd(1, 0x1000) });
    mem.ready = true;
    mem.respondNext(new Uint8Array(32));
    expect(() => cache.tick()).toThrow('line-size-mismatch at 0x1000');
  });
});
