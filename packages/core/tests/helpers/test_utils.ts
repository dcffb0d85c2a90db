// Test utilities for driving the cache controller tick by tick

import { resolveConfig, type CacheConfig } from '../../src/config.js';
import { DataCacheController } from '../../src/cache/controller.js';
import { LatencyMemory, MainMemory, type LatencyOptions } from '../../src/mem/memory.js';
import type { CpuRequest, CpuResponse, MemRequest, MemResponse, MemoryPort, TickResult } from '../../src/cache/types.js';

export type Rig = {
  mem: MainMemory;
  port: LatencyMemory;
  cache: DataCacheController;
};

// Pattern-filled memory (each word holds its address) behind a LatencyMemory port
export function makeRig(config: Partial<CacheConfig> = {}, latency: LatencyOptions = {}, memSize = 1 << 20): Rig {
  const mem = new MainMemory(memSize);
  mem.fillPattern();
  const port = new LatencyMemory(mem, resolveConfig(config).lineSize, latency);
  const cache = new DataCacheController(port, config);
  return { mem, port, cache };
}

export function rd(id: number, address: number): CpuRequest {
  return { id, address: address >>> 0, isWrite: false, writeData: 0, byteEnable: 0xf };
}

export function wr(id: number, address: number, data: number, byteEnable = 0xf): CpuRequest {
  return { id, address: address >>> 0, isWrite: true, writeData: data >>> 0, byteEnable };
}

// Tick with no request until the controller is quiescent; returns the responses seen on the way
export function drain(cache: DataCacheController, maxTicks = 1000): CpuResponse[] {
  const out: CpuResponse[] = [];
  for (let i = 0; i < maxTicks && !cache.isQuiescent(); i++) {
    const res = cache.tick();
    if (res.response) out.push(res.response);
  }
  if (!cache.isQuiescent()) throw new Error(`cache not quiescent after ${maxTicks} ticks`);
  return out;
}

// Present a request once and drain; the request must be accepted
export function access(cache: DataCacheController, req: CpuRequest): { first: TickResult; responses: CpuResponse[] } {
  const first = cache.tick({ request: req });
  if (!first.ready) throw new Error(`request ${req.id} not accepted`);
  const responses = first.response ? [first.response] : [];
  responses.push(...drain(cache));
  return { first, responses };
}

// Hand-driven memory port: tests choose when requests are accepted and when a line comes back
export class ScriptedMemory implements MemoryPort {
  ready = false;
  readonly requests: (MemRequest | null)[] = [];
  private queued: Uint8Array | null = null;

  respondNext(line: Uint8Array): void {
    this.queued = line;
  }

  cycle(req: MemRequest | null): MemResponse {
    this.requests.push(req ? { ...req } : null);
    const line = this.queued;
    this.queued = null;
    return { reqReady: this.ready && req !== null, respValid: line !== null, readLine: line };
  }
}
