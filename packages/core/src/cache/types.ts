// CPU-side and memory-side boundary protocols of the data cache.

export type CpuRequest = {
  // Caller-chosen tag, echoed on the response
  id: number;
  address: number;
  isWrite: boolean;
  writeData: number;
  // Bit i enables byte lane i of the word
  byteEnable: number;
};

export type ResponseSource = 'hit' | 'hit-during-refill' | 'refill';

export type CpuResponse = {
  id: number;
  address: number;
  isWrite: boolean;
  // Read data; null for a write acknowledgment
  data: number | null;
  source: ResponseSource;
};

export type FlushMode = 'clean' | 'invalidate';

export type TickInput = {
  request?: CpuRequest | null;
  flush?: FlushMode | null;
};

export type TickResult = {
  // The request (if any) was accepted this tick; false means it must be retried
  ready: boolean;
  // Outcome of the presented request, null when none was presented or it was rejected
  outcome: 'hit' | 'miss' | 'coalesced' | null;
  response: CpuResponse | null;
  flushDone: boolean;
};

export type MemRequest = {
  address: number;
  isWrite: boolean;
  // Full line for writes, null for reads
  writeLine: Uint8Array | null;
};

export type MemResponse = {
  reqReady: boolean;
  respValid: boolean;
  readLine: Uint8Array | null;
};

// Memory side of the cache. Called exactly once per tick with the request the cache
// presents in that tick (null when it presents none).
export interface MemoryPort {
  cycle(req: MemRequest | null): MemResponse;
}

export type RefillState = 'IDLE' | 'WRITE_MEM' | 'READ_MEM' | 'UPDATE_CACHE' | 'FLUSH';
