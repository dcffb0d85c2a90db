import { readU32LE, writeU32LE } from '../utils/bit.js';
import type { MemRequest, MemResponse, MemoryPort } from '../cache/types.js';

export class MainMemory {
  readonly bytes: Uint8Array;
  constructor(size = 1024 * 1024) {
    this.bytes = new Uint8Array(size);
  }

  // Each aligned word holds its own byte address
  fillPattern(): void {
    for (let addr = 0; addr + 4 <= this.bytes.length; addr += 4) writeU32LE(this.bytes, addr, addr);
  }

  loadU32(addr: number): number {
    const p = addr >>> 0;
    if (p + 4 <= this.bytes.length) return readU32LE(this.bytes, p);
    // Out of range: reads as zero
    return 0;
  }

  readLine(addr: number, lineSize: number): Uint8Array {
    const out = new Uint8Array(lineSize);
    const p = addr >>> 0;
    for (let i = 0; i < lineSize; i++) {
      const b = this.bytes[p + i];
      if (b !== undefined) out[i] = b;
    }
    return out;
  }

  writeLine(addr: number, line: Uint8Array): void {
    const p = addr >>> 0;
    for (let i = 0; i < line.length; i++) {
      if (p + i < this.bytes.length) this.bytes[p + i] = line[i] ?? 0;
    }
  }
}

export type LatencyOptions = {
  // Ticks a request must be held before it is accepted (0 = accepted in the tick it appears)
  acceptDelay?: number;
  // Ticks from acceptance to the read response (0 = same tick)
  readLatency?: number;
};

export type MemoryLogEntry = {
  cycle: number;
  address: number;
  isWrite: boolean;
};

type PendingRead = { address: number; wait: number };

// Memory-side port over a MainMemory with fixed handshake and read latencies.
// Writes land in the backing store when accepted.
export class LatencyMemory implements MemoryPort {
  acceptDelay: number;
  readLatency: number;
  cycleCount = 0;
  reads = 0;
  writes = 0;
  readonly log: MemoryLogEntry[] = [];
  private held = 0;
  private pending: PendingRead | null = null;

  constructor(public readonly backing: MainMemory, public readonly lineSize: number, opts: LatencyOptions = {}) {
    this.acceptDelay = opts.acceptDelay ?? 0;
    this.readLatency = opts.readLatency ?? 1;
  }

  get busy(): boolean {
    return this.pending !== null;
  }

  cycle(req: MemRequest | null): MemResponse {
    this.cycleCount++;
    const resp: MemResponse = { reqReady: false, respValid: false, readLine: null };

    if (this.pending) {
      this.pending.wait--;
      if (this.pending.wait <= 0) {
        resp.respValid = true;
        resp.readLine = this.backing.readLine(this.pending.address, this.lineSize);
        this.pending = null;
      }
    }

    if (!req) {
      this.held = 0;
      return resp;
    }
    if (this.held < this.acceptDelay) {
      this.held++;
      return resp;
    }
    this.held = 0;
    resp.reqReady = true;
    this.log.push({ cycle: this.cycleCount, address: req.address >>> 0, isWrite: req.isWrite });
    if (req.isWrite) {
      this.writes++;
      if (req.writeLine) this.backing.writeLine(req.address, req.writeLine);
      return resp;
    }
    this.reads++;
    if (this.readLatency === 0) {
      resp.respValid = true;
      resp.readLine = this.backing.readLine(req.address, this.lineSize);
    } else {
      this.pending = { address: req.address >>> 0, wait: this.readLatency };
    }
    return resp;
  }

  reset(): void {
    this.cycleCount = 0;
    this.reads = 0;
    this.writes = 0;
    this.log.length = 0;
    this.held = 0;
    this.pending = null;
  }
}
