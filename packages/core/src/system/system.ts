import type { DataCacheController } from '../cache/controller.js';
import type { CpuRequest, CpuResponse, FlushMode, TickResult } from '../cache/types.js';

export type ScheduledCallback = () => void;

// One entry of the CPU-side stream; entries are presented strictly in order.
export type StreamEntry =
  | { kind: 'request'; request: CpuRequest }
  | { kind: 'flush'; mode: FlushMode };

export class System {
  cycle = 0 >>> 0;
  stallCycles = 0;
  readonly responses: CpuResponse[] = [];
  private events = new Map<number, ScheduledCallback[]>();
  private readonly stream: StreamEntry[] = [];
  private nextId = 0;

  constructor(public readonly cache: DataCacheController) {}

  get pending(): number {
    return this.stream.length;
  }

  submit(request: Omit<CpuRequest, 'id'> & { id?: number }): number {
    const id = request.id ?? this.nextId;
    this.nextId = Math.max(this.nextId, id + 1);
    this.stream.push({ kind: 'request', request: { ...request, id } });
    return id;
  }

  read(address: number): number {
    return this.submit({ address: address >>> 0, isWrite: false, writeData: 0, byteEnable: 0xf });
  }

  write(address: number, data: number, byteEnable = 0xf): number {
    return this.submit({ address: address >>> 0, isWrite: true, writeData: data >>> 0, byteEnable: byteEnable & 0xf });
  }

  // Held on the flush input until the controller reports flushDone
  flush(mode: FlushMode = 'clean'): void {
    this.stream.push({ kind: 'flush', mode });
  }

  scheduleAt(cycle: number, cb: ScheduledCallback): void {
    const t = cycle >>> 0;
    const arr = this.events.get(t) ?? [];
    arr.push(cb);
    this.events.set(t, arr);
  }

  scheduleEvery(startCycle: number, interval: number, times: number, cb: ScheduledCallback): void {
    let c = startCycle >>> 0;
    for (let i = 0; i < times; i++) {
      this.scheduleAt(c, cb);
      c = (c + (interval >>> 0)) >>> 0;
    }
  }

  stepCycles(n: number): TickResult | null {
    let last: TickResult | null = null;
    for (let i = 0; i < n; i++) {
      // Advance cycle first and run its events so they shape what this tick presents
      this.cycle = (this.cycle + 1) >>> 0;
      const due = this.events.get(this.cycle);
      if (due) {
        for (const cb of due) cb();
        this.events.delete(this.cycle);
      }
      const head = this.stream[0] ?? null;
      const res = this.cache.tick({
        request: head?.kind === 'request' ? head.request : null,
        flush: head?.kind === 'flush' ? head.mode : null,
      });
      if (head?.kind === 'request') {
        if (res.ready) this.stream.shift();
        else this.stallCycles++;
      } else if (head?.kind === 'flush' && res.flushDone) {
        this.stream.shift();
      }
      if (res.response) this.responses.push(res.response);
      last = res;
    }
    return last;
  }
}
