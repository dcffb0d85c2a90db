import { CacheGeometry, resolveConfig, type CacheConfig } from '../config.js';
import { MemoryProtocolError } from '../errors.js';
import { hex32, mergeWordLanes, readU32LE } from '../utils/bit.js';
import { debugLog } from '../utils/debug.js';
import { PerfCounters, type CounterSnapshot } from './counters.js';
import { LineStore, type LineView } from './line_store.js';
import { MshrTable, type MshrStatus } from './mshr.js';
import { ResponseComposer } from './response.js';
import type {
  CpuRequest,
  CpuResponse,
  FlushMode,
  MemRequest,
  MemResponse,
  MemoryPort,
  RefillState,
  TickInput,
  TickResult,
} from './types.js';

type ActiveRefill = {
  mshrId: number;
  lineAddress: number;
  set: number;
  tag: number;
  victimWay: number;
  // Copy of the dirty victim taken when the refill started
  writeBack: MemRequest | null;
  readAccepted: boolean;
  fetched: Uint8Array | null;
};

type FlushTarget = {
  index: number;
  set: number;
  way: number;
  request: MemRequest;
};

type FlushSweep = {
  mode: FlushMode;
  target: FlushTarget | null;
};

/**
 * Non-blocking write-back data cache.
 *
 * Each call to {@link tick} is one clock: the memory port is cycled once with the request
 * of the current state, a line fetched in the previous tick is installed, the presented CPU
 * request is served (hit), coalesced into an MSHR, queued as a new miss or rejected, and
 * the next state is chosen. Only one refill runs at a time; further misses wait in their
 * MSHRs in allocation order.
 */
export class DataCacheController {
  readonly config: CacheConfig;
  readonly geometry: CacheGeometry;
  readonly lines: LineStore;
  readonly mshrs: MshrTable;
  private readonly perf = new PerfCounters();
  private readonly composer = new ResponseComposer();

  private current: RefillState = 'IDLE';
  private active: ActiveRefill | null = null;
  // MSHR ids waiting for their refill, oldest first
  private readonly queue: number[] = [];
  // Requests absorbed by each MSHR, in arrival order
  private readonly targets: CpuRequest[][] = [];
  private flushRequested: FlushMode | null = null;
  private sweep: FlushSweep | null = null;
  cycle = 0;

  constructor(private readonly memory: MemoryPort, config: Partial<CacheConfig> = {}) {
    this.config = resolveConfig(config);
    this.geometry = new CacheGeometry(this.config);
    this.lines = new LineStore(this.geometry);
    this.mshrs = new MshrTable(this.geometry, this.config.numMshr);
    for (let i = 0; i < this.config.numMshr; i++) this.targets.push([]);
  }

  get state(): RefillState {
    return this.current;
  }

  get activeMshr(): number | null {
    return this.active ? this.active.mshrId : null;
  }

  get queuedRefills(): number {
    return this.queue.length;
  }

  get pendingResponses(): number {
    return this.composer.pending;
  }

  counters(): CounterSnapshot {
    return this.perf.snapshot();
  }

  mshrStatus(): MshrStatus {
    return this.mshrs.status();
  }

  peekLine(set: number, way: number): LineView {
    return this.lines.peek(set, way);
  }

  lruBits(set: number): number {
    return this.lines.lruBits(set);
  }

  isQuiescent(): boolean {
    return this.current === 'IDLE'
      && this.active === null
      && this.queue.length === 0
      && this.mshrs.validCount === 0
      && this.composer.pending === 0
      && this.flushRequested === null
      && this.sweep === null;
  }

  reset(): void {
    this.lines.reset();
    this.mshrs.reset();
    this.perf.reset();
    this.composer.reset();
    this.current = 'IDLE';
    this.active = null;
    this.queue.length = 0;
    for (const t of this.targets) t.length = 0;
    this.flushRequested = null;
    this.sweep = null;
    this.cycle = 0;
  }

  tick(input: TickInput = {}): TickResult {
    this.cycle++;
    const state = this.current;
    let next: RefillState = state;
    if (input.flush && this.sweep === null) this.flushRequested = input.flush;

    // Memory side
    const memReq = this.memoryRequest();
    const memResp = this.memory.cycle(memReq);
    this.checkResponse(state, memReq, memResp);
    switch (state) {
      case 'WRITE_MEM':
        if (memResp.reqReady) {
          this.perf.evictions++;
          next = 'READ_MEM';
        }
        break;
      case 'READ_MEM': {
        const a = this.requireActive();
        if (memReq && memResp.reqReady) a.readAccepted = true;
        if (memResp.respValid && memResp.readLine) {
          a.fetched = memResp.readLine.slice();
          next = 'UPDATE_CACHE';
        }
        break;
      }
      case 'FLUSH':
        if (memResp.reqReady) this.advanceSweep();
        break;
      default:
        break;
    }

    if (state === 'UPDATE_CACHE') {
      this.completeRefill();
      next = 'IDLE';
    }

    // CPU side
    let ready = false;
    let outcome: TickResult['outcome'] = null;
    let immediate: CpuResponse | null = null;
    const req = input.request ?? null;
    if (req) {
      if (this.accepting(state)) {
        const served = this.serve(req, state);
        ready = served.ready;
        outcome = served.outcome;
        immediate = served.response;
      }
      if (!ready) this.perf.rejected++;
    }

    // Sequencing
    if (state === 'FLUSH' && this.sweep?.target === null) {
      this.finishSweep();
      next = 'IDLE';
    }
    if (state === 'IDLE' && this.active === null) {
      if (this.queue.length > 0) {
        next = this.startRefill();
      } else if (this.flushRequested !== null) {
        next = this.startSweep(this.flushRequested);
      }
    }

    if (next !== state) debugLog('dcache', `cycle ${this.cycle}: ${state} -> ${next}`);
    this.current = next;

    return {
      ready,
      outcome,
      response: this.composer.compose(immediate),
      flushDone: this.flushRequested === null && this.sweep === null,
    };
  }

  private accepting(state: RefillState): boolean {
    if (this.flushRequested !== null || this.sweep !== null) return false;
    if (this.config.mode === 'blocking') {
      return state === 'IDLE' && this.active === null && this.queue.length === 0;
    }
    return true;
  }

  private serve(req: CpuRequest, state: RefillState): { ready: boolean; outcome: TickResult['outcome']; response: CpuResponse | null } {
    const g = this.geometry;
    const set = g.setIndex(req.address);
    const word = g.wordOffset(req.address);
    const look = this.lines.lookup(set, g.tag(req.address));

    if (look.hit) {
      // The outgoing line stays readable until it is overwritten, but a write to it would be lost.
      if (req.isWrite && this.isRefillVictim(set, look.way)) return { ready: false, outcome: null, response: null };
      let data: number | null = null;
      if (req.isWrite) this.lines.writeWord(set, look.way, word, req.writeData, req.byteEnable);
      else data = this.lines.readWord(set, look.way, word);
      this.lines.touch(set, look.way);
      if (state === 'IDLE') this.perf.hits++;
      else this.perf.hitsDuringRefill++;
      const source = state === 'IDLE' ? 'hit' : 'hit-during-refill';
      return { ready: true, outcome: 'hit', response: { id: req.id, address: req.address, isWrite: req.isWrite, data, source } };
    }

    const matched = this.mshrs.match(req.address, word);
    if (matched !== null) {
      this.targetsOf(matched).push(req);
      this.countMiss(state);
      this.perf.coalesced++;
      return { ready: true, outcome: 'coalesced', response: null };
    }

    const id = this.mshrs.allocate(req.address, word);
    if (id === null) return { ready: false, outcome: null, response: null };
    this.targetsOf(id).push(req);
    this.queue.push(id);
    this.countMiss(state);
    debugLog('dcache', `cycle ${this.cycle}: miss ${hex32(req.address)} -> mshr ${id}`);
    return { ready: true, outcome: 'miss', response: null };
  }

  private countMiss(state: RefillState): void {
    if (state === 'IDLE') this.perf.misses++;
    else this.perf.missesDuringRefill++;
  }

  private isRefillVictim(set: number, way: number): boolean {
    return this.active !== null && this.active.set === set && this.active.victimWay === way;
  }

  private startRefill(): RefillState {
    const id = this.queue.shift();
    const entry = id === undefined ? null : this.mshrs.view(id);
    if (id === undefined || !entry || !entry.valid) throw new Error('refill queue holds a free MSHR');
    const g = this.geometry;
    const set = g.setIndex(entry.lineAddress);
    const way = this.lines.victim(set, this.config.preferInvalidWay);
    const victim = this.lines.line(set, way);
    const writeBack: MemRequest | null = victim.valid && victim.dirty
      ? { address: g.lineAddressOf(victim.tag, set), isWrite: true, writeLine: victim.data.slice() }
      : null;
    this.active = {
      mshrId: id,
      lineAddress: entry.lineAddress,
      set,
      tag: g.tag(entry.lineAddress),
      victimWay: way,
      writeBack,
      readAccepted: false,
      fetched: null,
    };
    return writeBack ? 'WRITE_MEM' : 'READ_MEM';
  }

  private completeRefill(): void {
    const a = this.requireActive();
    if (!a.fetched) throw new Error('UPDATE_CACHE without a fetched line');
    const line = a.fetched;
    let dirty = false;
    const list = this.targetsOf(a.mshrId);
    for (const t of list) {
      const off = this.geometry.wordOffset(t.address) * 4;
      if (t.isWrite) {
        // Write-allocate: merge into the fetched line before install
        if (mergeWordLanes(line, off, t.writeData, t.byteEnable)) dirty = true;
        this.composer.defer({ id: t.id, address: t.address, isWrite: true, data: null, source: 'refill' });
      } else {
        this.composer.defer({ id: t.id, address: t.address, isWrite: false, data: readU32LE(line, off), source: 'refill' });
      }
    }
    list.length = 0;
    this.lines.install(a.set, a.victimWay, a.tag, line, dirty);
    this.lines.touch(a.set, a.victimWay);
    this.mshrs.retire(a.mshrId);
    this.active = null;
  }

  private memoryRequest(): MemRequest | null {
    switch (this.current) {
      case 'WRITE_MEM':
        return this.requireActive().writeBack;
      case 'READ_MEM': {
        const a = this.requireActive();
        return a.readAccepted ? null : { address: a.lineAddress, isWrite: false, writeLine: null };
      }
      case 'FLUSH':
        return this.sweep?.target?.request ?? null;
      default:
        return null;
    }
  }

  private checkResponse(state: RefillState, memReq: MemRequest | null, memResp: MemResponse): void {
    if (!memResp.respValid) return;
    const address = memReq?.address ?? this.active?.lineAddress ?? 0;
    const expecting = state === 'READ_MEM'
      && this.active !== null
      && (this.active.readAccepted || (memReq !== null && memResp.reqReady));
    if (!expecting || !memResp.readLine) throw new MemoryProtocolError('unexpected-response', address);
    if (memResp.readLine.length !== this.config.lineSize) throw new MemoryProtocolError('line-size-mismatch', address);
  }

  private startSweep(mode: FlushMode): RefillState {
    this.flushRequested = null;
    this.sweep = { mode, target: this.findDirty(0) };
    if (this.sweep.target === null) {
      this.finishSweep();
      return 'IDLE';
    }
    return 'FLUSH';
  }

  private advanceSweep(): void {
    const sweep = this.sweep;
    if (!sweep || !sweep.target) return;
    const { set, way, index } = sweep.target;
    this.lines.line(set, way).dirty = false;
    this.perf.flushWritebacks++;
    sweep.target = this.findDirty(index + 1);
  }

  private finishSweep(): void {
    if (this.sweep?.mode === 'invalidate') {
      for (let s = 0; s < this.lines.numSets; s++) {
        for (let w = 0; w < this.lines.numWays; w++) this.lines.invalidate(s, w);
      }
      this.lines.resetLru();
    }
    this.sweep = null;
  }

  // Next valid dirty line at or after a flat (set * ways + way) index
  private findDirty(from: number): FlushTarget | null {
    const ways = this.lines.numWays;
    const total = this.lines.numSets * ways;
    for (let index = from; index < total; index++) {
      const set = Math.floor(index / ways);
      const way = index % ways;
      const l = this.lines.line(set, way);
      if (!l.valid || !l.dirty) continue;
      const address = this.geometry.lineAddressOf(l.tag, set);
      return { index, set, way, request: { address, isWrite: true, writeLine: l.data.slice() } };
    }
    return null;
  }

  private requireActive(): ActiveRefill {
    if (!this.active) throw new Error(`${this.current} without an active refill`);
    return this.active;
  }

  private targetsOf(id: number): CpuRequest[] {
    const list = this.targets[id];
    if (!list) throw new RangeError(`mshr ${id} out of range`);
    return list;
  }
}
