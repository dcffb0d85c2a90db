export type CounterName =
  | 'hits'
  | 'misses'
  | 'hitsDuringRefill'
  | 'missesDuringRefill'
  | 'evictions'
  | 'coalesced'
  | 'rejected'
  | 'flushWritebacks';

export type CounterSnapshot = Readonly<Record<CounterName, number>>;

export class PerfCounters {
  // Requests accepted in IDLE
  hits = 0;
  misses = 0;
  // Requests accepted while a refill was in WRITE_MEM, READ_MEM or UPDATE_CACHE
  hitsDuringRefill = 0;
  missesDuringRefill = 0;
  // Dirty victims written back on a refill
  evictions = 0;
  coalesced = 0;
  rejected = 0;
  flushWritebacks = 0;

  reset(): void {
    this.hits = 0;
    this.misses = 0;
    this.hitsDuringRefill = 0;
    this.missesDuringRefill = 0;
    this.evictions = 0;
    this.coalesced = 0;
    this.rejected = 0;
    this.flushWritebacks = 0;
  }

  snapshot(): CounterSnapshot {
    return {
      hits: this.hits,
      misses: this.misses,
      hitsDuringRefill: this.hitsDuringRefill,
      missesDuringRefill: this.missesDuringRefill,
      evictions: this.evictions,
      coalesced: this.coalesced,
      rejected: this.rejected,
      flushWritebacks: this.flushWritebacks,
    };
  }
}
