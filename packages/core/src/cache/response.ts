import type { CpuResponse } from './types.js';

// Picks the single response delivered each tick. An immediate response for the
// presented request wins the tick; refill completions wait in arrival order.
// Completions only drain on ticks without a hit, so a CPU that hits on every tick
// keeps this FIFO growing until it leaves a gap.
export class ResponseComposer {
  private readonly deferred: CpuResponse[] = [];

  get pending(): number {
    return this.deferred.length;
  }

  defer(resp: CpuResponse): void {
    this.deferred.push(resp);
  }

  compose(immediate: CpuResponse | null): CpuResponse | null {
    if (immediate) return immediate;
    return this.deferred.shift() ?? null;
  }

  reset(): void {
    this.deferred.length = 0;
  }
}
