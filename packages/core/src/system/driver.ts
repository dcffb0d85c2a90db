import type { CpuResponse } from '../cache/types.js';
import type { System } from './system.js';

export type DrainResult = {
  cycles: number;
  drained: boolean;
  responses: CpuResponse[];
  stallCycles: number;
};

// Steps until every stream entry was accepted and the cache is quiescent, or maxCycles pass.
// A memory that never answers shows up as drained=false.
export function runUntilDrained(sys: System, maxCycles = 100_000): DrainResult {
  const start = sys.cycle;
  const done = () => sys.pending === 0 && sys.cache.isQuiescent();
  while (!done() && sys.cycle - start < maxCycles) sys.stepCycles(1);
  return {
    cycles: sys.cycle - start,
    drained: done(),
    responses: sys.responses.slice(),
    stallCycles: sys.stallCycles,
  };
}
