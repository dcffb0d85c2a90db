import {
  DataCacheController,
  LatencyMemory,
  MainMemory,
  System,
  resolveConfig,
  runUntilDrained,
  writeU32LE,
  type CacheConfig,
  type CounterSnapshot,
  type CpuResponse,
  type FlushMode,
} from '@nbcache/core';

export function crc32(data: Uint8Array): string {
  let crc = 0xFFFFFFFF >>> 0;
  for (let i = 0; i < data.length; i++) {
    let c = (crc ^ (data[i] ?? 0)) & 0xFF;
    for (let k = 0; k < 8; k++) {
      const mask = -(c & 1);
      c = (c >>> 1) ^ (0xEDB88320 & mask);
    }
    crc = (crc >>> 8) ^ c;
  }
  crc = (~crc) >>> 0;
  return (crc >>> 0).toString(16).padStart(8, '0');
}

export class TraceParseError extends Error {
  constructor(public readonly line: number, detail: string) {
    super(`trace line ${line}: ${detail}`);
    this.name = 'TraceParseError';
  }
}

export type TraceOp =
  | { kind: 'read'; address: number }
  | { kind: 'write'; address: number; data: number; byteEnable: number }
  | { kind: 'flush'; mode: FlushMode };

export function parseNum(val: string | undefined, def: number): number {
  if (val === undefined) return def;
  const s = val.trim();
  if (s.startsWith('0x') || s.startsWith('0X')) return parseInt(s, 16) >>> 0;
  const n = Number(s);
  return Number.isFinite(n) ? (n >>> 0) : def;
}

function parseField(tok: string | undefined, line: number, what: string): number {
  if (tok === undefined) throw new TraceParseError(line, `missing ${what}`);
  const hex = /^0x[0-9a-f]+$/i.test(tok);
  if (!hex && !/^\d+$/.test(tok)) throw new TraceParseError(line, `bad ${what} '${tok}'`);
  const n = hex ? parseInt(tok.slice(2), 16) : Number(tok);
  if (n > 0xffffffff) throw new TraceParseError(line, `${what} '${tok}' does not fit in 32 bits`);
  return n >>> 0;
}

// R <addr> | W <addr> <data> [<byteEnable>] | F [clean|invalidate]; '#' starts a comment
export function parseTrace(text: string): TraceOp[] {
  const ops: TraceOp[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const body = (lines[i] ?? '').replace(/#.*$/, '').trim();
    if (body === '') continue;
    const [op, ...rest] = body.split(/\s+/);
    switch ((op ?? '').toUpperCase()) {
      case 'R':
        if (rest.length !== 1) throw new TraceParseError(lineNo, 'R takes exactly one address');
        ops.push({ kind: 'read', address: parseField(rest[0], lineNo, 'address') });
        break;
      case 'W': {
        if (rest.length < 2 || rest.length > 3) throw new TraceParseError(lineNo, 'W takes an address, data and an optional byte enable');
        const byteEnable = rest[2] === undefined ? 0xf : parseField(rest[2], lineNo, 'byte enable');
        if (byteEnable > 0xf) throw new TraceParseError(lineNo, `byte enable '${rest[2] ?? ''}' wider than 4 lanes`);
        ops.push({
          kind: 'write',
          address: parseField(rest[0], lineNo, 'address'),
          data: parseField(rest[1], lineNo, 'data'),
          byteEnable,
        });
        break;
      }
      case 'F': {
        const mode = (rest[0] ?? 'clean').toLowerCase();
        if (rest.length > 1 || (mode !== 'clean' && mode !== 'invalidate')) {
          throw new TraceParseError(lineNo, `F takes 'clean' or 'invalidate', got '${rest.join(' ')}'`);
        }
        ops.push({ kind: 'flush', mode });
        break;
      }
      default:
        throw new TraceParseError(lineNo, `unknown op '${op ?? ''}'`);
    }
  }
  return ops;
}

// --key value / --flag pairs plus positional arguments
export function parseArgs(args: string[]): { positional: string[]; opts: Record<string, string> } {
  const opts: Record<string, string> = {};
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? '';
    if (a.startsWith('--')) {
      const key = a.slice(2);
      const next = (i + 1 < args.length) ? args[i + 1] : undefined;
      const val = (next && !next.startsWith('--')) ? (args[++i] ?? '1') : '1';
      opts[key] = val;
    } else {
      positional.push(a);
    }
  }
  return { positional, opts };
}

export type MemoryFill = 'zero' | 'pattern';

export type RunOptions = {
  config: Partial<CacheConfig>;
  acceptDelay: number;
  readLatency: number;
  memSize: number;
  fill: MemoryFill;
  maxCycles: number;
  includeResponses: boolean;
};

export const DEFAULT_RUN_OPTIONS: Readonly<RunOptions> = {
  config: {},
  acceptDelay: 0,
  readLatency: 2,
  memSize: 1 << 20,
  fill: 'pattern',
  maxCycles: 1_000_000,
  includeResponses: false,
};

// CLI flags override values from a --config file
export function buildRunOptions(opts: Record<string, string>, fileConfig: Partial<CacheConfig> = {}): RunOptions {
  const config: Partial<CacheConfig> = { ...fileConfig };
  if (opts['sets'] !== undefined) config.numSets = parseNum(opts['sets'], 0);
  if (opts['ways'] !== undefined) config.numWays = parseNum(opts['ways'], 0);
  if (opts['line-size'] !== undefined) config.lineSize = parseNum(opts['line-size'], 0);
  if (opts['mshrs'] !== undefined) config.numMshr = parseNum(opts['mshrs'], 0);
  if (opts['blocking'] !== undefined) config.mode = 'blocking';
  if (opts['prefer-invalid'] !== undefined) config.preferInvalidWay = true;
  const fill = (opts['fill'] ?? DEFAULT_RUN_OPTIONS.fill).toLowerCase();
  if (fill !== 'zero' && fill !== 'pattern') throw new Error(`--fill expects 'zero' or 'pattern', got '${fill}'`);
  return {
    config,
    acceptDelay: parseNum(opts['accept-delay'], DEFAULT_RUN_OPTIONS.acceptDelay),
    readLatency: parseNum(opts['read-latency'], DEFAULT_RUN_OPTIONS.readLatency),
    memSize: parseNum(opts['mem-size'], DEFAULT_RUN_OPTIONS.memSize),
    fill,
    maxCycles: parseNum(opts['max-cycles'], DEFAULT_RUN_OPTIONS.maxCycles),
    includeResponses: opts['responses'] !== undefined,
  };
}

export type RunSummary = {
  config: CacheConfig;
  cycles: number;
  drained: boolean;
  stallCycles: number;
  counters: CounterSnapshot;
  memory: { reads: number; writes: number; crc32: string };
  readChecksum: string;
  responses?: CpuResponse[];
};

export function readChecksum(responses: readonly CpuResponse[]): string {
  const reads = responses.filter((r) => r.data !== null);
  const bytes = new Uint8Array(reads.length * 4);
  reads.forEach((r, i) => writeU32LE(bytes, i * 4, r.data ?? 0));
  return crc32(bytes);
}

function buildSystem(options: RunOptions) {
  const config = resolveConfig(options.config);
  const mem = new MainMemory(options.memSize);
  if (options.fill === 'pattern') mem.fillPattern();
  const port = new LatencyMemory(mem, config.lineSize, { acceptDelay: options.acceptDelay, readLatency: options.readLatency });
  const cache = new DataCacheController(port, config);
  return { mem, port, cache, sys: new System(cache) };
}

export function runTrace(ops: readonly TraceOp[], options: RunOptions): RunSummary {
  const { mem, port, cache, sys } = buildSystem(options);
  for (const op of ops) {
    if (op.kind === 'read') sys.read(op.address);
    else if (op.kind === 'write') sys.write(op.address, op.data, op.byteEnable);
    else sys.flush(op.mode);
  }
  const res = runUntilDrained(sys, options.maxCycles);
  const summary: RunSummary = {
    config: cache.config,
    cycles: res.cycles,
    drained: res.drained,
    stallCycles: res.stallCycles,
    counters: cache.counters(),
    memory: { reads: port.reads, writes: port.writes, crc32: crc32(mem.bytes) },
    readChecksum: readChecksum(res.responses),
  };
  if (options.includeResponses) summary.responses = res.responses;
  return summary;
}

export type DemoStep = {
  cycles: number;
  response: CpuResponse | null;
  memoryReads: number;
  counters: CounterSnapshot;
};

export const DEMO_ADDRESS = 0x1000;

// Read the same word twice, draining in between: a refill from memory, then a hit.
export function runDemo(options: RunOptions): { config: CacheConfig; steps: DemoStep[] } {
  const { port, cache, sys } = buildSystem(options);
  const steps: DemoStep[] = [];
  for (let i = 0; i < 2; i++) {
    const before = sys.responses.length;
    sys.read(DEMO_ADDRESS);
    const res = runUntilDrained(sys, options.maxCycles);
    steps.push({
      cycles: res.cycles,
      response: res.responses[before] ?? null,
      memoryReads: port.reads,
      counters: cache.counters(),
    });
  }
  return { config: cache.config, steps };
}
