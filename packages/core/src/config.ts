import { CacheConfigError } from './errors.js';
import { isPowerOfTwo, log2 } from './utils/bit.js';

export type CacheMode = 'non-blocking' | 'blocking';

export type CacheConfig = {
  lineSize: number;
  numSets: number;
  numWays: number;
  numMshr: number;
  mode: CacheMode;
  // Pick the first invalid way before consulting the pseudo-LRU tree
  preferInvalidWay: boolean;
};

export const DEFAULT_CONFIG: Readonly<CacheConfig> = {
  lineSize: 64,
  numSets: 128,
  numWays: 4,
  numMshr: 8,
  mode: 'non-blocking',
  preferInvalidWay: false,
};

export const MAX_WAYS = 16;
export const MAX_MSHR = 16;
export const WORD_BYTES = 4;
// Word masks are 32-bit, so a line holds at most 32 words
export const MAX_LINE_SIZE = 128;

const CONFIG_KEYS: ReadonlyArray<keyof CacheConfig> = ['lineSize', 'numSets', 'numWays', 'numMshr', 'mode', 'preferInvalidWay'];

function isConfigKey(key: string): key is keyof CacheConfig {
  return CONFIG_KEYS.some((k) => k === key);
}

export function resolveConfig(partial: Partial<CacheConfig> = {}): CacheConfig {
  const cfg: CacheConfig = { ...DEFAULT_CONFIG, ...partial };
  if (!isPowerOfTwo(cfg.lineSize) || cfg.lineSize < WORD_BYTES || cfg.lineSize > MAX_LINE_SIZE) {
    throw new CacheConfigError('lineSize', `expected a power of two in ${WORD_BYTES}..${MAX_LINE_SIZE}, got ${cfg.lineSize}`);
  }
  if (!isPowerOfTwo(cfg.numSets)) {
    throw new CacheConfigError('numSets', `expected a power of two, got ${cfg.numSets}`);
  }
  if (!isPowerOfTwo(cfg.numWays) || cfg.numWays > MAX_WAYS) {
    throw new CacheConfigError('numWays', `expected a power of two in 1..${MAX_WAYS}, got ${cfg.numWays}`);
  }
  if (!Number.isInteger(cfg.numMshr) || cfg.numMshr < 1 || cfg.numMshr > MAX_MSHR) {
    throw new CacheConfigError('numMshr', `expected an integer in 1..${MAX_MSHR}, got ${cfg.numMshr}`);
  }
  if (cfg.mode !== 'non-blocking' && cfg.mode !== 'blocking') {
    throw new CacheConfigError('mode', `expected 'non-blocking' or 'blocking', got ${String(cfg.mode)}`);
  }
  if (log2(cfg.lineSize) + log2(cfg.numSets) > 31) {
    throw new CacheConfigError('numSets', 'offset and index bits leave no room for a tag in a 32-bit address');
  }
  return cfg;
}

// Validate an untyped object (e.g. parsed JSON) into a partial config.
export function parseCacheConfig(raw: unknown): Partial<CacheConfig> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new CacheConfigError('<root>', 'expected an object');
  }
  const out: Partial<CacheConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) throw new CacheConfigError(key, 'unknown key');
    switch (key) {
      case 'lineSize':
      case 'numSets':
      case 'numWays':
      case 'numMshr':
        if (typeof value !== 'number') throw new CacheConfigError(key, `expected a number, got ${typeof value}`);
        out[key] = value;
        break;
      case 'mode':
        if (value !== 'non-blocking' && value !== 'blocking') {
          throw new CacheConfigError(key, `expected 'non-blocking' or 'blocking', got ${JSON.stringify(value)}`);
        }
        out.mode = value;
        break;
      case 'preferInvalidWay':
        if (typeof value !== 'boolean') throw new CacheConfigError(key, `expected a boolean, got ${typeof value}`);
        out.preferInvalidWay = value;
        break;
    }
  }
  return out;
}

/**
 * Fixed-width address slicing for a resolved configuration.
 *
 * | tag | set index | word offset | byte offset |
 */
export class CacheGeometry {
  readonly offsetBits: number;
  readonly indexBits: number;
  readonly tagShift: number;
  readonly wordsPerLine: number;

  constructor(public readonly config: CacheConfig) {
    this.offsetBits = log2(config.lineSize);
    this.indexBits = log2(config.numSets);
    this.tagShift = this.offsetBits + this.indexBits;
    this.wordsPerLine = config.lineSize / WORD_BYTES;
  }

  lineAddress(addr: number): number {
    return (addr & ~(this.config.lineSize - 1)) >>> 0;
  }

  setIndex(addr: number): number {
    return (addr >>> this.offsetBits) & (this.config.numSets - 1);
  }

  tag(addr: number): number {
    return (addr >>> this.tagShift) >>> 0;
  }

  wordOffset(addr: number): number {
    return (addr >>> 2) & (this.wordsPerLine - 1);
  }

  lineAddressOf(tag: number, set: number): number {
    return ((tag << this.tagShift) | (set << this.offsetBits)) >>> 0;
  }
}
