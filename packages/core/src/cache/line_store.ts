import { CacheGeometry } from '../config.js';
import { mergeWordLanes, readU32LE } from '../utils/bit.js';
import { selectVictim, updatePlru } from './plru.js';

export type Line = {
  valid: boolean;
  dirty: boolean;
  tag: number;
  data: Uint8Array;
};

export type CacheSet = {
  ways: Line[];
  lru: number;
};

export type LineView = Readonly<Line>;

export type Lookup = { hit: true; way: number } | { hit: false };

function emptyLine(lineSize: number): Line {
  return { valid: false, dirty: false, tag: 0, data: new Uint8Array(lineSize) };
}

// Tag/valid/dirty/data arrays for every (set, way), plus one pseudo-LRU word per set.
export class LineStore {
  private readonly sets: CacheSet[];

  constructor(public readonly geometry: CacheGeometry) {
    const { numSets, numWays, lineSize } = geometry.config;
    this.sets = [];
    for (let s = 0; s < numSets; s++) {
      const ways: Line[] = [];
      for (let w = 0; w < numWays; w++) ways.push(emptyLine(lineSize));
      this.sets.push({ ways, lru: 0 });
    }
  }

  get numSets(): number { return this.sets.length; }
  get numWays(): number { return this.geometry.config.numWays; }

  reset(): void {
    for (const set of this.sets) {
      set.lru = 0;
      for (const line of set.ways) {
        line.valid = false;
        line.dirty = false;
        line.tag = 0;
        line.data.fill(0);
      }
    }
  }

  private set(index: number): CacheSet {
    const s = this.sets[index];
    if (!s) throw new RangeError(`set ${index} out of range`);
    return s;
  }

  line(set: number, way: number): Line {
    const l = this.set(set).ways[way];
    if (!l) throw new RangeError(`way ${way} out of range`);
    return l;
  }

  // Hit detector: first valid way with a matching tag (priority encoder, lowest way wins).
  lookup(set: number, tag: number): Lookup {
    const ways = this.set(set).ways;
    for (let w = 0; w < ways.length; w++) {
      const l = ways[w];
      if (l && l.valid && l.tag === tag) return { hit: true, way: w };
    }
    return { hit: false };
  }

  lookupAddress(addr: number): Lookup {
    return this.lookup(this.geometry.setIndex(addr), this.geometry.tag(addr));
  }

  readWord(set: number, way: number, wordOffset: number): number {
    return readU32LE(this.line(set, way).data, wordOffset * 4);
  }

  // Merge the enabled byte lanes into the line; an empty mask leaves the line untouched and clean.
  writeWord(set: number, way: number, wordOffset: number, value: number, byteEnable: number): void {
    const l = this.line(set, way);
    if (mergeWordLanes(l.data, wordOffset * 4, value, byteEnable)) l.dirty = true;
  }

  install(set: number, way: number, tag: number, data: Uint8Array, dirty: boolean): void {
    const l = this.line(set, way);
    l.data.set(data);
    l.tag = tag >>> 0;
    l.valid = true;
    l.dirty = dirty;
  }

  invalidate(set: number, way: number): void {
    const l = this.line(set, way);
    l.valid = false;
    l.dirty = false;
  }

  lruBits(set: number): number {
    return this.set(set).lru;
  }

  touch(set: number, way: number): void {
    const s = this.set(set);
    s.lru = updatePlru(s.lru, way, this.numWays);
  }

  resetLru(): void {
    for (const s of this.sets) s.lru = 0;
  }

  victim(set: number, preferInvalid: boolean): number {
    const s = this.set(set);
    if (preferInvalid) {
      const free = s.ways.findIndex((l) => !l.valid);
      if (free >= 0) return free;
    }
    return selectVictim(s.lru, this.numWays);
  }

  peek(set: number, way: number): LineView {
    const l = this.line(set, way);
    return { valid: l.valid, dirty: l.dirty, tag: l.tag, data: l.data.slice() };
  }
}
