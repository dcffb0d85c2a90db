import { CacheGeometry } from '../config.js';
import { bitIndices } from '../utils/bit.js';

export type MshrEntry = {
  valid: boolean;
  lineAddress: number;
  wordMask: number;
};

export type MshrEntryView = {
  readonly id: number;
  readonly valid: boolean;
  readonly lineAddress: number;
  readonly wordMask: number;
  // Word offsets set in wordMask, lowest first
  readonly words: readonly number[];
};

export type MshrStatus = {
  readonly full: boolean;
  readonly entries: readonly MshrEntryView[];
};

/**
 * Miss status holding registers, searched like a CAM.
 *
 * Allocation takes the first free entry and matching returns the lowest matching id,
 * both by linear scan. Within one tick the controller retires before it allocates, so a
 * retire and an allocation landing on the same id leave the new allocation in place.
 */
export class MshrTable {
  private readonly entries: MshrEntry[] = [];

  constructor(public readonly geometry: CacheGeometry, public readonly size: number) {
    for (let i = 0; i < size; i++) this.entries.push({ valid: false, lineAddress: 0, wordMask: 0 });
  }

  reset(): void {
    for (const e of this.entries) {
      e.valid = false;
      e.lineAddress = 0;
      e.wordMask = 0;
    }
  }

  get full(): boolean {
    return this.entries.every((e) => e.valid);
  }

  get validCount(): number {
    let n = 0;
    for (const e of this.entries) if (e.valid) n++;
    return n;
  }

  allocate(addr: number, wordOffset: number): number | null {
    for (let id = 0; id < this.entries.length; id++) {
      const e = this.entries[id];
      if (!e || e.valid) continue;
      e.valid = true;
      e.lineAddress = this.geometry.lineAddress(addr);
      e.wordMask = (1 << wordOffset) >>> 0;
      return id;
    }
    return null;
  }

  // CAM compare on line address; the requested word joins the matching entry's mask.
  match(addr: number, wordOffset: number): number | null {
    const line = this.geometry.lineAddress(addr);
    for (let id = 0; id < this.entries.length; id++) {
      const e = this.entries[id];
      if (!e || !e.valid || e.lineAddress !== line) continue;
      e.wordMask = (e.wordMask | (1 << wordOffset)) >>> 0;
      return id;
    }
    return null;
  }

  // Idempotent: retiring a free entry is a no-op.
  retire(id: number): void {
    const e = this.entries[id];
    if (!e) return;
    e.valid = false;
    e.wordMask = 0;
    e.lineAddress = 0;
  }

  view(id: number): MshrEntryView | null {
    const e = this.entries[id];
    if (!e) return null;
    return {
      id,
      valid: e.valid,
      lineAddress: e.lineAddress,
      wordMask: e.wordMask,
      words: bitIndices(e.wordMask, this.geometry.wordsPerLine),
    };
  }

  status(): MshrStatus {
    const entries: MshrEntryView[] = [];
    for (let id = 0; id < this.entries.length; id++) {
      const v = this.view(id);
      if (v) entries.push(v);
    }
    return { full: this.full, entries };
  }
}
