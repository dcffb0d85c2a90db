export function isPowerOfTwo(x: number): boolean {
  return Number.isInteger(x) && x > 0 && (x & (x - 1)) === 0;
}

// Integer log2 of a power of two
export function log2(x: number): number {
  return 31 - Math.clz32(x >>> 0);
}

// Indices of the set bits of a mask, lowest first
export function bitIndices(mask: number, width: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < width; i++) {
    if (((mask >>> i) & 1) !== 0) out.push(i);
  }
  return out;
}

export function readU32LE(bytes: Uint8Array, offset: number): number {
  const b0 = bytes[offset] ?? 0;
  const b1 = bytes[offset + 1] ?? 0;
  const b2 = bytes[offset + 2] ?? 0;
  const b3 = bytes[offset + 3] ?? 0;
  return (
    (b0 << 0) |
    (b1 << 8) |
    (b2 << 16) |
    (b3 << 24)
  ) >>> 0;
}

export function writeU32LE(bytes: Uint8Array, offset: number, value: number): void {
  bytes[offset] = value & 0xff;
  bytes[offset + 1] = (value >>> 8) & 0xff;
  bytes[offset + 2] = (value >>> 16) & 0xff;
  bytes[offset + 3] = (value >>> 24) & 0xff;
}

// Write only the byte lanes enabled in byteEnable (bit i -> byte i of the word, little-endian).
// Returns true when at least one lane was written.
export function mergeWordLanes(bytes: Uint8Array, offset: number, value: number, byteEnable: number): boolean {
  let touched = false;
  for (let lane = 0; lane < 4; lane++) {
    if (((byteEnable >>> lane) & 1) === 0) continue;
    bytes[offset + lane] = (value >>> (lane * 8)) & 0xff;
    touched = true;
  }
  return touched;
}

export function hex32(x: number): string {
  return `0x${(x >>> 0).toString(16).padStart(8, '0')}`;
}
