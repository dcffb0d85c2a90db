export class CacheConfigError extends Error {
  constructor(public readonly field: string, detail: string) {
    super(`invalid cache config '${field}': ${detail}`);
    this.name = 'CacheConfigError';
  }
}

export type MemoryProtocolViolation = 'unexpected-response' | 'line-size-mismatch';

// Raised when the memory-side environment breaks the request/response handshake.
export class MemoryProtocolError extends Error {
  constructor(public readonly violation: MemoryProtocolViolation, public readonly address: number) {
    super(`${violation} at 0x${(address >>> 0).toString(16)}`);
    this.name = 'MemoryProtocolError';
  }
}
