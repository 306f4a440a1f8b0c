import { isUlidError, type EntropySource, type UlidErrorKind } from '@sortable/ulid';

export const REF_TIME = new Date('2016-07-30T23:54:10.259Z');
export const REF_RANDOM = Uint8Array.of(0x04, 0x15, 0x56, 0x9d, 0x5c, 0x2f, 0xa3, 0x10, 0xcf, 0x61);
export const REF_TEXT = '01ARZ3NDEK0GAND7AW5YHH1KV1';

// Hands out a fixed buffer and counts calls
export class FixedEntropySource implements EntropySource {
  calls: Array<{ count: number; time?: number }> = [];

  constructor(private readonly bytes: Uint8Array) {}

  getRandomBytes(count: number, time?: number): Uint8Array {
    this.calls.push({ count, time });
    return this.bytes.slice(0, count);
  }
}

// Deterministic byte stream for bulk ordering checks
export function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state >>> 24;
  };
}

export function errorKind(fn: () => unknown): UlidErrorKind | 'none' | 'other' {
  try {
    fn();
  } catch (err) {
    return isUlidError(err) ? err.kind : 'other';
  }
  return 'none';
}
