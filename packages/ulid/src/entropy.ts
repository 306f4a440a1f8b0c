import { randomBytes } from 'crypto';
import { UlidError } from './errors.js';
import type { EntropyKind } from './env.js';

/**
 * Supplies the random part of new identifiers. `Ulid.newUlid` calls it once
 * per identifier with `count` = 10 and the identifier's time in milliseconds.
 * Errors thrown here reach the caller unchanged.
 */
export interface EntropySource {
  getRandomBytes(count: number, time?: number): Uint8Array;
}

export class CryptoEntropySource implements EntropySource {
  getRandomBytes(count: number): Uint8Array {
    return new Uint8Array(randomBytes(count));
  }
}

// Math.random backed. Fast, not suitable where ids must be unguessable.
export class SimpleEntropySource implements EntropySource {
  getRandomBytes(count: number): Uint8Array {
    const out = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
      out[i] = Math.floor(Math.random() * 256);
    }
    return out;
  }
}

/**
 * Within one millisecond, hands out the previous random part plus one so that
 * identifiers from the same generator sort in the order they were created.
 */
export class MonotonicEntropySource implements EntropySource {
  private lastTime: number | undefined;
  private lastRandom: Uint8Array | undefined;

  constructor(private readonly inner: EntropySource = new CryptoEntropySource()) {}

  getRandomBytes(count: number, time?: number): Uint8Array {
    if (time !== undefined && time === this.lastTime && this.lastRandom && this.lastRandom.length === count) {
      const inc = new Uint8Array(this.lastRandom);
      let i = count - 1;
      for (; i >= 0; i--) {
        inc[i] = (inc[i] + 1) & 0xff;
        if (inc[i] !== 0) break;
      }
      if (i < 0) {
        throw new UlidError('RandomOverflow', `Random part exhausted for timestamp ${time}`);
      }
      this.lastRandom = inc;
    } else {
      this.lastTime = time;
      this.lastRandom = this.inner.getRandomBytes(count, time);
    }
    return new Uint8Array(this.lastRandom);
  }
}

export function createEntropySource(kind: EntropyKind): EntropySource {
  switch (kind) {
    case 'crypto':
      return new CryptoEntropySource();
    case 'simple':
      return new SimpleEntropySource();
    case 'monotonic':
      return new MonotonicEntropySource();
  }
}
