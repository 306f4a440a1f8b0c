// ULID: Universally Unique Lexicographically Sortable Identifier
// Format: timestamp (10 chars) + random (16 chars) = 26 chars
// Binary: 6 bytes big-endian milliseconds + 10 random bytes = 16 bytes

import { decodeBase32, encodeBase32 } from './base32.js';
import {
  MAX_TIME,
  RANDOM_LENGTH,
  TIME_LENGTH,
  ULID_LENGTH,
  decodeTimeMs,
  encodeTime,
  joinParts,
  splitBytes,
  toMilliseconds
} from './binary.js';
import { getDefaults } from './config.js';
import type { EntropySource } from './entropy.js';
import { UlidError, isUlidError } from './errors.js';
import { getLogger } from './logger.js';

export const ULID_TEXT_LENGTH = 26;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface TryParseResult {
  success: boolean;
  ulid: Ulid;
}

export class Ulid {
  /** time = epoch, random = all zero bytes */
  static readonly empty: Ulid = Ulid.fromParts(0, new Uint8Array(RANDOM_LENGTH));
  /** time = 2^48 - 1 ms, random = all 0xFF bytes */
  static readonly maxValue: Ulid = Ulid.fromParts(MAX_TIME, new Uint8Array(RANDOM_LENGTH).fill(0xff));

  private readonly bytes: Uint8Array;
  private readonly ms: number;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.ms = decodeTimeMs(bytes.subarray(0, TIME_LENGTH));
    Object.freeze(this);
  }

  /**
   * New identifier for `time` (default: now) with 10 bytes drawn from
   * `entropy` (default: the configured process-wide source).
   */
  static newUlid(time: Date | number = Date.now(), entropy?: EntropySource): Ulid {
    const ms = toMilliseconds(time);
    const source = entropy ?? getDefaults().entropy;
    return Ulid.fromParts(ms, source.getRandomBytes(RANDOM_LENGTH, ms));
  }

  static fromParts(time: Date | number, random: Uint8Array): Ulid {
    const ms = toMilliseconds(time);
    if (random.length !== RANDOM_LENGTH) {
      throw new UlidError('InvalidRandomLength', `Random part must be ${RANDOM_LENGTH} bytes, got ${random.length}`);
    }
    return new Ulid(joinParts(encodeTime(ms), random));
  }

  static fromBytes(bytes: Uint8Array): Ulid {
    const { time, random } = splitBytes(bytes);
    return new Ulid(joinParts(time, random));
  }

  // GUID interop keeps the byte order as is.
  static fromGuidBytes(bytes: Uint8Array): Ulid {
    return Ulid.fromBytes(bytes);
  }

  static fromUuid(uuid: string): Ulid {
    if (!UUID_PATTERN.test(uuid)) {
      throw new UlidError('InvalidInput', `Not a UUID: '${uuid}'`);
    }
    return Ulid.fromBytes(new Uint8Array(Buffer.from(uuid.replace(/-/g, ''), 'hex')));
  }

  static parse(text: string | null | undefined): Ulid {
    if (typeof text !== 'string' || text.length === 0) {
      throw new UlidError('InvalidInput', 'A non-empty string is required');
    }
    if (text.length !== ULID_TEXT_LENGTH) {
      throw new UlidError('InvalidLength', `Expected ${ULID_TEXT_LENGTH} characters, got ${text.length}`);
    }
    const time = decodeBase32(text.slice(0, 10));
    const random = decodeBase32(text.slice(10));
    return new Ulid(joinParts(time, random));
  }

  static tryParse(text: string | null | undefined): TryParseResult {
    try {
      return { success: true, ulid: Ulid.parse(text) };
    } catch (err) {
      if (!isUlidError(err)) throw err;
      getLogger().debug({ kind: err.kind, reason: err.message }, 'ulid_parse_failed');
      return { success: false, ulid: Ulid.empty };
    }
  }

  static isValid(text: string | null | undefined): boolean {
    return Ulid.tryParse(text).success;
  }

  static compare(a: Ulid, b: Ulid): number {
    return a.compareTo(b);
  }

  get time(): Date {
    return new Date(this.ms);
  }

  get timestamp(): number {
    return this.ms;
  }

  get random(): Uint8Array {
    return this.bytes.slice(TIME_LENGTH);
  }

  toString(): string {
    return encodeBase32(this.bytes.subarray(0, TIME_LENGTH)) + encodeBase32(this.bytes.subarray(TIME_LENGTH));
  }

  toJSON(): string {
    return this.toString();
  }

  toBytes(): Uint8Array {
    return this.bytes.slice();
  }

  toGuidBytes(): Uint8Array {
    return this.bytes.slice();
  }

  toUuid(): string {
    const hex = Buffer.from(this.bytes).toString('hex');
    return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
  }

  equals(other: Ulid): boolean {
    if (other === this) return true;
    for (let i = 0; i < ULID_LENGTH; i++) {
      if (this.bytes[i] !== other.bytes[i]) return false;
    }
    return true;
  }

  /** Time first, then the 10 random bytes unsigned, left to right. */
  compareTo(other: Ulid): -1 | 0 | 1 {
    if (this.ms !== other.ms) return this.ms < other.ms ? -1 : 1;
    for (let i = TIME_LENGTH; i < ULID_LENGTH; i++) {
      if (this.bytes[i] !== other.bytes[i]) return this.bytes[i] < other.bytes[i] ? -1 : 1;
    }
    return 0;
  }

  // FNV-1a over the two 32-bit halves of the time, then each random byte.
  hashCode(): number {
    let hash = 0x811c9dc5;
    hash = Math.imul(hash ^ Math.floor(this.ms / 0x100000000), 16777619);
    hash = Math.imul(hash ^ (this.ms >>> 0), 16777619);
    for (let i = TIME_LENGTH; i < ULID_LENGTH; i++) {
      hash = Math.imul(hash ^ this.bytes[i], 16777619);
    }
    return hash | 0;
  }
}

/** Current time, default entropy, as a 26-character string. */
export function ulid(time?: Date | number): string {
  return Ulid.newUlid(time).toString();
}
