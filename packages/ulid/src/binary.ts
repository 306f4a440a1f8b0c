import { UlidError } from './errors.js';

export const TIME_LENGTH = 6;
export const RANDOM_LENGTH = 10;
export const ULID_LENGTH = TIME_LENGTH + RANDOM_LENGTH;

// 2^48 - 1 ms, 10889-08-02T05:31:50.655Z
export const MAX_TIME = 281474976710655;
export const EPOCH_MS = 0;

const TWO_POW_32 = 0x100000000;

/**
 * Reduce a Date or millisecond count to whole milliseconds since the epoch,
 * rejecting anything the 48-bit time part cannot hold.
 */
export function toMilliseconds(time: Date | number): number {
  const raw = time instanceof Date ? time.getTime() : time;
  if (!Number.isFinite(raw)) {
    throw new UlidError('InvalidTimestamp', `Timestamp is not a finite number: ${String(raw)}`);
  }
  const ms = Math.floor(raw);
  if (ms < EPOCH_MS) {
    throw new UlidError('InvalidTimestamp', `Timestamp ${ms} precedes the epoch`);
  }
  if (ms > MAX_TIME) {
    throw new UlidError('InvalidTimestamp', `Timestamp ${ms} exceeds the 48-bit range`);
  }
  return ms;
}

/**
 * Milliseconds since the epoch as 6 big-endian bytes. Only the low 48 bits
 * are kept; range checks belong to `toMilliseconds`.
 */
export function encodeTime(time: Date | number): Uint8Array {
  const value = time instanceof Date ? time.getTime() : time;
  if (!Number.isFinite(value)) {
    throw new UlidError('InvalidTimestamp', `Timestamp is not a finite number: ${String(value)}`);
  }
  const raw = Math.floor(value);
  const ms = ((raw % (MAX_TIME + 1)) + (MAX_TIME + 1)) % (MAX_TIME + 1);
  const hi = Math.floor(ms / TWO_POW_32);
  const lo = ms >>> 0;

  return Uint8Array.of(
    (hi >>> 8) & 0xff,
    hi & 0xff,
    (lo >>> 24) & 0xff,
    (lo >>> 16) & 0xff,
    (lo >>> 8) & 0xff,
    lo & 0xff
  );
}

export function decodeTimeMs(bytes: Uint8Array): number {
  if (bytes.length !== TIME_LENGTH) {
    throw new UlidError('InvalidLength', `Time part must be ${TIME_LENGTH} bytes, got ${bytes.length}`);
  }
  const hi = (bytes[0] << 8) | bytes[1];
  const lo = ((bytes[2] << 24) | (bytes[3] << 16) | (bytes[4] << 8) | bytes[5]) >>> 0;
  return hi * TWO_POW_32 + lo;
}

export function decodeTime(bytes: Uint8Array): Date {
  return new Date(decodeTimeMs(bytes));
}

export function joinParts(time: Uint8Array, random: Uint8Array): Uint8Array {
  if (time.length !== TIME_LENGTH) {
    throw new UlidError('InvalidLength', `Time part must be ${TIME_LENGTH} bytes, got ${time.length}`);
  }
  if (random.length !== RANDOM_LENGTH) {
    throw new UlidError('InvalidRandomLength', `Random part must be ${RANDOM_LENGTH} bytes, got ${random.length}`);
  }
  const out = new Uint8Array(ULID_LENGTH);
  out.set(time, 0);
  out.set(random, TIME_LENGTH);
  return out;
}

export function splitBytes(bytes: Uint8Array): { time: Uint8Array; random: Uint8Array } {
  if (bytes.length !== ULID_LENGTH) {
    throw new UlidError('InvalidLength', `An array of ${ULID_LENGTH} bytes is required, got ${bytes.length}`);
  }
  return {
    time: bytes.slice(0, TIME_LENGTH),
    random: bytes.slice(TIME_LENGTH)
  };
}
