// Base32 text codec for the two ULID blocks.
// 6 bytes (48 bits) <-> 10 chars, 10 bytes (80 bits) <-> 16 chars.
// Crockford's alphabet, most significant bits first.

import { UlidError } from './errors.js';

export const CROCKFORD = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

// ASCII code -> symbol index, -1 when not in the alphabet. Both cases map.
const DECODING: Int8Array = (() => {
  const table = new Int8Array(128).fill(-1);
  for (let i = 0; i < CROCKFORD.length; i++) {
    table[CROCKFORD.charCodeAt(i)] = i;
    table[CROCKFORD.toLowerCase().charCodeAt(i)] = i;
  }
  return table;
})();

function symbolIndex(text: string, pos: number): number {
  const code = text.charCodeAt(pos);
  const ix = code < 128 ? DECODING[code] : -1;
  if (ix < 0) {
    throw new UlidError('InvalidCharacter', `Invalid Base32 character '${text.charAt(pos)}' at position ${pos}`);
  }
  return ix;
}

export function isBase32(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 128 || DECODING[code] < 0) return false;
  }
  return true;
}

export function encodeBase32(v: Uint8Array): string {
  const B = CROCKFORD;

  if (v.length === 6) {
    return (
      /* 0 */ B[(v[0] & 224) >> 5] +
      /* 1 */ B[v[0] & 31] +
      /* 2 */ B[(v[1] & 248) >> 3] +
      /* 3 */ B[((v[1] & 7) << 2) | ((v[2] & 192) >> 6)] +
      /* 4 */ B[(v[2] & 62) >> 1] +
      /* 5 */ B[((v[2] & 1) << 4) | ((v[3] & 240) >> 4)] +
      /* 6 */ B[((v[3] & 15) << 1) | ((v[4] & 128) >> 7)] +
      /* 7 */ B[(v[4] & 124) >> 2] +
      /* 8 */ B[((v[4] & 3) << 3) | ((v[5] & 224) >> 5)] +
      /* 9 */ B[v[5] & 31]
    );
  }

  if (v.length === 10) {
    return (
      /* 0  */ B[(v[0] & 248) >> 3] +
      /* 1  */ B[((v[0] & 7) << 2) | ((v[1] & 192) >> 6)] +
      /* 2  */ B[(v[1] & 62) >> 1] +
      /* 3  */ B[((v[1] & 1) << 4) | ((v[2] & 240) >> 4)] +
      /* 4  */ B[((v[2] & 15) << 1) | ((v[3] & 128) >> 7)] +
      /* 5  */ B[(v[3] & 124) >> 2] +
      /* 6  */ B[((v[3] & 3) << 3) | ((v[4] & 224) >> 5)] +
      /* 7  */ B[v[4] & 31] +
      /* 8  */ B[(v[5] & 248) >> 3] +
      /* 9  */ B[((v[5] & 7) << 2) | ((v[6] & 192) >> 6)] +
      /* 10 */ B[(v[6] & 62) >> 1] +
      /* 11 */ B[((v[6] & 1) << 4) | ((v[7] & 240) >> 4)] +
      /* 12 */ B[((v[7] & 15) << 1) | ((v[8] & 128) >> 7)] +
      /* 13 */ B[(v[8] & 124) >> 2] +
      /* 14 */ B[((v[8] & 3) << 3) | ((v[9] & 224) >> 5)] +
      /* 15 */ B[v[9] & 31]
    );
  }

  throw new UlidError('InvalidLength', `Cannot encode a block of ${v.length} bytes, expected 6 or 10`);
}

export function decodeBase32(text: string): Uint8Array {
  if (text.length !== 10 && text.length !== 16) {
    throw new UlidError('InvalidLength', `Cannot decode ${text.length} characters, expected 10 or 16`);
  }

  const ix: number[] = [];
  for (let i = 0; i < text.length; i++) {
    ix.push(symbolIndex(text, i));
  }

  if (ix.length === 10) {
    // 50 bits of text carry 48 bits of time; the top 2 must be zero.
    if (ix[0] > 7) {
      throw new UlidError('InvalidCharacter', `Time block '${text}' overflows 48 bits: first symbol must be 0-7`);
    }
    return Uint8Array.of(
      /* 0 */ ((ix[0] << 5) | ix[1]) & 0xff,
      /* 1 */ ((ix[2] << 3) | (ix[3] >> 2)) & 0xff,
      /* 2 */ ((ix[3] << 6) | (ix[4] << 1) | (ix[5] >> 4)) & 0xff,
      /* 3 */ ((ix[5] << 4) | (ix[6] >> 1)) & 0xff,
      /* 4 */ ((ix[6] << 7) | (ix[7] << 2) | (ix[8] >> 3)) & 0xff,
      /* 5 */ ((ix[8] << 5) | ix[9]) & 0xff
    );
  }

  return Uint8Array.of(
    /* 0 */ ((ix[0] << 3) | (ix[1] >> 2)) & 0xff,
    /* 1 */ ((ix[1] << 6) | (ix[2] << 1) | (ix[3] >> 4)) & 0xff,
    /* 2 */ ((ix[3] << 4) | (ix[4] >> 1)) & 0xff,
    /* 3 */ ((ix[4] << 7) | (ix[5] << 2) | (ix[6] >> 3)) & 0xff,
    /* 4 */ ((ix[6] << 5) | ix[7]) & 0xff,
    /* 5 */ ((ix[8] << 3) | (ix[9] >> 2)) & 0xff,
    /* 6 */ ((ix[9] << 6) | (ix[10] << 1) | (ix[11] >> 4)) & 0xff,
    /* 7 */ ((ix[11] << 4) | (ix[12] >> 1)) & 0xff,
    /* 8 */ ((ix[12] << 7) | (ix[13] << 2) | (ix[14] >> 3)) & 0xff,
    /* 9 */ ((ix[14] << 5) | ix[15]) & 0xff
  );
}
