export { Ulid, ulid, ULID_TEXT_LENGTH, type TryParseResult } from './ulid.js';
export { UlidError, isUlidError, type UlidErrorKind } from './errors.js';
export { CROCKFORD, encodeBase32, decodeBase32, isBase32 } from './base32.js';
export {
  EPOCH_MS,
  MAX_TIME,
  TIME_LENGTH,
  RANDOM_LENGTH,
  ULID_LENGTH,
  toMilliseconds,
  encodeTime,
  decodeTime,
  decodeTimeMs,
  joinParts,
  splitBytes
} from './binary.js';
export {
  CryptoEntropySource,
  SimpleEntropySource,
  MonotonicEntropySource,
  createEntropySource,
  type EntropySource
} from './entropy.js';
export { loadEnv, ENTROPY_KINDS, type Env, type EntropyKind } from './env.js';
export { getDefaults, resolveDefaults, type UlidDefaults } from './config.js';
export { getLogger } from './logger.js';
export { UlidStringSchema, UlidSchema, type UlidString } from './schema.js';
