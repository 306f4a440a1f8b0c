import { describe, it, expect } from 'vitest';
import {
  loadEnv,
  resolveDefaults,
  getDefaults,
  getLogger,
  CryptoEntropySource,
  MonotonicEntropySource,
  SimpleEntropySource
} from '@sortable/ulid';

describe('Environment', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadEnv({})).toEqual({ ULID_ENTROPY: 'crypto', ULID_LOG_LEVEL: 'info' });
  });

  it('reads explicit values', () => {
    expect(loadEnv({ ULID_ENTROPY: 'monotonic', ULID_LOG_LEVEL: 'debug' })).toEqual({
      ULID_ENTROPY: 'monotonic',
      ULID_LOG_LEVEL: 'debug'
    });
  });

  it('rejects unknown values with the offending key', () => {
    expect(() => loadEnv({ ULID_ENTROPY: 'dice' })).toThrow(/^Invalid environment:\nULID_ENTROPY: /);
    expect(() => loadEnv({ ULID_LOG_LEVEL: 'loud' })).toThrow(/ULID_LOG_LEVEL: /);
  });
});

describe('Defaults', () => {
  it('resolves a frozen set of defaults from an env', () => {
    const defaults = resolveDefaults({ ULID_ENTROPY: 'simple', ULID_LOG_LEVEL: 'info' });

    expect(Object.isFrozen(defaults)).toBe(true);
    expect(defaults.epoch.getTime()).toBe(0);
    expect(defaults.entropyKind).toBe('simple');
    expect(defaults.entropy).toBeInstanceOf(SimpleEntropySource);
    expect(resolveDefaults({ ULID_ENTROPY: 'monotonic', ULID_LOG_LEVEL: 'info' }).entropy).toBeInstanceOf(
      MonotonicEntropySource
    );
  });

  it('process-wide defaults are resolved once', () => {
    const first = getDefaults();
    expect(getDefaults()).toBe(first);
    expect(getDefaults().entropy).toBe(first.entropy);
  });

  it('process-wide defaults follow the environment', () => {
    const expected = loadEnv().ULID_ENTROPY;
    expect(getDefaults().entropyKind).toBe(expected);
    if (expected === 'crypto') {
      expect(getDefaults().entropy).toBeInstanceOf(CryptoEntropySource);
    }
  });
});

describe('Logger', () => {
  it('is a shared pino instance at the configured level', () => {
    const logger = getLogger();
    expect(getLogger()).toBe(logger);
    expect(logger.level).toBe(loadEnv().ULID_LOG_LEVEL);
  });
});
