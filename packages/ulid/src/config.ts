import { EPOCH_MS } from './binary.js';
import { createEntropySource, type EntropySource } from './entropy.js';
import { loadEnv, type Env, type EntropyKind } from './env.js';
import { getLogger } from './logger.js';

export interface UlidDefaults {
  readonly epoch: Date;
  readonly entropyKind: EntropyKind;
  readonly entropy: EntropySource;
}

export function resolveDefaults(env: Env): UlidDefaults {
  return Object.freeze({
    epoch: new Date(EPOCH_MS),
    entropyKind: env.ULID_ENTROPY,
    entropy: createEntropySource(env.ULID_ENTROPY)
  });
}

let defaults: UlidDefaults | undefined;

/**
 * Process-wide defaults, resolved from the environment on first use and never
 * replaced afterwards.
 */
export function getDefaults(): UlidDefaults {
  if (!defaults) {
    defaults = resolveDefaults(loadEnv());
    getLogger().info({ config: { entropy: defaults.entropyKind, epoch: defaults.epoch.toISOString() } }, 'ulid_config');
  }
  return defaults;
}
