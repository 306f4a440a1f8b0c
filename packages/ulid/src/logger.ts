import { pino, type Logger } from 'pino';
import { loadEnv } from './env.js';

let instance: Logger | undefined;

// Never throws: a bad ULID_LOG_LEVEL falls back to info and is reported once.
export function getLogger(): Logger {
  if (!instance) {
    let level = 'info';
    let envError: string | undefined;
    try {
      level = loadEnv().ULID_LOG_LEVEL;
    } catch (err) {
      envError = err instanceof Error ? err.message : String(err);
    }

    instance = pino({
      name: 'ulid',
      level,
      base: null,
      formatters: {
        level(label) {
          return { level: label };
        }
      }
    });

    if (envError !== undefined) {
      instance.warn({ reason: envError }, 'ulid_env_invalid');
    }
  }
  return instance;
}
