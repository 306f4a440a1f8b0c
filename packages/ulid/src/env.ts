import 'dotenv/config';
import { z } from 'zod';

export const ENTROPY_KINDS = ['crypto', 'simple', 'monotonic'] as const;
export type EntropyKind = (typeof ENTROPY_KINDS)[number];

const EnvSchema = z.object({
  ULID_ENTROPY: z.enum(ENTROPY_KINDS).default('crypto'),
  ULID_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid environment:\n${msg}`);
  }
  return parsed.data;
}
