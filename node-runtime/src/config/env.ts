import { z } from 'zod';

const envSchema = z.object({
  MACRO_REPLAY_RUNS_DIR: z.string().min(1).default('runs'),
  MACRO_REPLAY_PRESETS_DIR: z.string().min(1).default('workflow_presets'),
  MACRO_REPLAY_DRY_RUN: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Parse an explicit environment without touching the cached process env. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}
