import dotenv from 'dotenv';
import { z } from 'zod';

const isTestRuntime =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

if (!isTestRuntime) {
  dotenv.config();
}

const testDefaults: Record<string, string> = {
  NODE_ENV: 'test',
  LOG_LEVEL: 'error',
  ENSEMBLE_CONFIG_PATH: 'config/agents.example.json',
  ENSEMBLE_MAX_CONCURRENT_REQUESTS: '0',
  // Keep backoff short so retry paths stay fast under test.
  ENSEMBLE_RETRY_BASE_DELAY_MS: '1',
};

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .default('info'),
  ENSEMBLE_CONFIG_PATH: z.string().trim().min(1).default('config/agents.json'),
  // 0 leaves request admission to the HTTP layer.
  ENSEMBLE_MAX_CONCURRENT_REQUESTS: z.coerce.number().int().min(0).max(1000).default(0),
  ENSEMBLE_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(1).max(60_000).default(500),
});

export type EnvSettings = z.output<typeof envSchema>;

/**
 * Validate an environment map. Blank values count as unset so an empty line in `.env`
 * falls back to the default.
 */
export function parseEnv(
  source: Record<string, string | undefined>,
): { ok: true; settings: EnvSettings } | { ok: false; issues: string[] } {
  const present = Object.fromEntries(
    Object.entries(source).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }
  return { ok: true, settings: parsed.data };
}

const result = parseEnv({
  ...(isTestRuntime ? testDefaults : {}),
  ...process.env,
});

if (!result.ok) {
  console.error(`Invalid environment configuration:\n  ${result.issues.join('\n  ')}`);
  process.exit(1);
}

export const config = {
  ...result.settings,
  isTest: result.settings.NODE_ENV === 'test',
};

export type AppConfig = typeof config;
