import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

export const DEFAULT_FO_BASE_URL = 'https://finanzonline.bmf.gv.at/fonws/ws';

const booleanString = z
  .string()
  .transform((v) => v === 'true' || v === '1')
  .default('false');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // FinanzOnline
  FO_BASE_URL: z.string().url().default(DEFAULT_FO_BASE_URL),
  FO_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  FO_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  FO_RETRY_BASE_MS: z.coerce.number().int().min(0).default(1_000),
  FO_HERSTELLER_ID: z.string().default('false'),

  // ELDA
  ELDA_MODE: z.enum(['test', 'production']).default('test'),
  ELDA_ENDPOINT: z.string().url().optional(),

  // Firmenbuch
  FB_ENDPOINT: z.string().url().optional(),
  FB_API_KEY: z.string().optional(),
  FB_TEST_MODE: booleanString,

  // Local state
  FO_HOME: z.string().optional(),
  FO_MASTER_PASSWORD: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface Config {
  env: Env['NODE_ENV'];
  logLevel: Env['LOG_LEVEL'];
  finanzOnline: {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    retryBaseMs: number;
    herstellerId: string;
  };
  elda: {
    mode: Env['ELDA_MODE'];
    endpoint?: string;
  };
  firmenbuch: {
    endpoint?: string;
    apiKey?: string;
    testMode: boolean;
  };
  home: string;
  masterPassword?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Invalid environment variables:\n${problems}`);
  }

  const e = result.data;
  return {
    env: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    finanzOnline: {
      baseUrl: e.FO_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: e.FO_TIMEOUT_MS,
      maxRetries: e.FO_MAX_RETRIES,
      retryBaseMs: e.FO_RETRY_BASE_MS,
      herstellerId: e.FO_HERSTELLER_ID,
    },
    elda: {
      mode: e.ELDA_MODE,
      endpoint: e.ELDA_ENDPOINT,
    },
    firmenbuch: {
      endpoint: e.FB_ENDPOINT,
      apiKey: e.FB_API_KEY,
      testMode: e.FB_TEST_MODE,
    },
    home: e.FO_HOME ?? join(homedir(), '.fo'),
    masterPassword: e.FO_MASTER_PASSWORD,
  };
}
