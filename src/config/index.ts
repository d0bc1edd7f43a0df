import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

export const DEFAULT_PORT = 3000;
export const DEFAULT_BOT_NAME = 'Registry Bot';
export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    LOG_DIR: optionalString,
    CORS_ORIGIN: optionalString,
    STORE_DRIVER: z.enum(['memory', 'supabase']).default('memory'),
    SUPABASE_URL: optionalString.pipe(z.string().url().optional()),
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    BOT_ENGINE: z.enum(['pattern', 'openai']).default('pattern'),
    BOT_NAME: z.string().trim().min(1).default(DEFAULT_BOT_NAME),
    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: z.string().trim().min(1).default(DEFAULT_OPENAI_MODEL),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_DRIVER === 'supabase') {
      if (!env.SUPABASE_URL) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['SUPABASE_URL'],
          message: 'Required when STORE_DRIVER is supabase',
        });
      }
      if (!env.SUPABASE_SERVICE_ROLE_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['SUPABASE_SERVICE_ROLE_KEY'],
          message: 'Required when STORE_DRIVER is supabase',
        });
      }
    }
    if (env.BOT_ENGINE === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'Required when BOT_ENGINE is openai',
      });
    }
  });

export type StoreConfig =
  | { driver: 'memory' }
  | { driver: 'supabase'; url: string; serviceRoleKey: string };

export type BotEngineConfig =
  | { kind: 'pattern'; botName: string }
  | { kind: 'openai'; apiKey: string; model: string; botName: string };

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  logLevel: string;
  logDir?: string;
  corsOrigin?: string;
  store: StoreConfig;
  bot: BotEngineConfig;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }
  const parsed = result.data;

  let store: StoreConfig = { driver: 'memory' };
  if (parsed.STORE_DRIVER === 'supabase' && parsed.SUPABASE_URL && parsed.SUPABASE_SERVICE_ROLE_KEY) {
    store = {
      driver: 'supabase',
      url: parsed.SUPABASE_URL,
      serviceRoleKey: parsed.SUPABASE_SERVICE_ROLE_KEY,
    };
  }

  let bot: BotEngineConfig = { kind: 'pattern', botName: parsed.BOT_NAME };
  if (parsed.BOT_ENGINE === 'openai' && parsed.OPENAI_API_KEY) {
    bot = {
      kind: 'openai',
      apiKey: parsed.OPENAI_API_KEY,
      model: parsed.OPENAI_MODEL,
      botName: parsed.BOT_NAME,
    };
  }

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    logDir: parsed.LOG_DIR,
    corsOrigin: parsed.CORS_ORIGIN,
    store,
    bot,
  };
}
