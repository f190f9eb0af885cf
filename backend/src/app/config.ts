/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), so invalid values
 *   ('prod', 'staging') are caught at startup by Zod.
 * - Boolean flags accept only 'true' / 'false' (z.coerce.boolean would read 'false' as true).
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlagSchema = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const OptionalSecretSchema = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : null));

const CorsOriginsSchema = z
  .string()
  .default('http://localhost:5173,http://localhost:3000')
  .transform((v) =>
    v
      .split(',')
      .map((o) => o.trim())
      .filter((o) => o.length > 0),
  );

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),

  DATABASE_URL: z.string().min(1),

  // Managed auth provider
  SUPABASE_URL: z.string().url(),
  SUPABASE_ANON_KEY: z.string().min(1),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),

  // Invite delivery
  EMAIL_PROVIDER_API_KEY: OptionalSecretSchema,
  EMAIL_FROM: z.string().email().default('invites@example.com'),
  INVITE_REDIRECT_URL: z.string().url().default('http://localhost:5173/accept-invite'),

  CORS_ORIGINS: CorsOriginsSchema,

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('brand-portal-api'),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: BooleanFlagSchema,
  SEED_ORG_SLUG: z.string().default('demo-org'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  host: string;

  databaseUrl: string;

  supabase: {
    url: string;
    anonKey: string;
    serviceRoleKey: string;
  };

  email: {
    apiKey: string | null;
    from: string;
  };

  invites: {
    redirectUrl: string;
  };

  corsOrigins: string[];

  logLevel: string;
  serviceName: string;

  seed: {
    enabled: boolean;
    orgSlug: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,

    databaseUrl: parsed.DATABASE_URL,

    supabase: {
      url: parsed.SUPABASE_URL,
      anonKey: parsed.SUPABASE_ANON_KEY,
      serviceRoleKey: parsed.SUPABASE_SERVICE_ROLE_KEY,
    },

    email: {
      apiKey: parsed.EMAIL_PROVIDER_API_KEY,
      from: parsed.EMAIL_FROM,
    },

    invites: {
      redirectUrl: parsed.INVITE_REDIRECT_URL,
    },

    corsOrigins: parsed.CORS_ORIGINS,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    seed: {
      enabled: parsed.SEED_ON_START,
      orgSlug: parsed.SEED_ORG_SLUG,
    },
  };
}
