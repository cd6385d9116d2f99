/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - Hashing defaults come from here and are passed explicitly to the hasher;
 *   nothing in the engine reads process.env.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';

import { DEFAULT_HASHING_PARAMS, MAX_ITERATIONS } from '../shared/security/pbkdf2';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('pbkdf2-record-service'),

  // Hashing defaults (per-record values always win on verify)
  PBKDF2_ITERATIONS: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_ITERATIONS)
    .default(DEFAULT_HASHING_PARAMS.iterations),
  PBKDF2_SALT_BYTES: z.coerce.number().int().min(1).max(1024).default(DEFAULT_HASHING_PARAMS.saltBytes),
  PBKDF2_HASH_BYTES: z.coerce.number().int().min(1).max(1024).default(DEFAULT_HASHING_PARAMS.hashBytes),

  // Upper bound for client-chosen iteration counts on POST /hashes
  HASH_MAX_REQUEST_ITERATIONS: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_ITERATIONS)
    .default(1_000_000),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  logLevel: string;
  serviceName: string;

  hashing: {
    iterations: number;
    saltBytes: number;
    hashBytes: number;
    maxRequestIterations: number;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    hashing: {
      iterations: parsed.PBKDF2_ITERATIONS,
      saltBytes: parsed.PBKDF2_SALT_BYTES,
      hashBytes: parsed.PBKDF2_HASH_BYTES,
      maxRequestIterations: parsed.HASH_MAX_REQUEST_ITERATIONS,
    },
  };
}
