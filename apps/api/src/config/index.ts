/**
 * API Configuration
 * 
 * All configuration loaded from environment variables.
 * Uses sensible defaults for development.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

// Load .env from monorepo root
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

const positiveInt = (fallback: string) =>
  z.string().transform(Number).pipe(z.number().int().positive()).default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: positiveInt('3000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TRUST_PROXY: z.string().transform(v => v === 'true').default('true'),
  CORS_ORIGINS: z.string().default('*'),
  
  // Rate limiting
  RATE_LIMIT_WINDOW_MS: positiveInt('60000'),
  RATE_LIMIT_MAX_REQUESTS: positiveInt('100'),
  
  // Uploads
  MAX_UPLOAD_BYTES: positiveInt(String(100 * 1024 * 1024)),
  MIN_MERGE_FILES: positiveInt('2'),
  MAX_MERGE_FILES: positiveInt('10'),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

export interface UploadLimits {
  maxUploadBytes: number;
  minMergeFiles: number;
  maxMergeFiles: number;
}

const uploads: UploadLimits = {
  maxUploadBytes: env.MAX_UPLOAD_BYTES,
  minMergeFiles: env.MIN_MERGE_FILES,
  maxMergeFiles: env.MAX_MERGE_FILES,
};

export const config = {
  nodeEnv: env.NODE_ENV,
  host: env.API_HOST,
  port: env.API_PORT,
  logLevel: env.LOG_LEVEL,
  trustProxy: env.TRUST_PROXY,
  version: process.env['npm_package_version'] ?? '1.0.0',
  
  // Security
  corsOrigins: env.CORS_ORIGINS === '*'
    ? '*'
    : env.CORS_ORIGINS.split(',').map((s: string) => s.trim()),
  
  // Rate limiting
  rateLimitMax: env.RATE_LIMIT_MAX_REQUESTS,
  rateLimitWindow: `${env.RATE_LIMIT_WINDOW_MS} milliseconds`,
  
  // Uploads
  uploads,
} as const;

export type Config = typeof config;
