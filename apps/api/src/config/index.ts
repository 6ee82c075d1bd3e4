/**
 * API Configuration
 *
 * All configuration loaded from environment variables.
 * Uses sensible defaults for development.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { setLogLevel } from '@contacts-hub/utils';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

// Load .env from monorepo root
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

// Helper to resolve relative paths from monorepo root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(monorepoRoot, p);
  }
  return p;
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.string().transform(Number).default('3000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TRUST_PROXY: z.string().transform(v => v === 'true').default('true'),

  // Database (file path, or :memory:)
  DATABASE_URL: z.string().default('./data/contacts.db'),

  // Security
  JWT_SECRET: z.string().min(32).default('replace-with-a-long-random-jwt-secret-value'),
  JWT_ACCESS_EXPIRES_IN: z.string().default('15m'),
  JWT_REFRESH_EXPIRES_IN: z.string().default('7d'),
  BCRYPT_ROUNDS: z.string().transform(Number).pipe(z.number().int().min(4).max(15)).default('10'),
  CORS_ORIGINS: z.string().default('http://localhost:3000,http://localhost:3001'),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.string().transform(Number).default('60000'),
  RATE_LIMIT_MAX_REQUESTS: z.string().transform(Number).default('100'),

  // Features
  ENABLE_SWAGGER: z.string().transform(v => v !== 'false').default('true'),

  // Initial admin account (scripts/seed.ts)
  ADMIN_USERNAME: z.string().default('admin'),
  ADMIN_EMAIL: z.string().email().default('admin@contacts.local'),
  ADMIN_PASSWORD: z.string().min(6).default('changeme'),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

export const config = {
  nodeEnv: env.NODE_ENV,
  host: env.API_HOST,
  port: env.API_PORT,
  logLevel: env.LOG_LEVEL,
  trustProxy: env.TRUST_PROXY,

  database: {
    url: resolvePath(env.DATABASE_URL),
  },

  // JWT
  jwtSecret: env.JWT_SECRET,
  accessTokenExpiresIn: env.JWT_ACCESS_EXPIRES_IN,
  refreshTokenExpiresIn: env.JWT_REFRESH_EXPIRES_IN,

  // Security
  bcryptRounds: env.BCRYPT_ROUNDS,
  corsOrigins: env.CORS_ORIGINS.split(',').map((s: string) => s.trim()),

  // Rate limiting
  rateLimitMax: env.RATE_LIMIT_MAX_REQUESTS,
  rateLimitWindow: `${env.RATE_LIMIT_WINDOW_MS} milliseconds`,

  // Features
  enableSwagger: env.ENABLE_SWAGGER,

  // Admin
  adminUsername: env.ADMIN_USERNAME,
  adminEmail: env.ADMIN_EMAIL,
  adminPassword: env.ADMIN_PASSWORD,
} as const;

export type Config = typeof config;

// Package loggers are built on import, before .env is read
setLogLevel(config.logLevel);
