/**
 * Shared Application Configuration
 *
 * Centralizes all environment variable access for the HTTP server, the
 * database pool and the credential vault. Provider-specific settings
 * (timeouts, API bases) live in src/crm/config.ts.
 *
 * Environment variables:
 * - APP_ENV: 'production' disables error details in API responses
 * - PORT: HTTP server port (default 8001)
 * - DATABASE_URL: Required PostgreSQL connection string
 * - DATABASE_POOL_MAX: Max pooled connections (default 10)
 * - CRM_ENCRYPTION_KEY: Required vault key, exactly 32 bytes (see src/vault/key.ts)
 * - OWNER_ID_HEADER: Header carrying the gateway-authenticated owner id
 */

import 'dotenv/config';
import { parseEncryptionKey } from './vault/key.js';

export interface AppConfig {
  isDev: boolean;
  server: {
    port: number;
  };
  database: {
    url: string;
    poolMax: number;
  };
  vault: {
    encryptionKey: Buffer;
  };
  identity: {
    ownerHeader: string;
  };
}

function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';

export const appConfig: AppConfig = {
  isDev,
  server: {
    port: parseInt(optionalEnv('PORT', '8001'), 10),
  },
  database: {
    url: requiredEnv('DATABASE_URL'),
    poolMax: parseInt(optionalEnv('DATABASE_POOL_MAX', '10'), 10),
  },
  vault: {
    encryptionKey: parseEncryptionKey(requiredEnv('CRM_ENCRYPTION_KEY')),
  },
  identity: {
    ownerHeader: optionalEnv('OWNER_ID_HEADER', 'x-owner-id').toLowerCase(),
  },
};
