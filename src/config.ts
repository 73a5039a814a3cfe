/**
 * Application Configuration
 *
 * Everything operational comes from the environment (.env in development).
 * It is parsed and validated once; a bad value stops the server at startup
 * with a message naming the variable.
 */

import dotenv from 'dotenv';
import { isSupportedDigestAlgorithm } from './utils/hash.utils';

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  queryTimeoutMs: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  frontendUrl?: string;
  database: DatabaseConfig;
  jwtSecret: string;
  accessTokenExpireMinutes: number;
  bcryptRounds: number;
  storageRoot: string;
  storageTimeoutMs: number;
  storageWriteRetries: number;
  maxUploadBytes: number;
  allowedMimeTypes: readonly string[];
  digestAlgorithm: string;
  defaultGrantMinutes: number;
  maxGrantMinutes: number;
  downloadTokenMinutes: number;
  expirySweepIntervalMs: number;
}

export class ConfigError extends Error {
  constructor(public readonly variable: string, message: string) {
    super(`Invalid configuration ${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_ALLOWED_MIME_TYPES: readonly string[] = [
  'image/png',
  'image/jpeg',
  'image/tiff',
  'application/dicom',
];

const DEV_JWT_SECRET = 'dev-secret-not-for-production';

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(name, `expected an integer between ${min} and ${max}, got '${raw}'`);
  }
  return value;
}

function readList(env: NodeJS.ProcessEnv, name: string, fallback: readonly string[]): readonly string[] {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const items = raw
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  if (items.length === 0) {
    throw new ConfigError(name, 'expected a comma-separated list');
  }
  return items;
}

/**
 * Build the configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || 'development';
  const isLocal = nodeEnv === 'development' || nodeEnv === 'test';

  const jwtSecret = env.JWT_SECRET || (isLocal ? DEV_JWT_SECRET : '');
  if (!jwtSecret) {
    throw new ConfigError('JWT_SECRET', 'must be set outside development');
  }

  const digestAlgorithm = (env.DIGEST_ALGORITHM || 'sha256').toLowerCase();
  if (!isSupportedDigestAlgorithm(digestAlgorithm)) {
    throw new ConfigError('DIGEST_ALGORITHM', `'${digestAlgorithm}' is not supported by this runtime`);
  }

  const maxGrantMinutes = readInt(env, 'MAX_GRANT_MINUTES', 7 * 24 * 60, 1);
  const defaultGrantMinutes = readInt(env, 'DEFAULT_GRANT_MINUTES', 60, 1, maxGrantMinutes);

  const config: AppConfig = {
    nodeEnv,
    port: readInt(env, 'PORT', 3001, 0, 65535),
    frontendUrl: env.FRONTEND_URL,
    database: {
      connectionString: env.DATABASE_URL || undefined,
      host: env.DB_HOST || 'localhost',
      port: readInt(env, 'DB_PORT', 5432, 1, 65535),
      database: env.DB_NAME || 'medimg',
      user: env.DB_USER || 'postgres',
      password: env.DB_PASSWORD,
      queryTimeoutMs: readInt(env, 'DB_QUERY_TIMEOUT_MS', 5000, 0),
    },
    jwtSecret,
    accessTokenExpireMinutes: readInt(env, 'ACCESS_TOKEN_EXPIRE_MINUTES', 480, 1),
    bcryptRounds: readInt(env, 'BCRYPT_ROUNDS', 12, 4, 15),
    storageRoot: env.STORAGE_ROOT || './storage',
    storageTimeoutMs: readInt(env, 'STORAGE_TIMEOUT_MS', 10000, 0),
    storageWriteRetries: readInt(env, 'STORAGE_WRITE_RETRIES', 2, 0, 10),
    maxUploadBytes: readInt(env, 'MAX_UPLOAD_BYTES', 50 * 1024 * 1024, 1),
    allowedMimeTypes: readList(env, 'ALLOWED_MIME_TYPES', DEFAULT_ALLOWED_MIME_TYPES),
    digestAlgorithm,
    defaultGrantMinutes,
    maxGrantMinutes,
    downloadTokenMinutes: readInt(env, 'DOWNLOAD_TOKEN_MINUTES', 15, 1),
    expirySweepIntervalMs: readInt(env, 'EXPIRY_SWEEP_INTERVAL_MS', 0, 0),
  };

  return Object.freeze(config);
}

/**
 * Load .env into process.env, then parse it
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
