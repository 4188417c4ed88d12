import dotenv from 'dotenv';
import { strict as assert } from 'assert';
import { isHashEncoding, type HashEncoding } from './core/encoding';

dotenv.config();

export type StorageBackend = 'ipfs' | 'memory';

export interface ProvenanceConfig {
  port: number;
  nodeEnv: string;
  storageBackend: StorageBackend;
  ipfsApiUrl: string;
  ipfsProjectId?: string;
  ipfsProjectSecret?: string;
  ipfsTimeoutMs: number;
  ipfsRetryAttempts: number;
  ipfsRetryDelayMs: number;
  hashEncoding: HashEncoding;
  jsonBodyLimit: string;
}

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  assert(!Number.isNaN(parsed), `${name} must be a number`);
  return parsed;
}

function envOptional(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function resolveStorageBackend(nodeEnv: string): StorageBackend {
  const raw = process.env.STORAGE_BACKEND?.trim().toLowerCase() || 'ipfs';

  if (raw !== 'ipfs' && raw !== 'memory') {
    throw new Error('STORAGE_BACKEND must be one of: ipfs, memory');
  }

  if (nodeEnv === 'production' && raw === 'memory') {
    throw new Error('STORAGE_BACKEND=memory is not allowed when NODE_ENV=production');
  }

  return raw;
}

function resolveHashEncoding(): HashEncoding {
  const raw = process.env.HASH_ENCODING?.trim().toLowerCase() || 'legacy-delimited';
  if (!isHashEncoding(raw)) {
    throw new Error('HASH_ENCODING must be one of: legacy-delimited, length-prefixed');
  }
  return raw;
}

export function loadConfig(): ProvenanceConfig {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const storageBackend = resolveStorageBackend(nodeEnv);
  const ipfsProjectId = envOptional('IPFS_PROJECT_ID');
  const ipfsProjectSecret = envOptional('IPFS_PROJECT_SECRET');

  assert(
    Boolean(ipfsProjectId) === Boolean(ipfsProjectSecret),
    'IPFS_PROJECT_ID and IPFS_PROJECT_SECRET must be set together'
  );

  const config: ProvenanceConfig = {
    port: envNumber('PORT', 3000),
    nodeEnv,
    storageBackend,
    ipfsApiUrl: envOptional('IPFS_API_URL') ?? 'http://127.0.0.1:5001',
    ipfsProjectId,
    ipfsProjectSecret,
    ipfsTimeoutMs: envNumber('IPFS_TIMEOUT_MS', 10000),
    ipfsRetryAttempts: envNumber('IPFS_RETRY_ATTEMPTS', 3),
    ipfsRetryDelayMs: envNumber('IPFS_RETRY_DELAY_MS', 500),
    hashEncoding: resolveHashEncoding(),
    jsonBodyLimit: envOptional('JSON_BODY_LIMIT') ?? '1mb',
  };

  assert(config.port > 0, 'PORT must be > 0');
  assert(
    config.ipfsTimeoutMs >= 1000 && config.ipfsTimeoutMs <= 60000,
    'IPFS_TIMEOUT_MS must be between 1000 and 60000'
  );
  assert(config.ipfsRetryAttempts >= 1, 'IPFS_RETRY_ATTEMPTS must be >= 1');
  assert(config.ipfsRetryDelayMs >= 0, 'IPFS_RETRY_DELAY_MS must be >= 0');

  if (storageBackend === 'ipfs') {
    assert(/^https?:\/\//.test(config.ipfsApiUrl), 'IPFS_API_URL must be an http(s) URL');
  }

  return config;
}
