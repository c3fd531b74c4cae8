import * as path from 'path';
import type { StagingSource } from '../types/ingestion';

export interface DatabaseSettings {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
}

export interface Settings {
  port: number;
  database: DatabaseSettings;
  staging: StagingSource;
  /** Lines per staging insert */
  stagingBatchSize: number;
  storageDir: string;
  storageMaxAgeMs: number;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

/**
 * Accepts the literal character, or `tab` / `\t` spelled out (handy in .env files).
 */
export function parseDelimiter(value: string | undefined): string {
  if (value === undefined) return '\t';
  if (value === 'tab' || value === '\\t') return '\t';
  if (value === '') {
    throw new Error('DELIMITER must not be empty');
  }
  return value;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    port: parseInteger(env.PORT, 3001),
    database: {
      host: env.DB_HOST || 'localhost',
      port: parseInteger(env.DB_PORT, 5432),
      database: env.DB_NAME || 'staging',
      user: env.DB_USER || 'postgres',
      password: env.DB_PASSWORD || '',
      max: parseInteger(env.DB_POOL_MAX, 5),
    },
    staging: {
      schema: env.STAGING_SCHEMA || 'public',
      table: env.STAGING_TABLE || 'tsv_rows',
      column: env.STAGING_COLUMN || 'data_row',
      delimiter: parseDelimiter(env.DELIMITER),
    },
    stagingBatchSize: parseInteger(env.STAGING_BATCH_SIZE, 500),
    storageDir: env.STORAGE_DIR || path.join(process.cwd(), 'storage'),
    storageMaxAgeMs: parseInteger(env.STORAGE_MAX_AGE_MS, 3600000), // 1 hour default
  };
}
