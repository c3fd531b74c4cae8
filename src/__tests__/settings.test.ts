import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { loadSettings, parseDelimiter } from '../config/settings';

describe('loadSettings', () => {
  it('falls back to defaults for an empty environment', () => {
    const settings = loadSettings({});

    expect(settings.port).toBe(3001);
    expect(settings.staging).toEqual({ schema: 'public', table: 'tsv_rows', column: 'data_row', delimiter: '\t' });
    expect(settings.database.port).toBe(5432);
    expect(settings.database.max).toBe(5);
    expect(settings.stagingBatchSize).toBe(500);
    expect(settings.storageDir).toBe(path.join(process.cwd(), 'storage'));
    expect(settings.storageMaxAgeMs).toBe(3600000);
  });

  it('reads overrides from the environment', () => {
    const settings = loadSettings({
      PORT: '8080',
      DB_HOST: 'db.internal',
      DB_PASSWORD: 'test-secret',
      STAGING_SCHEMA: 'landing',
      STAGING_TABLE: 'raw_lines',
      STAGING_COLUMN: 'line',
      DELIMITER: ',',
      STAGING_BATCH_SIZE: '50',
    });

    expect(settings.port).toBe(8080);
    expect(settings.database.host).toBe('db.internal');
    expect(settings.database.password).toBe('test-secret');
    expect(settings.staging).toEqual({ schema: 'landing', table: 'raw_lines', column: 'line', delimiter: ',' });
    expect(settings.stagingBatchSize).toBe(50);
  });

  it('ignores numbers that do not parse', () => {
    const settings = loadSettings({ PORT: 'abc', DB_POOL_MAX: '-2' });

    expect(settings.port).toBe(3001);
    expect(settings.database.max).toBe(5);
  });
});

describe('parseDelimiter', () => {
  it('spells tab out', () => {
    expect(parseDelimiter(undefined)).toBe('\t');
    expect(parseDelimiter('tab')).toBe('\t');
    expect(parseDelimiter('\\t')).toBe('\t');
    expect(parseDelimiter('|')).toBe('|');
  });

  it('rejects an empty delimiter', () => {
    expect(() => parseDelimiter('')).toThrow('DELIMITER must not be empty');
  });
});
