import fs from 'fs';
import path from 'path';
import { loadConfig } from './config';
import { ConfigError } from './errors';
import { makeTempDir, removeDir } from './testing';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ HOLIDAYS_FILE: 'does/not/exist.json' });
    expect(config).toMatchObject({
      env: 'development',
      port: 3000,
      logLevel: 'info',
      startingCash: '10000.00',
      timezone: 'America/New_York',
      holidays: [],
      missingPricePolicy: 'skip',
      db: { file: 'data/ledger.db', busyTimeoutMs: 3000, retryAttempts: 2, retryBackoffMs: 50, poolSize: 4 },
      gemini: { model: 'gemini-2.5-flash' },
    });
    expect(config.gemini.apiKey).toBeUndefined();
    expect(config.backfillMinExistingDays).toBeUndefined();
  });

  it('coerces numeric settings', () => {
    const config = loadConfig({ HOLIDAYS: '', PORT: '8080', DB_POOL_SIZE: '1', BACKFILL_MIN_EXISTING_DAYS: '3' });
    expect(config.port).toBe(8080);
    expect(config.db.poolSize).toBe(1);
    expect(config.backfillMinExistingDays).toBe(3);
  });

  it('reads holidays from the inline list first', () => {
    const config = loadConfig({ HOLIDAYS: '2026-01-01, 2026-12-25', HOLIDAYS_FILE: 'does/not/exist.json' });
    expect(config.holidays).toEqual(['2026-01-01', '2026-12-25']);
  });

  it('reads holidays from a JSON file', () => {
    const dir = makeTempDir();
    try {
      const file = path.join(dir, 'holidays.json');
      fs.writeFileSync(file, JSON.stringify(['2026-07-03']));
      expect(loadConfig({ HOLIDAYS_FILE: file }).holidays).toEqual(['2026-07-03']);

      fs.writeFileSync(file, JSON.stringify({ dates: [] }));
      expect(() => loadConfig({ HOLIDAYS_FILE: file })).toThrow(ConfigError);
    } finally {
      removeDir(dir);
    }
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ MISSING_PRICE_POLICY: 'guess' })).toThrow('Invalid configuration: MISSING_PRICE_POLICY');
    expect(() => loadConfig({ HOLIDAYS: '2026-1-1' })).toThrow('HOLIDAYS must be a comma separated list');
    expect(() => loadConfig({ STARTING_CASH: '-5' })).toThrow(ConfigError);
  });

  it('treats a blank API key as absent', () => {
    expect(loadConfig({ HOLIDAYS: '', GEMINI_API_KEY: '  ' }).gemini.apiKey).toBeUndefined();
  });
});
