import { describe, expect, it } from 'vitest';
import { cfg, configSchema } from '../src/utils/config.js';

describe('Configuration System', () => {
  it('loads the test environment', () => {
    expect(cfg.NODE_ENV).toBe('test'); // vitest sets NODE_ENV
    expect(typeof cfg.DATABASE_URI).toBe('string');
  });

  it('fills defaults for every key', () => {
    expect(configSchema.parse({})).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      LOG_LEVEL: 'info',
      DATABASE_URI: './data/planboard.db',
      DB_VERBOSE: false,
      MEDIA_ROOT: './data',
    });
  });

  it('coerces values read from the environment', () => {
    const parsed = configSchema.parse({ PORT: '8080', DB_VERBOSE: 'false' });

    expect(parsed.PORT).toBe(8080);
    expect(parsed.DB_VERBOSE).toBe(false);
    expect(configSchema.parse({ DB_VERBOSE: '1' }).DB_VERBOSE).toBe(true);
  });

  it('rejects out-of-range ports and unknown levels', () => {
    expect(configSchema.safeParse({ PORT: '70000' }).success).toBe(false);
    expect(configSchema.safeParse({ LOG_LEVEL: 'verbose' }).success).toBe(false);
  });
});
