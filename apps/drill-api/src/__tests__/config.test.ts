import { describe, it, expect } from 'vitest';
import { loadConfig, resolveCorsOrigins } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      production: false,
      port: 8080,
      host: '0.0.0.0',
      logLevel: 'info',
      rateLimitMax: 100,
      rateLimitWindow: 60_000,
      corsOrigins: ['http://localhost:3000'],
      cacheCapacity: 1000,
      heroPlayerId: 1,
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({
      DRILL_API_PORT: '9090',
      RATE_LIMIT_MAX: '5',
      DRILL_CACHE_CAPACITY: '10',
      DRILL_HERO_PLAYER_ID: '77',
      LOG_LEVEL: 'debug',
    });
    expect(config.port).toBe(9090);
    expect(config.rateLimitMax).toBe(5);
    expect(config.cacheCapacity).toBe(10);
    expect(config.heroPlayerId).toBe(77);
    expect(config.logLevel).toBe('debug');
  });

  it('rejects a port out of range', () => {
    expect(() => loadConfig({ DRILL_API_PORT: '70000' })).toThrow(/Invalid drill API environment: DRILL_API_PORT/);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });

  it('prefers ALLOWED_ORIGINS over CORS_ORIGINS', () => {
    const config = loadConfig({ ALLOWED_ORIGINS: 'https://a.test', CORS_ORIGINS: 'https://b.test' });
    expect(config.corsOrigins).toEqual(['https://a.test']);
  });

  it('requires explicit origins in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(/must be set in production/);
    const config = loadConfig({ NODE_ENV: 'production', CORS_ORIGINS: 'https://drills.test' });
    expect(config.production).toBe(true);
    expect(config.corsOrigins).toEqual(['https://drills.test']);
  });
});

describe('resolveCorsOrigins', () => {
  it('splits, trims and drops empty entries', () => {
    expect(resolveCorsOrigins(' https://a.test , ,https://b.test,', false)).toEqual(['https://a.test', 'https://b.test']);
  });

  it('refuses a wildcard in production', () => {
    expect(() => resolveCorsOrigins('https://a.test,*', true)).toThrow(/wildcard/);
  });

  it('allows a wildcard outside production', () => {
    expect(resolveCorsOrigins('*', false)).toEqual(['*']);
  });
});
