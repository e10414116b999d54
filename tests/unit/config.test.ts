import { describe, it, expect } from 'vitest';
import { parseConfig } from '../../src/config.js';
import { ConfigurationError } from '../../src/utils/errors.js';

describe('parseConfig', () => {
  it('should apply defaults', () => {
    const config = parseConfig({ GURU_API_KEY: 'test-secret' });

    expect(config.guru).toEqual({
      apiKey: 'test-secret',
      baseUrl: 'https://digitalmanager.guru/api/v2',
      maxConcurrency: 4,
      qps: 3,
      pageRetries: 2,
      fetchAttempts: 3,
      timeoutMs: 15000,
      backoffBaseMs: 1000,
      collectionFloor: '2024-10-01',
    });
    expect(config.data).toEqual({ catalogPath: 'data/catalog.json', rulesPath: 'data/rules.json' });
    expect(config.planilhas).toEqual({ dir: 'var/planilhas', timeZone: 'America/Sao_Paulo' });
    expect(config.api).toEqual({ port: 3000, host: '0.0.0.0' });
  });

  it('should coerce numeric variables and ignore empty ones', () => {
    const config = parseConfig({
      GURU_API_KEY: 'test-secret',
      GURU_QPS: '1.5',
      GURU_MAX_CONCURRENCY: '',
      API_PORT: '8080',
    });

    expect(config.guru.qps).toBe(1.5);
    expect(config.guru.maxConcurrency).toBe(4);
    expect(config.api.port).toBe(8080);
  });

  it('should require the Guru token', () => {
    expect(() => parseConfig({})).toThrow(ConfigurationError);
    expect(() => parseConfig({})).toThrow('GURU_API_KEY is required');
  });

  it('should reject invalid values', () => {
    expect(() => parseConfig({ GURU_API_KEY: 'test-secret', GURU_COLLECTION_FLOOR: '2024-13-01' })).toThrow(
      'GURU_COLLECTION_FLOOR must be YYYY-MM-DD'
    );
    expect(() => parseConfig({ GURU_API_KEY: 'test-secret', GURU_QPS: '0' })).toThrow(ConfigurationError);
    expect(() => parseConfig({ GURU_API_KEY: 'test-secret', API_PORT: '70000' })).toThrow(ConfigurationError);
  });
});
