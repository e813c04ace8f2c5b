import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { hasEnvVar, loadLineageConfigFromEnv, validateEnv } from '../env.js';

describe('validateEnv', () => {
  it('should apply defaults for runtime variables', () => {
    const env = validateEnv({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.LOG_LEVEL).toBe('info');
  });

  it('should reject malformed flags', () => {
    try {
      validateEnv({ LINEAGE_RATE_LIMIT: 'yes' });
      expect.fail('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/^LINEAGE_RATE_LIMIT: /);
    }
  });
});

describe('loadLineageConfigFromEnv', () => {
  it('should map LINEAGE_* variables onto the configuration', () => {
    const config = loadLineageConfigFromEnv({
      LINEAGE_START_TIME: '2024-01-01T00:00:00Z',
      LINEAGE_END_TIME: '2024-01-02T00:00:00Z',
      LINEAGE_RATE_LIMIT: 'true',
      LINEAGE_REQUESTS_PER_MIN: '30',
      LINEAGE_USE_EXPORTED_AUDIT_METADATA: 'true',
      LINEAGE_AUDIT_METADATA_DATASETS: 'p.audit_a, p.audit_b',
      LINEAGE_TEMP_TABLE_PATTERNS: '^tmp_,^stage_',
      LINEAGE_DATASET_DENY: 'scratch',
      LINEAGE_PLATFORM_INSTANCE: 'eu',
      LINEAGE_ENV: 'DEV',
    });

    expect(config.startTime.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(config.endTime.toISOString()).toBe('2024-01-02T00:00:00.000Z');
    expect(config.rateLimit).toBe(true);
    expect(config.requestsPerMin).toBe(30);
    expect(config.useExportedAuditMetadata).toBe(true);
    expect(config.auditMetadataDatasets).toEqual(['p.audit_a', 'p.audit_b']);
    expect(config.tempTablePatterns).toEqual(['^tmp_', '^stage_']);
    expect(config.datasetPattern).toEqual({ allow: ['.*'], deny: ['scratch'], ignoreCase: true });
    expect(config.platformInstance).toBe('eu');
    expect(config.env).toBe('DEV');
  });

  it('should fall back to defaults for unset variables', () => {
    const config = loadLineageConfigFromEnv({});

    expect(config.rateLimit).toBe(false);
    expect(config.requestsPerMin).toBe(60);
    expect(config.tempTableDatasetPrefix).toBe('_');
  });

  it('should reject numbers that do not parse', () => {
    expect(() => loadLineageConfigFromEnv({ LINEAGE_REQUESTS_PER_MIN: 'many' })).toThrow(ConfigurationError);
  });

  it('should reject dates that do not parse', () => {
    expect(() => loadLineageConfigFromEnv({ LINEAGE_END_TIME: 'yesterday' })).toThrow(ConfigurationError);
  });
});

describe('hasEnvVar', () => {
  it('should treat empty values as unset', () => {
    expect(hasEnvVar('LINEAGE_ENV', { LINEAGE_ENV: '' })).toBe(false);
    expect(hasEnvVar('LINEAGE_ENV', { LINEAGE_ENV: 'PROD' })).toBe(true);
    expect(hasEnvVar('LINEAGE_ENV', {})).toBe(false);
  });
});
