import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CONFIG_SCHEMA } from '../../src/config/env-schema.js';
import { assertRuntimeConfig, validateRuntimeConfig } from '../../src/config/env-validator.js';
import { clearConfigCacheForTests } from '../../src/config/json-config.js';

describe('CONFIG_SCHEMA', () => {
  it('contains unique key entries', () => {
    const keys = CONFIG_SCHEMA.map((s) => s.key);
    expect(keys.length).toBe(new Set(keys).size);
  });

  it('gives every conditional entry a condition and an activating key', () => {
    const incomplete = CONFIG_SCHEMA.filter(
      (s) => s.class === 'conditional' && (!s.condition || !s.activatedBy),
    );
    expect(incomplete).toHaveLength(0);
  });

  it('all entries have non-empty description and remediation', () => {
    for (const spec of CONFIG_SCHEMA) {
      expect(spec.description.trim(), `description for ${spec.key}`).not.toBe('');
      expect(spec.remediation.trim(), `remediation for ${spec.key}`).not.toBe('');
    }
  });
});

describe('validateRuntimeConfig', () => {
  beforeEach(() => {
    vi.stubEnv('FAULTLINE_CONFIG_PATH', '/tmp/faultline-validator-test-config-does-not-exist.json');
    for (const spec of CONFIG_SCHEMA) {
      vi.stubEnv(spec.key, '');
    }
    clearConfigCacheForTests();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    clearConfigCacheForTests();
  });

  it('reports missing_required when API_SECRET is absent', () => {
    const result = validateRuntimeConfig();

    expect(result.ok).toBe(false);
    expect(result.fatalIssues).toHaveLength(1);
    expect(result.fatalIssues[0]?.key).toBe('API_SECRET');
    expect(result.fatalIssues[0]?.class).toBe('missing_required');
  });

  it('passes when API_SECRET is present and nothing is half-configured', () => {
    vi.stubEnv('API_SECRET', 'test-secret');

    const result = validateRuntimeConfig(() => new Date('2026-03-01T10:00:00.000Z'));

    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.presentKeys).toContain('API_SECRET');
    expect(result.activeFeatures).toEqual([]);
    expect(result.validatedAt).toBe('2026-03-01T10:00:00.000Z');
  });

  it('flags the missing half of a partially configured feature', () => {
    vi.stubEnv('API_SECRET', 'test-secret');
    vi.stubEnv('GITHUB_TOKEN', 'test-token');

    const result = validateRuntimeConfig();

    expect(result.ok).toBe(true);
    expect(result.activeFeatures).toEqual(['source_control:github']);
    expect(result.issues.map((issue) => [issue.key, issue.class])).toEqual([
      ['GITHUB_REPO', 'missing_conditional'],
    ]);
  });

  it('requires the assistant id once an evidence key is set', () => {
    vi.stubEnv('API_SECRET', 'test-secret');
    vi.stubEnv('BACKBOARD_API_KEY', 'test-key');

    const result = validateRuntimeConfig();

    expect(result.issues.map((issue) => issue.key)).toEqual(['BACKBOARD_ASSISTANT_ID']);
    expect(result.activeFeatures).toEqual(['evidence:backboard']);
  });

  it('reports out-of-range numbers as format errors', () => {
    vi.stubEnv('API_SECRET', 'test-secret');
    vi.stubEnv('API_PORT', '99999');

    const result = validateRuntimeConfig();

    expect(result.ok).toBe(false);
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]?.class).toBe('format_error');
    expect(result.issues[0]?.message).toBe("API_PORT must be an integer in range 1–65535, got '99999'.");
  });

  it('never includes values in the report', () => {
    vi.stubEnv('API_SECRET', 'test-secret-value');

    expect(JSON.stringify(validateRuntimeConfig())).not.toContain('test-secret-value');
  });
});

describe('assertRuntimeConfig', () => {
  beforeEach(() => {
    vi.stubEnv('FAULTLINE_CONFIG_PATH', '/tmp/faultline-validator-test-config-does-not-exist.json');
    for (const spec of CONFIG_SCHEMA) {
      vi.stubEnv(spec.key, '');
    }
    clearConfigCacheForTests();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    clearConfigCacheForTests();
  });

  it('throws when a required key is missing', () => {
    expect(() => assertRuntimeConfig()).toThrow(/^Runtime config validation failed: Required config key 'API_SECRET' is missing\./);
  });

  it('returns the report when required keys are set', () => {
    vi.stubEnv('API_SECRET', 'test-secret');
    expect(assertRuntimeConfig().ok).toBe(true);
  });
});
