import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_LOG_GROUP,
  clearConfigCacheForTests,
  getConfigPath,
  getConfigValue,
  mergeWithDefaults,
  readBooleanConfig,
  readListConfig,
  readNumberConfig,
} from '../../src/config/json-config.js';

describe('faultline.json config layer', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'faultline-config-'));
    configPath = path.join(tempDir, 'faultline.json');
    vi.stubEnv('FAULTLINE_CONFIG_PATH', configPath);
    for (const key of ['API_PORT', 'API_SECRET', 'LOG_GROUPS', 'LOG_ONLY_FAULT_CODES', 'DEDUP_WINDOW_MS', 'BACKBOARD_MODEL_NAME']) {
      vi.stubEnv(key, '');
    }
    clearConfigCacheForTests();
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    clearConfigCacheForTests();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('resolves the config path from FAULTLINE_CONFIG_PATH', () => {
    expect(getConfigPath()).toBe(path.resolve(configPath));
    expect(getConfigPath('other.json')).toBe(path.resolve('other.json'));
  });

  it('falls back to defaults when the file is missing', () => {
    expect(getConfigValue('API_PORT')).toBe('8000');
    expect(getConfigValue('API_SECRET')).toBeUndefined();
    expect(readListConfig('LOG_GROUPS')).toEqual([DEFAULT_LOG_GROUP]);
    expect(readBooleanConfig('LOG_ONLY_FAULT_CODES', false)).toBe(true);
  });

  it('reads structured values from the JSON file', async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({
        runtime: { apiPort: 9100 },
        logs: { groups: ['/aws/lambda/a', '/aws/lambda/b'], onlyFaultCodes: false },
      }),
      'utf8',
    );

    expect(getConfigValue('API_PORT')).toBe('9100');
    expect(readListConfig('LOG_GROUPS')).toEqual(['/aws/lambda/a', '/aws/lambda/b']);
    expect(readBooleanConfig('LOG_ONLY_FAULT_CODES', true)).toBe(false);
    expect(getConfigValue('BACKBOARD_MODEL_NAME')).toBe('gpt-4o');
  });

  it('prefers non-empty environment values over the file', async () => {
    await fs.writeFile(configPath, JSON.stringify({ runtime: { apiPort: 9100 } }), 'utf8');

    vi.stubEnv('API_PORT', '7001');
    expect(getConfigValue('API_PORT')).toBe('7001');

    vi.stubEnv('API_PORT', '   ');
    expect(getConfigValue('API_PORT')).toBe('9100');
  });

  it('uses defaults and reports when the file is malformed', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    await fs.writeFile(configPath, '{ malformed: true ', 'utf8');

    expect(getConfigValue('API_PORT')).toBe('8000');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain('Failed to parse JSON config');
  });

  it('ignores values of the wrong type when merging', () => {
    const merged = mergeWithDefaults({ agent: { dedupWindowMs: 'fast', autoRemediate: 'no' }, logs: 'x' });

    expect(merged.agent.dedupWindowMs).toBe(2000);
    expect(merged.agent.autoRemediate).toBe(true);
    expect(merged.logs.groups).toEqual([DEFAULT_LOG_GROUP]);
  });

  it('returns the fallback for non-numeric numbers', () => {
    vi.stubEnv('DEDUP_WINDOW_MS', 'soon');
    expect(readNumberConfig('DEDUP_WINDOW_MS', 2500)).toBe(2500);

    vi.stubEnv('DEDUP_WINDOW_MS', '750');
    expect(readNumberConfig('DEDUP_WINDOW_MS', 2500)).toBe(750);
  });
});
