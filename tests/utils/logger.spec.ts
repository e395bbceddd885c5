import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { logSystemCommand, logThought, scrubSensitiveText } from '../../src/utils/logger.js';

describe('scrubSensitiveText', () => {
  const envName = 'BACKBOARD_API_KEY';
  let previousEnvValue: string | undefined;

  beforeEach(() => {
    previousEnvValue = process.env[envName];
    process.env[envName] = 'env-secret-leak-value-123456789';
  });

  afterEach(() => {
    if (previousEnvValue === undefined) {
      delete process.env[envName];
    } else {
      process.env[envName] = previousEnvValue;
    }
  });

  it('redacts raw sensitive values even when they appear outside key=value patterns', () => {
    const scrubbed = scrubSensitiveText('diagnostic trace => env-secret-leak-value-123456789 <= should be hidden');

    expect(scrubbed).toBe('diagnostic trace => [REDACTED] <= should be hidden');
  });

  it('redacts inline key=value and key: value credentials', () => {
    expect(scrubSensitiveText('retrying with token=abc123 now')).toBe('retrying with token=[REDACTED] now');
    expect(scrubSensitiveText('Authorization: placeholder')).toBe('Authorization: [REDACTED]');
  });

  it('leaves ordinary text untouched', () => {
    expect(scrubSensitiveText('FAULT_DB_TIMEOUT route=/test-fault/db-timeout')).toBe(
      'FAULT_DB_TIMEOUT route=/test-fault/db-timeout',
    );
  });
});

describe('log journal', () => {
  let logDir: string;
  let previousLogDir: string | undefined;

  beforeEach(async () => {
    logDir = await mkdtemp(path.join(os.tmpdir(), 'faultline-logs-'));
    previousLogDir = process.env.LOG_DIR;
    process.env.LOG_DIR = logDir;
  });

  afterEach(async () => {
    if (previousLogDir === undefined) {
      delete process.env.LOG_DIR;
    } else {
      process.env.LOG_DIR = previousLogDir;
    }
    await rm(logDir, { recursive: true, force: true });
  });

  const todayFile = () => path.join(logDir, `${new Date().toISOString().slice(0, 10)}.md`);

  it('appends thought sections to the daily file', async () => {
    await logThought('[Test] first note');
    await logThought('[Test] second note');

    const content = await readFile(todayFile(), 'utf8');
    const sections = content.split('\n## ').filter(Boolean);
    expect(sections).toHaveLength(2);
    expect(sections[0]).toMatch(/^thought @ \S+\n\[Test\] first note\n$/);
    expect(sections[1]).toMatch(/^thought @ \S+\n\[Test\] second note\n$/);
  });

  it('records commands with their exit code', async () => {
    await logSystemCommand('bash scripts/remediation/fix_fault_db_timeout.sh', '[MVP] fix_fault_db_timeout', 0);

    const content = await readFile(todayFile(), 'utf8');
    expect(content).toMatch(
      /## command @ \S+\n\$ bash scripts\/remediation\/fix_fault_db_timeout\.sh\nexit=0\n\[MVP\] fix_fault_db_timeout\n/,
    );
  });
});
