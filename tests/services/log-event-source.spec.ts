import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

import { JsonlLogEventSource } from '../../src/services/log-event-source.js';
import { logThought } from '../../src/utils/logger.js';

const GROUP = '/aws/lambda/FaultRouter';
const NOW = Date.UTC(2026, 1, 1, 12, 0, 0);

describe('JsonlLogEventSource', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'faultline-events-'));
    file = path.join(dir, 'events.jsonl');
    vi.mocked(logThought).mockClear();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns recent events of the requested groups, newest first', async () => {
    const lines = [
      JSON.stringify({ logGroup: GROUP, timestamp: NOW - 120_000, message: 'two' }),
      JSON.stringify({ logGroup: GROUP, logStream: 's1', timestamp: NOW - 60_000, message: 'one\n' }),
      JSON.stringify({ logGroup: '/other', logStream: 's1', timestamp: NOW - 1_000, message: 'elsewhere' }),
      JSON.stringify({ logGroup: GROUP, logStream: 's1', timestamp: NOW - 11 * 60_000, message: 'too old' }),
      'not json',
      JSON.stringify({ logGroup: GROUP, timestamp: 'yesterday', message: 'bad timestamp' }),
      JSON.stringify({ logGroup: GROUP, timestamp: NOW, message: '' }),
      '',
    ];
    await writeFile(file, lines.join('\n'));
    const source = new JsonlLogEventSource(file, { now: () => NOW });

    const events = await source.fetchRecent({ logGroups: [GROUP], lookbackMinutes: 10 });

    expect(events).toEqual([
      { logGroup: GROUP, logStream: 's1', timestamp: NOW - 60_000, message: 'one' },
      { logGroup: GROUP, logStream: '', timestamp: NOW - 120_000, message: 'two' },
    ]);
    expect(logThought).toHaveBeenCalledTimes(1);
  });

  it('yields nothing when the file does not exist', async () => {
    const source = new JsonlLogEventSource(path.join(dir, 'missing.jsonl'));

    await expect(source.fetchRecent({ logGroups: [GROUP], lookbackMinutes: 10 })).resolves.toEqual([]);
  });

  it('yields nothing when no groups are requested', async () => {
    await writeFile(file, JSON.stringify({ logGroup: GROUP, timestamp: NOW, message: 'x' }));
    const source = new JsonlLogEventSource(file, { now: () => NOW });

    await expect(source.fetchRecent({ logGroups: [], lookbackMinutes: 10 })).resolves.toEqual([]);
  });
});
