import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

import { BackboardClient, resolveBackboardConfig } from '../../src/services/evidence-retriever.js';
import {
  SEED_INCIDENTS,
  buildSeedDocument,
  seedFilename,
  seedKnowledgeBase,
  type SeedIncident,
} from '../../src/services/knowledge-base.js';
import { FAULT_CODES } from '../../src/types/incident.js';
import { logThought } from '../../src/utils/logger.js';

const ENTRY: SeedIncident = {
  key: 'KB-DB-101',
  errorCode: 'FAULT_DB_TIMEOUT',
  symptoms: 'pool exhausted',
  breadcrumbs: ['pg_sleep_executed', 'queue_pool_limit'],
  rootCause: 'long queries',
  remediation: 'statement timeout',
  verification: 'replayed',
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function client(): BackboardClient {
  return new BackboardClient(resolveBackboardConfig({
    apiKey: 'test-secret',
    baseUrl: 'https://evidence.test/api',
    assistantId: 'asst-1',
    threadId: null,
    retry: { maxAttempts: 2, baseDelayMs: 0 },
  }));
}

describe('seed entries', () => {
  it('covers every fault code with unique keys', () => {
    for (const code of FAULT_CODES) {
      expect(SEED_INCIDENTS.filter((entry) => entry.errorCode === code).length).toBeGreaterThanOrEqual(3);
    }
    expect(new Set(SEED_INCIDENTS.map((entry) => entry.key)).size).toBe(SEED_INCIDENTS.length);
  });

  it('renders an entry as a resolved incident document', () => {
    expect(seedFilename(ENTRY)).toBe('kb-db-101.txt');
    expect(buildSeedDocument(ENTRY)).toBe([
      'IncidentID: KB-DB-101',
      'ErrorCode: FAULT_DB_TIMEOUT',
      'Symptoms: pool exhausted',
      'Breadcrumbs: ["pg_sleep_executed","queue_pool_limit"]',
      'RootCause: long queries',
      'Remediation: statement timeout',
      'Verification: replayed',
      'Resolved: true',
      '',
    ].join('\n'));
  });
});

describe('seedKnowledgeBase', () => {
  let fetchMock: ReturnType<typeof vi.fn<typeof fetch>>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
    vi.mocked(logThought).mockClear();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('uploads each entry as a text file to the assistant', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ document_id: 'doc-1' }))
      .mockResolvedValueOnce(jsonResponse({ document_id: 'doc-2' }));
    const second: SeedIncident = { ...ENTRY, key: 'KB-DB-102' };

    const summary = await seedKnowledgeBase(client(), 'asst-1', { entries: [ENTRY, second], delayMs: 0 });

    expect(summary).toEqual({
      uploaded: 2,
      failed: 0,
      results: [
        { filename: 'kb-db-101.txt', documentId: 'doc-1' },
        { filename: 'kb-db-102.txt', documentId: 'doc-2' },
      ],
    });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://evidence.test/api/assistants/asst-1/documents');
    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) return;
    const file = body.get('file');
    expect(file).toBeInstanceOf(Blob);
    if (!(file instanceof File)) return;
    expect(file.name).toBe('kb-db-101.txt');
    expect(await file.text()).toBe(buildSeedDocument(ENTRY));
  });

  it('records a failed upload and carries on with the rest', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ detail: 'too large' }, 413))
      .mockResolvedValueOnce(jsonResponse({ document_id: 'doc-2' }));
    const second: SeedIncident = { ...ENTRY, key: 'KB-DB-102' };

    const summary = await seedKnowledgeBase(client(), 'asst-1', { entries: [ENTRY, second], delayMs: 0 });

    expect(summary).toEqual({
      uploaded: 1,
      failed: 1,
      results: [
        {
          filename: 'kb-db-101.txt',
          documentId: null,
          error: 'Backboard POST /assistants/asst-1/documents returned HTTP 413.',
        },
        { filename: 'kb-db-102.txt', documentId: 'doc-2' },
      ],
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(logThought).toHaveBeenCalledWith(
      '[KnowledgeBase] [1/2] Failed to upload kb-db-101.txt: Backboard POST /assistants/asst-1/documents returned HTTP 413.',
    );
  });

  it('uploads the built-in entries by default', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ document_id: 'doc' }));

    const summary = await seedKnowledgeBase(client(), 'asst-1', { delayMs: 0 });

    expect(summary.uploaded).toBe(SEED_INCIDENTS.length);
    expect(summary.failed).toBe(0);
    expect(fetchMock).toHaveBeenCalledTimes(SEED_INCIDENTS.length);
  });
});
