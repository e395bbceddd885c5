import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  logSystemCommand: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (text: string) => text,
}));

import { ActionExecutor } from '../../src/services/action-executor.js';
import { AutofixPipeline } from '../../src/services/autofix-pipeline.js';
import { openDatabase, type IncidentDatabase } from '../../src/services/db.js';
import type { EvidenceRetriever } from '../../src/services/evidence-retriever.js';
import { FaultDedupGate } from '../../src/services/fault-dedup.js';
import { IncidentBroadcaster } from '../../src/services/incident-broadcaster.js';
import { IncidentLifecycle } from '../../src/services/incident-lifecycle.js';
import { IncidentStore } from '../../src/services/incident-store.js';
import { PLAYBOOKS } from '../../src/services/playbooks.js';
import type { EvidenceResult } from '../../src/types/incident.js';
import { RecordingPublisher } from '../helpers/recording-publisher.js';

const DB_TIMEOUT_LINE = 'FAULT_DB_TIMEOUT route=/test-fault/db-timeout reason=db_timeout latency=5.01';

function stubRetriever(content: string): EvidenceRetriever {
  return {
    queryIncident: async (): Promise<EvidenceResult> => ({ content, retrievedMemories: [], retrievedFiles: [] }),
    indexIncident: async () => null,
  };
}

describe('AutofixPipeline', () => {
  let db: IncidentDatabase;
  let store: IncidentStore;
  let publisher: RecordingPublisher;
  let enabled: boolean;
  let clock: number;

  function buildPipeline(evidence = ''): AutofixPipeline {
    return new AutofixPipeline({
      lifecycle: new IncidentLifecycle({ store, retriever: stubRetriever(evidence) }),
      executor: new ActionExecutor({ projectRoot: process.cwd() }),
      gate: new FaultDedupGate({ windowMs: 2_000, now: () => clock }),
      broadcaster: new IncidentBroadcaster(publisher),
      isEnabled: () => enabled,
    });
  }

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new IncidentStore(db);
    publisher = new RecordingPublisher();
    enabled = true;
    clock = 0;
  });

  afterEach(() => {
    db.close();
  });

  it('rejects lines that are not fault events', () => {
    expect(buildPipeline().ingestLine('GET /up 200')).toEqual({ status: 'not_a_fault' });
  });

  it('does nothing while auto-remediation is disabled', () => {
    enabled = false;
    const pipeline = buildPipeline();

    const result = pipeline.ingestLine(DB_TIMEOUT_LINE);

    expect(result.status).toBe('disabled');
    expect(pipeline.pendingCount).toBe(0);
    expect(store.count()).toBe(0);
  });

  it('admits one event per dedup window', async () => {
    const pipeline = buildPipeline();

    expect(pipeline.ingestLine(DB_TIMEOUT_LINE).status).toBe('accepted');
    clock = 1_500;
    expect(pipeline.ingestLine(DB_TIMEOUT_LINE).status).toBe('duplicate');
    clock = 2_000;
    expect(pipeline.ingestLine(DB_TIMEOUT_LINE).status).toBe('accepted');

    await pipeline.drain();
    expect(pipeline.pendingCount).toBe(0);
    expect(store.count()).toBe(2);
  });

  it('runs the matching playbook and resolves the incident', async () => {
    const pipeline = buildPipeline('Pool exhausted by pg_sleep.');
    const event = { errorCode: 'FAULT_DB_TIMEOUT', route: '/test-fault/db-timeout', reason: 'db_timeout', latency: '5.01' };

    const outcome = await pipeline.process(event);

    expect(outcome).toEqual({
      incidentId: 1,
      decision: 'ready_for_approval',
      actionId: 'fix_fault_db_timeout',
      executionStatus: 'executed',
      resolved: true,
    });
    expect(store.get(1)).toMatchObject({
      errorCode: 'FAULT_DB_TIMEOUT',
      symptoms: 'DB timeout or pool exhaustion on /test-fault/db-timeout',
      rootCause: 'Pool exhausted by pg_sleep.',
      remediation: PLAYBOOKS.FAULT_DB_TIMEOUT.summary,
      verification: PLAYBOOKS.FAULT_DB_TIMEOUT.verificationHint,
      resolved: true,
    });
    expect(publisher.events.map((entry) => entry.topic)).toEqual(['incidents', 'incidents']);
    expect(publisher.payloads).toMatchObject([
      { event: 'created' },
      { event: 'auto_resolved', data: { id: 1, resolved: true } },
    ]);
  });

  it('leaves unknown faults unresolved with a manual-triage note', async () => {
    const pipeline = buildPipeline();

    const outcome = await pipeline.process({ errorCode: 'FAULT_DISK_FULL', route: '/jobs', reason: 'disk' });

    expect(outcome).toEqual({
      incidentId: 1,
      decision: 'manual_triage_required',
      actionId: 'manual_triage',
      executionStatus: 'blocked',
      resolved: false,
    });
    expect(store.get(1)).toMatchObject({
      symptoms: 'Unknown fault',
      rootCause: 'Auto-detected FAULT_DISK_FULL',
      verification: 'Execution payload is not approved.',
      resolved: false,
    });
  });
});
