import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

import { DEFAULT_LOG_GROUP } from '../../src/config/json-config.js';
import { IncidentBroadcaster } from '../../src/services/incident-broadcaster.js';
import { JobScheduler } from '../../src/services/job-scheduler.js';
import type { LogEventQuery, LogEventSource } from '../../src/services/log-event-source.js';
import { RECONSTRUCTION_JOB_ID, ReconstructionJob } from '../../src/services/reconstruction-job.js';
import { FAULT_CODES } from '../../src/types/incident.js';
import type { LogEvent } from '../../src/types/log-events.js';
import { RecordingPublisher } from '../helpers/recording-publisher.js';

const NOW = new Date('2026-02-01T12:05:00.000Z');
const T0 = Date.UTC(2026, 1, 1, 12, 0, 0);

class StaticSource implements LogEventSource {
  readonly queries: LogEventQuery[] = [];

  constructor(private readonly events: LogEvent[]) {}

  async fetchRecent(query: LogEventQuery): Promise<LogEvent[]> {
    this.queries.push(query);
    return this.events;
  }
}

function faultRouterEvent(offsetMs: number, message: string): LogEvent {
  return { logGroup: DEFAULT_LOG_GROUP, logStream: 's', timestamp: T0 + offsetMs, message };
}

describe('ReconstructionJob', () => {
  const scheduler = new JobScheduler();

  afterEach(() => {
    scheduler.unregister(RECONSTRUCTION_JOB_ID);
  });

  function buildJob(events: LogEvent[]) {
    const source = new StaticSource(events);
    const publisher = new RecordingPublisher();
    const job = new ReconstructionJob(
      { scheduler, source, broadcaster: new IncidentBroadcaster(publisher), now: () => NOW },
      {
        cronExpression: '*/30 * * * * *',
        logGroups: [DEFAULT_LOG_GROUP],
        lookbackMinutes: 120,
        onlyFaultCodes: true,
        allowedFaultCodes: FAULT_CODES,
      },
    );
    return { job, source, publisher };
  }

  it('builds, stores and broadcasts a snapshot', async () => {
    const { job, source, publisher } = buildJob([
      faultRouterEvent(0, 'START RequestId: abc-123'),
      faultRouterEvent(100, 'ERROR processing FAULT_DB_TIMEOUT: pool exhausted'),
      faultRouterEvent(60_100, 'GEMINI_OUTPUT: Raised pool size'),
      faultRouterEvent(60_200, 'END RequestId: abc-123'),
    ]);
    expect(job.latest).toBeNull();

    const snapshot = await job.run();

    expect(source.queries).toEqual([{ logGroups: [DEFAULT_LOG_GROUP], lookbackMinutes: 120 }]);
    expect(snapshot.generatedAt).toBe('2026-02-01T12:05:00.000Z');
    expect(snapshot.eventCount).toBe(4);
    expect(snapshot.incidents.map((incident) => [incident.errorCode, incident.status])).toEqual([
      ['FAULT_DB_TIMEOUT', 'resolved'],
    ]);
    expect(snapshot.summary).toEqual({
      activeIncidents: 0,
      resolvedTotal: 1,
      resolvedToday: 1,
      autoResolutionRate: 100,
      mttrMinutes: 1,
      totalIncidents: 1,
    });
    expect(job.latest).toBe(snapshot);
    expect(publisher.payloads).toEqual([
      { event: 'reconstructed', data: { summary: snapshot.summary, incidents: snapshot.incidents } },
    ]);
  });

  it('registers on the scheduler and runs through it', async () => {
    const { job } = buildJob([]);

    job.register(false);
    expect(scheduler.getJob(RECONSTRUCTION_JOB_ID)).toMatchObject({
      cronExpression: '*/30 * * * * *',
      status: 'idle',
    });

    await scheduler.runNow(RECONSTRUCTION_JOB_ID);

    expect(job.latest?.incidents).toEqual([]);
    expect(job.latest?.summary.totalIncidents).toBe(0);
  });
});
