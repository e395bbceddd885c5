import { describe, expect, it } from 'vitest';
import { summarizeIncidents } from '../../src/services/incident-summary.js';
import type { ReconstructedIncident, ReconstructedStatus } from '../../src/types/log-events.js';

function reconstructed(
  id: string,
  status: ReconstructedStatus,
  opened: string,
  resolvedAt: string | null = null,
  success: boolean | null = null,
): ReconstructedIncident {
  return {
    id,
    timestampOpened: opened,
    timestampResolved: resolvedAt,
    incidentType: 'Database Issues',
    severity: 'critical',
    status,
    route: '-',
    errorCode: 'FAULT_DB_TIMEOUT',
    symptoms: {
      errorRate: '5%',
      errorRateValue: 5,
      latencyP95: '—',
      latencyP95Value: 0,
      endpoint: '-',
      logMarker: 'FAULT_DB_TIMEOUT',
      affectedRequests: 1,
    },
    breadcrumbs: {
      recentLogs: [],
      metricSnapshot: { totalRequests: null, failedRequests: 1, avgLatency: null, timestamp: opened },
      correlatedEvents: [],
    },
    rootCause: { source: 'cloudwatch', confidenceScore: null, explanation: '' },
    remediation: { actionType: null, parameters: null, executionTimestamp: null },
    verification: {
      errorRateBefore: null,
      errorRateAfter: null,
      latencyBefore: null,
      latencyAfter: null,
      healthCheckStatus: null,
      success,
    },
  };
}

describe('summarizeIncidents', () => {
  const now = new Date('2026-02-01T18:00:00.000Z');

  it('returns zeros for an empty batch', () => {
    expect(summarizeIncidents([], now)).toEqual({
      activeIncidents: 0,
      resolvedTotal: 0,
      resolvedToday: 0,
      autoResolutionRate: 0,
      mttrMinutes: 0,
      totalIncidents: 0,
    });
  });

  it('counts active and resolved incidents and averages time to resolve', () => {
    const summary = summarizeIncidents([
      reconstructed('a', 'resolved', '2026-02-01T10:00:00.000Z', '2026-02-01T10:30:00.000Z', true),
      reconstructed('b', 'resolved', '2026-01-31T20:00:00.000Z', '2026-01-31T21:00:00.000Z'),
      reconstructed('c', 'detected', '2026-02-01T17:00:00.000Z'),
      reconstructed('d', 'in_progress', '2026-02-01T17:30:00.000Z'),
    ], now);

    expect(summary).toEqual({
      activeIncidents: 2,
      resolvedTotal: 2,
      resolvedToday: 1,
      autoResolutionRate: 50,
      mttrMinutes: 45,
      totalIncidents: 4,
    });
  });

  it('rounds rates and durations to one decimal', () => {
    const summary = summarizeIncidents([
      reconstructed('a', 'resolved', '2026-02-01T10:00:00.000Z', '2026-02-01T10:00:10.000Z', true),
      reconstructed('b', 'resolved', '2026-02-01T10:00:00.000Z', '2026-02-01T10:00:20.000Z', true),
      reconstructed('c', 'resolved', '2026-02-01T10:00:00.000Z', '2026-02-01T10:00:30.000Z', false),
    ], now);

    expect(summary.autoResolutionRate).toBe(66.7);
    expect(summary.mttrMinutes).toBe(0.3);
  });
});
