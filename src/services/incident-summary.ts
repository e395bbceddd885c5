import type { IncidentDashboardSummary, ReconstructedIncident } from '../types/log-events.js';

function round1(value: number): number {
    return Math.round(value * 10) / 10;
}

function startOfUtcDay(reference: Date): number {
    return Date.UTC(reference.getUTCFullYear(), reference.getUTCMonth(), reference.getUTCDate());
}

/** Headline numbers for a batch of reconstructed incidents. */
export function summarizeIncidents(
    incidents: readonly ReconstructedIncident[],
    now: Date = new Date(),
): IncidentDashboardSummary {
    const todayStart = startOfUtcDay(now);
    const resolved = incidents.filter((incident) => incident.status === 'resolved');
    const active = incidents.filter((incident) => incident.status === 'detected' || incident.status === 'in_progress');

    const resolvedToday = resolved.filter(
        (incident) => incident.timestampResolved !== null && Date.parse(incident.timestampResolved) >= todayStart,
    ).length;

    const autoResolved = resolved.filter((incident) => incident.verification.success === true).length;
    const autoResolutionRate = resolved.length > 0 ? (autoResolved / resolved.length) * 100 : 0;

    const minutesToResolve: number[] = [];
    for (const incident of resolved) {
        if (incident.timestampResolved === null) continue;
        const elapsedMs = Date.parse(incident.timestampResolved) - Date.parse(incident.timestampOpened);
        minutesToResolve.push(elapsedMs / 60_000);
    }
    const mttr = minutesToResolve.length > 0
        ? minutesToResolve.reduce((sum, value) => sum + value, 0) / minutesToResolve.length
        : 0;

    return {
        activeIncidents: active.length,
        resolvedTotal: resolved.length,
        resolvedToday,
        autoResolutionRate: round1(autoResolutionRate),
        mttrMinutes: round1(mttr),
        totalIncidents: incidents.length,
    };
}
