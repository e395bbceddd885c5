/** One raw log event as shipped by a log group/stream source. */
export interface LogEvent {
    logGroup: string;
    logStream: string;
    /** Milliseconds since epoch. */
    timestamp: number;
    message: string;
}

// ── Typed intermediate events (parse step of reconstruction) ────────────────

export type ParsedLogLine =
    | { kind: 'request_start'; requestId: string }
    | { kind: 'request_end'; requestId: string }
    | { kind: 'processing_error'; faultCode: string }
    | { kind: 'evidence_payload'; content: string; threadId: string | null }
    | { kind: 'remediation_output'; output: string }
    | { kind: 'noise' };

// ── Reconstructed incident view ─────────────────────────────────────────────

export type ReconstructedStatus = 'detected' | 'in_progress' | 'resolved';

export type IncidentSeverityGuess = 'critical' | 'high' | 'medium';

export interface ReconstructedSymptoms {
    errorRate: string;
    errorRateValue: number;
    latencyP95: string;
    latencyP95Value: number;
    endpoint: string;
    logMarker: string;
    affectedRequests: number;
}

export interface MetricSnapshot {
    totalRequests: number | null;
    failedRequests: number;
    avgLatency: string | null;
    timestamp: string;
}

export interface ReconstructedBreadcrumbs {
    recentLogs: string[];
    metricSnapshot: MetricSnapshot;
    correlatedEvents: string[];
}

export interface ReconstructedRootCause {
    source: string;
    confidenceScore: number | null;
    explanation: string;
}

export interface ReconstructedRemediation {
    actionType: string | null;
    parameters: Record<string, string> | null;
    executionTimestamp: string | null;
}

export interface ReconstructedVerification {
    errorRateBefore: number | null;
    errorRateAfter: number | null;
    latencyBefore: number | null;
    latencyAfter: number | null;
    healthCheckStatus: string | null;
    success: boolean | null;
}

export interface ReconstructedIncident {
    id: string;
    timestampOpened: string;
    timestampResolved: string | null;
    incidentType: string;
    severity: IncidentSeverityGuess;
    status: ReconstructedStatus;
    route: string;
    errorCode: string;
    symptoms: ReconstructedSymptoms;
    breadcrumbs: ReconstructedBreadcrumbs;
    rootCause: ReconstructedRootCause;
    remediation: ReconstructedRemediation;
    verification: ReconstructedVerification;
}

export interface ReconstructionOptions {
    allowedFaultCodes?: readonly string[];
    maxIncidents?: number;
    logsPerIncident?: number;
}

export interface BucketingOptions extends ReconstructionOptions {
    onlyFaultCodes?: boolean;
}

export interface IncidentDashboardSummary {
    activeIncidents: number;
    resolvedTotal: number;
    /** Resolved since 00:00 UTC of the summary's reference time. */
    resolvedToday: number;
    /** Percent of resolved incidents whose verification succeeded. */
    autoResolutionRate: number;
    mttrMinutes: number;
    totalIncidents: number;
}
