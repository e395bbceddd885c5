// ── Fault Codes ─────────────────────────────────────────────────────────────

export const FAULT_CODES = [
    'FAULT_SQL_INJECTION_TEST',
    'FAULT_EXTERNAL_API_LATENCY',
    'FAULT_DB_TIMEOUT',
] as const;

/** Closed set of injected failure modes that have a deterministic playbook. */
export type FaultCode = (typeof FAULT_CODES)[number];

export function isFaultCode(value: string | null | undefined): value is FaultCode {
    return typeof value === 'string' && FAULT_CODES.some((code) => code === value);
}

// ── Persisted Incident ──────────────────────────────────────────────────────

export interface Incident {
    id: number;
    detectedAt: string;
    /** Set at creation, never changed. May be outside {@link FaultCode} (e.g. `UNKNOWN`). */
    errorCode: string;
    symptoms: string;
    /** JSON-encoded ordered list of breadcrumb markers. */
    breadcrumbs: string | null;
    rootCause: string | null;
    remediation: string | null;
    verification: string | null;
    resolved: boolean;
    ragQuery: string | null;
    ragResponse: string | null;
    ragConfidence: number | null;
    evidenceDocId: string | null;
    updatedAt: string;
}

export interface IncidentCreateInput {
    errorCode: string;
    symptoms: string;
    breadcrumbs?: string[];
}

export type IncidentPatch = Partial<
    Pick<
        Incident,
        | 'rootCause'
        | 'remediation'
        | 'verification'
        | 'resolved'
        | 'ragQuery'
        | 'ragResponse'
        | 'ragConfidence'
        | 'evidenceDocId'
    >
>;

export interface IncidentResolution {
    rootCause: string | null;
    remediation: string | null;
    verification: string | null;
    resolved?: boolean;
}

/** Event names fanned out on the `incidents` broadcast topic. */
export type IncidentEventType =
    | 'created'
    | 'analyzed'
    | 'plan_approved'
    | 'resolved'
    | 'auto_resolved'
    | 'reconstructed';

// ── Fault Events ────────────────────────────────────────────────────────────

/** Ephemeral, parsed from a single log line; never persisted. */
export interface FaultEvent {
    errorCode: string;
    route: string;
    reason: string;
    latency?: string;
}

export interface AutofixInputs {
    symptoms: string;
    breadcrumbs: string[];
    metrics: Record<string, string>;
}

// ── Evidence ────────────────────────────────────────────────────────────────

export interface EvidenceQuery {
    symptoms: string;
    markers: string[];
    metrics?: Record<string, string>;
}

export interface EvidenceResult {
    content: string;
    retrievedMemories: unknown[];
    retrievedFiles: unknown[];
}
