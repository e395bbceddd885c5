import type { ConfigIssue } from '../config/env-validator.js';
import type { FaultEvent } from './incident.js';
import type { JobSnapshot } from './scheduler.js';
import type { WsHubMetrics } from './websocket.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    incidents: { total: number };
    autoRemediate: boolean;
    evidenceConfigured: boolean;
    websocket: WsHubMetrics | null;
    reconstruction: {
        job: JobSnapshot | null;
        lastGeneratedAt: string | null;
    };
}

export interface ConfigValidationData {
    ok: boolean;
    /** Required or feature-conditional keys with no value. */
    missingKeys: string[];
    presentKeys: string[];
    issues: ConfigIssue[];
    activeFeatures: string[];
    fatalIssues: ConfigIssue[];
    validatedAt: string;
}

// ── Incident request bodies (snake_case on the wire) ────────────────────────

export interface CreateIncidentBody {
    error_code?: string;
    symptoms?: string;
    breadcrumbs?: string[];
}

export interface ResolveIncidentBody {
    root_cause?: string | null;
    remediation?: string | null;
    verification?: string | null;
    resolved?: boolean;
}

export interface ExecuteIncidentBody {
    approve?: boolean;
}

export interface IngestLogBody {
    line?: string;
}

export interface IngestLogData {
    accepted: boolean;
    reason?: 'duplicate' | 'disabled';
    event?: FaultEvent;
}

export interface SetupAssistantBody {
    name?: string;
    description?: string;
}

// ── Source control ──────────────────────────────────────────────────────────

export interface WriteSourceFileBody {
    path?: string;
    content?: string;
    version?: string;
    message?: string;
}
