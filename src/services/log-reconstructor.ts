import { createHash } from 'node:crypto';
import { readListConfig } from '../config/json-config.js';
import { FAULT_CODES } from '../types/incident.js';
import type {
    IncidentSeverityGuess,
    LogEvent,
    ParsedLogLine,
    ReconstructedIncident,
    ReconstructionOptions,
} from '../types/log-events.js';

const START_REQUEST_RE = /^START RequestId:\s*([a-f0-9-]+)/;
const END_REQUEST_RE = /^END RequestId:\s*([a-f0-9-]+)/;
const PROCESSING_ERROR_RE = /^ERROR processing\s+(FAULT_[A-Z0-9_]+):/;
const EVIDENCE_PREFIX = 'BACKBOARD_ANALYSIS:';
const REMEDIATION_PREFIX = 'GEMINI_OUTPUT:';
const MAX_REMEDIATION_SUMMARY = 1_000;

export const DEFAULT_MAX_INCIDENTS = 50;
const DEFAULT_LOGS_PER_INCIDENT = 10;

// ── Shared helpers ──────────────────────────────────────────────────────────

/** `LOG_FAULT_CODES` when set, else every known fault code. */
export function resolveAllowedFaultCodes(): string[] {
    const configured = readListConfig('LOG_FAULT_CODES');
    return configured.length > 0 ? configured : [...FAULT_CODES];
}

/** First allowed code contained anywhere in `text`. */
export function findAllowedFaultCode(text: string, allowed: readonly string[]): string | null {
    return allowed.find((code) => text.includes(code)) ?? null;
}

export function stableId(parts: readonly string[], length: number): string {
    return createHash('sha1').update(parts.join('|'), 'utf8').digest('hex').slice(0, length);
}

export function guessSeverity(errorCode: string, message: string): IncidentSeverityGuess {
    const msg = message.toLowerCase();
    const code = errorCode.toLowerCase();
    if (msg.includes('critical') || msg.includes('panic')) return 'critical';
    if (msg.includes('traceback') || msg.includes('exception')) return 'high';
    if (code.includes('db') || msg.includes('timeout')) return 'critical';
    if (code.includes('sql')) return 'high';
    return 'medium';
}

export function guessIncidentType(errorCode: string): string {
    const code = errorCode.toUpperCase();
    if (code.includes('EXTERNAL_API')) return 'External API Timeout';
    if (code.includes('DB')) return 'Database Issues';
    if (code.includes('SQL')) return 'SQL Errors';
    if (code.includes('CONNECTION')) return 'Connection Errors';
    return 'Application Error';
}

export function toIsoTimestamp(timestampMs: number): string {
    return new Date(timestampMs).toISOString();
}

// ── Parse step ──────────────────────────────────────────────────────────────

function isObjectRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringifyContent(value: unknown): string {
    if (value === undefined || value === null || value === '' || value === false || value === 0) {
        return '';
    }
    if (typeof value === 'string') {
        return value;
    }
    return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function parseEvidencePayload(message: string): ParsedLogLine {
    let parsed: unknown;
    try {
        parsed = JSON.parse(message.slice(EVIDENCE_PREFIX.length).trim());
    } catch {
        return { kind: 'noise' };
    }
    if (!isObjectRecord(parsed) || Object.keys(parsed).length === 0) {
        return { kind: 'noise' };
    }

    const threadId = parsed.thread_id;
    return {
        kind: 'evidence_payload',
        content: stringifyContent(parsed.content),
        threadId: threadId === undefined || threadId === null || threadId === '' ? null : String(threadId),
    };
}

/** Classify one trimmed FaultRouter log message. */
export function parseLogLine(message: string): ParsedLogLine {
    const start = START_REQUEST_RE.exec(message);
    if (start) return { kind: 'request_start', requestId: start[1] };

    const end = END_REQUEST_RE.exec(message);
    if (end) return { kind: 'request_end', requestId: end[1] };

    const failure = PROCESSING_ERROR_RE.exec(message);
    if (failure) return { kind: 'processing_error', faultCode: failure[1] };

    if (message.startsWith(EVIDENCE_PREFIX)) {
        return parseEvidencePayload(message);
    }

    if (message.startsWith(REMEDIATION_PREFIX)) {
        return { kind: 'remediation_output', output: message.slice(REMEDIATION_PREFIX.length).trim() };
    }

    return { kind: 'noise' };
}

// ── Fold step ───────────────────────────────────────────────────────────────

function openIncident(code: string, event: LogEvent): ReconstructedIncident {
    const openedIso = toIsoTimestamp(event.timestamp);
    return {
        id: `FR-${stableId([code, String(Math.floor(event.timestamp / 1000))], 10)}`,
        timestampOpened: openedIso,
        timestampResolved: null,
        incidentType: guessIncidentType(code),
        severity: guessSeverity(code, code),
        status: 'detected',
        route: '-',
        errorCode: code,
        symptoms: {
            errorRate: '—',
            errorRateValue: 1,
            latencyP95: '—',
            latencyP95Value: 0,
            endpoint: '-',
            logMarker: code,
            affectedRequests: 1,
        },
        breadcrumbs: {
            recentLogs: [],
            metricSnapshot: { totalRequests: null, failedRequests: 1, avgLatency: null, timestamp: openedIso },
            correlatedEvents: [`log_group=${event.logGroup}`],
        },
        rootCause: { source: 'faultrouter', confidenceScore: null, explanation: 'Pending Backboard analysis' },
        remediation: { actionType: null, parameters: null, executionTimestamp: null },
        verification: {
            errorRateBefore: null,
            errorRateAfter: null,
            latencyBefore: null,
            latencyAfter: null,
            healthCheckStatus: null,
            success: null,
        },
    };
}

/**
 * Rebuild FaultRouter incident lifecycles (detected, analyzed, resolved)
 * from a batch of log events.
 *
 * Request context comes from START/END markers. Every occurrence of one
 * fault code within the batch folds into a single incident.
 */
export function reconstructFaultRouterIncidents(
    events: readonly LogEvent[],
    options: ReconstructionOptions = {},
): ReconstructedIncident[] {
    if (events.length === 0) {
        return [];
    }

    const allowed = options.allowedFaultCodes ?? resolveAllowedFaultCodes();
    const maxIncidents = options.maxIncidents ?? DEFAULT_MAX_INCIDENTS;
    const logsPerIncident = options.logsPerIncident ?? DEFAULT_LOGS_PER_INCIDENT;

    const ordered = [...events].sort((left, right) => left.timestamp - right.timestamp);
    const incidents = new Map<string, ReconstructedIncident>();
    const lastFaultByRequest = new Map<string, string>();
    let requestId: string | null = null;

    const incidentFor = (code: string, event: LogEvent): ReconstructedIncident => {
        let incident = incidents.get(code);
        if (!incident) {
            incident = openIncident(code, event);
            incidents.set(code, incident);
        }
        return incident;
    };

    for (const event of ordered) {
        const message = event.message.trim();
        if (!message) continue;

        const iso = toIsoTimestamp(event.timestamp);
        const line = parseLogLine(message);

        switch (line.kind) {
            case 'request_start':
                requestId = line.requestId;
                break;

            case 'request_end':
                if (requestId === line.requestId) {
                    requestId = null;
                }
                break;

            case 'processing_error': {
                if (!allowed.includes(line.faultCode)) break;
                const incident = incidentFor(line.faultCode, event);
                incident.status = 'in_progress';
                incident.rootCause.explanation = 'FaultRouter failed while processing this incident';
                incident.breadcrumbs.recentLogs.push(`${iso} ${message}`);
                if (requestId) lastFaultByRequest.set(requestId, line.faultCode);
                break;
            }

            case 'evidence_payload': {
                const code = findAllowedFaultCode(line.content, allowed)
                    ?? (requestId ? lastFaultByRequest.get(requestId) ?? null : null);
                if (!code) break;
                const incident = incidentFor(code, event);
                incident.status = 'in_progress';
                incident.rootCause = { source: 'backboard', confidenceScore: null, explanation: line.content };
                incident.breadcrumbs.recentLogs.push(`${iso} BACKBOARD_ANALYSIS`);
                if (line.threadId) {
                    incident.breadcrumbs.correlatedEvents.push(`thread_id=${line.threadId}`);
                }
                if (requestId) lastFaultByRequest.set(requestId, code);
                break;
            }

            case 'remediation_output': {
                const code = (requestId ? lastFaultByRequest.get(requestId) : undefined)
                    ?? findAllowedFaultCode(line.output, allowed);
                if (!code) break;
                const incident = incidentFor(code, event);
                incident.status = 'resolved';
                incident.timestampResolved = iso;
                incident.remediation = {
                    actionType: 'gemini_autofix',
                    parameters: { summary: line.output.slice(0, MAX_REMEDIATION_SUMMARY) },
                    executionTimestamp: iso,
                };
                incident.verification = {
                    errorRateBefore: null,
                    errorRateAfter: null,
                    latencyBefore: null,
                    latencyAfter: null,
                    healthCheckStatus: 'unknown',
                    success: true,
                };
                incident.breadcrumbs.recentLogs.push(`${iso} GEMINI_OUTPUT`);
                break;
            }

            case 'noise':
                break;
        }
    }

    const result: ReconstructedIncident[] = [];
    for (const incident of incidents.values()) {
        const logs = incident.breadcrumbs.recentLogs;
        incident.symptoms.affectedRequests = Math.max(1, logs.length);
        incident.breadcrumbs.recentLogs = logs.slice(-logsPerIncident);
        result.push(incident);
    }

    result.sort((left, right) => right.timestampOpened.localeCompare(left.timestampOpened));
    return result.slice(0, maxIncidents);
}
