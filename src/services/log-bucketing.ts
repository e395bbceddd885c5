import { DEFAULT_LOG_GROUP, readBooleanConfig } from '../config/json-config.js';
import type {
    BucketingOptions,
    LogEvent,
    ReconstructedIncident,
    ReconstructionOptions,
} from '../types/log-events.js';
import {
    DEFAULT_MAX_INCIDENTS,
    findAllowedFaultCode,
    guessIncidentType,
    guessSeverity,
    reconstructFaultRouterIncidents,
    resolveAllowedFaultCodes,
    stableId,
    toIsoTimestamp,
} from './log-reconstructor.js';

const NOISE_PREFIXES = [
    'INIT_START',
    'START RequestId:',
    'END RequestId:',
    'REPORT RequestId:',
    'BACKBOARD_ANALYSIS:',
    'TOOL_CALL:',
    'TOOL_RESULT:',
    'GEMINI_OUTPUT:',
] as const;

const FAULT_RE = /\b(FAULT_[A-Z0-9_]+)\b/;
const ROUTE_RE = /\broute=(\S+)/;
const LATENCY_RE = /\blatency=(\d+\.\d+)/;
const DASHBOARD_RE = /^DASHBOARD\s+(.+?)\s+failed:/;
const DEFAULT_LOGS_PER_INCIDENT = 8;
const UNKNOWN_ROUTE = '-';

function isObjectRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolveOnlyFaultCodes(options: BucketingOptions): boolean {
    return options.onlyFaultCodes ?? readBooleanConfig('LOG_ONLY_FAULT_CODES', true);
}

function codeFromJsonBlob(message: string): string | null {
    const open = message.indexOf('{');
    const close = message.lastIndexOf('}');
    if (open === -1 || close === -1 || close < open) {
        return null;
    }
    try {
        const parsed: unknown = JSON.parse(message.slice(open, close + 1));
        if (!isObjectRecord(parsed)) return null;
        const code = parsed.error_code || parsed.code;
        return typeof code === 'string' && code ? code : null;
    } catch {
        return null;
    }
}

export function extractErrorCode(
    message: string,
    allowed: readonly string[],
    onlyFaultCodes: boolean,
): string {
    if (onlyFaultCodes) {
        const code = findAllowedFaultCode(message, allowed);
        if (code) return code;
    }

    const dashboard = DASHBOARD_RE.exec(message);
    if (dashboard) {
        const action = dashboard[1].trim().replace(/\W+/g, '_').toUpperCase();
        return `DASHBOARD_${action}_FAILED`;
    }

    const fault = FAULT_RE.exec(message);
    if (fault) return fault[1];

    const fromJson = codeFromJsonBlob(message);
    if (fromJson) return fromJson;

    const lowered = message.toLowerCase();
    if (lowered.includes('traceback') || lowered.includes('exception')) {
        return 'PY_EXCEPTION';
    }
    return 'ERROR';
}

export function extractRoute(message: string): string | null {
    const route = ROUTE_RE.exec(message);
    if (route) return route[1];
    if (message.startsWith('DASHBOARD emit failed')) return '/incidents/stream';
    if (message.startsWith('DASHBOARD create incident failed')) return '/incidents/';
    return null;
}

function extractLatencySeconds(message: string): number | null {
    const match = LATENCY_RE.exec(message);
    return match ? Number.parseFloat(match[1]) : null;
}

function isRelevant(message: string, allowed: readonly string[], onlyFaultCodes: boolean): boolean {
    if (onlyFaultCodes) {
        return findAllowedFaultCode(message, allowed) !== null;
    }
    const hasFaultWithRoute = message.includes('FAULT_') && message.includes('route=');
    const isDashboardFailure = message.startsWith('DASHBOARD ') && message.toLowerCase().includes('failed');
    const hasError = message.includes('ERROR');
    const hasTraceback = message.includes('Traceback') || message.includes('Exception');
    return hasFaultWithRoute || isDashboardFailure || hasError || hasTraceback;
}

/**
 * Collapse relevant log lines into one incident per (error code, route).
 * Buckets are ordered by their newest event.
 */
export function bucketLogIncidents(
    events: readonly LogEvent[],
    options: BucketingOptions = {},
): ReconstructedIncident[] {
    if (events.length === 0) {
        return [];
    }

    const allowed = options.allowedFaultCodes ?? resolveAllowedFaultCodes();
    const onlyFaultCodes = resolveOnlyFaultCodes(options);
    const maxIncidents = options.maxIncidents ?? DEFAULT_MAX_INCIDENTS;
    const logsPerIncident = options.logsPerIncident ?? DEFAULT_LOGS_PER_INCIDENT;

    const buckets = new Map<string, { code: string; route: string; events: LogEvent[] }>();
    for (const event of events) {
        const message = event.message.trim();
        if (!message) continue;
        if (NOISE_PREFIXES.some((prefix) => message.startsWith(prefix))) continue;
        if (!isRelevant(message, allowed, onlyFaultCodes)) continue;

        const code = extractErrorCode(event.message, allowed, onlyFaultCodes);
        const route = extractRoute(event.message) ?? UNKNOWN_ROUTE;
        const key = `${code}\u0000${route}`;
        const bucket = buckets.get(key) ?? { code, route, events: [] };
        bucket.events.push(event);
        buckets.set(key, bucket);
    }

    const ordered = [...buckets.values()]
        .map((bucket) => ({
            ...bucket,
            newestAt: bucket.events.reduce((newest, item) => Math.max(newest, item.timestamp), -Infinity),
        }))
        .sort((left, right) => right.newestAt - left.newestAt)
        .slice(0, maxIncidents);

    return ordered.map(({ code, route, events: bucketEvents }): ReconstructedIncident => {
        const sorted = [...bucketEvents].sort((left, right) => right.timestamp - left.timestamp);
        const newest = sorted[0];
        const count = sorted.length;

        let latency: number | null = null;
        for (const event of sorted) {
            latency = extractLatencySeconds(event.message);
            if (latency !== null) break;
        }
        const latencyLabel = latency !== null ? `${latency.toFixed(2)}s` : null;
        const errorRateValue = Math.min(100, Math.max(1, count * 5));
        const newestIso = toIsoTimestamp(newest.timestamp);

        const correlatedEvents = [`log_group=${newest.logGroup}`];
        if (newest.logStream) {
            correlatedEvents.push(`log_stream=${newest.logStream}`);
        }

        return {
            id: `CW-${stableId([code, route, String(newest.timestamp)], 12)}`,
            timestampOpened: newestIso,
            timestampResolved: null,
            incidentType: guessIncidentType(code),
            severity: guessSeverity(code, newest.message),
            status: 'detected',
            route,
            errorCode: code,
            symptoms: {
                errorRate: `${errorRateValue}%`,
                errorRateValue,
                latencyP95: latencyLabel ?? '—',
                latencyP95Value: latency ?? 0,
                endpoint: route,
                logMarker: code,
                affectedRequests: count,
            },
            breadcrumbs: {
                recentLogs: sorted
                    .slice(0, logsPerIncident)
                    .map((event) => `${toIsoTimestamp(event.timestamp)} ${event.message}`),
                metricSnapshot: {
                    totalRequests: null,
                    failedRequests: count,
                    avgLatency: latencyLabel,
                    timestamp: newestIso,
                },
                correlatedEvents,
            },
            rootCause: {
                source: 'cloudwatch',
                confidenceScore: null,
                explanation: 'Pending RAG analysis (log-derived incident)',
            },
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
    });
}

/**
 * The FaultRouter reconstructor understands only its own function's log
 * group; everything else goes through generic bucketing.
 */
export function selectReconstruction(
    events: readonly LogEvent[],
    logGroups: readonly string[],
    onlyFaultCodes: boolean,
    options: ReconstructionOptions = {},
): ReconstructedIncident[] {
    if (onlyFaultCodes && logGroups.length === 1 && logGroups[0] === DEFAULT_LOG_GROUP) {
        return reconstructFaultRouterIncidents(events, options);
    }
    return bucketLogIncidents(events, { ...options, onlyFaultCodes });
}
