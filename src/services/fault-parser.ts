import type { AutofixInputs, FaultEvent } from '../types/incident.js';

const FAULT_PREFIX = 'FAULT_';

const EXTERNAL_API_REASON_DETAIL: Record<string, string> = {
    external_timeout: 'timeout',
    upstream_failure: 'upstream_500',
    connection_error: 'connection_refused',
};

/**
 * Parse a structured fault log line such as
 * `FAULT_DB_TIMEOUT route=/x reason=db_timeout latency=5.01`.
 *
 * Returns `null` unless the first token is a `FAULT_*` code and a non-empty
 * `route=` field is present.
 */
export function parseFaultLog(line: string): FaultEvent | null {
    if (!line.includes(FAULT_PREFIX)) {
        return null;
    }

    const tokens = line.trim().split(/\s+/);
    const errorCode = tokens[0];
    if (!errorCode || !errorCode.startsWith(FAULT_PREFIX)) {
        return null;
    }

    const fields = new Map<string, string>();
    for (const token of tokens.slice(1)) {
        const separator = token.indexOf('=');
        if (separator === -1) continue;
        fields.set(token.slice(0, separator), token.slice(separator + 1));
    }

    const route = fields.get('route');
    if (!route) {
        return null;
    }

    const event: FaultEvent = {
        errorCode,
        route,
        reason: fields.get('reason') ?? '',
    };
    const latency = fields.get('latency');
    if (latency !== undefined) {
        event.latency = latency;
    }
    return event;
}

function compactMetrics(metrics: Record<string, string | undefined>): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(metrics)) {
        if (value !== undefined) {
            result[key] = value;
        }
    }
    return result;
}

/** Map a parsed fault event to the symptoms, breadcrumbs and metrics recorded on its incident. */
export function buildAutofixInputs(event: FaultEvent): AutofixInputs {
    switch (event.errorCode) {
        case 'FAULT_SQL_INJECTION_TEST':
            return {
                symptoms: 'Invalid SQL executed on /test-fault/run',
                breadcrumbs: ['invalid_sql_executed', 'test_fault_endpoint'],
                metrics: compactMetrics({ route: event.route, reason: event.reason }),
            };
        case 'FAULT_EXTERNAL_API_LATENCY': {
            const reason = event.reason || 'external_failure';
            const detail = EXTERNAL_API_REASON_DETAIL[reason] ?? reason;
            return {
                symptoms: `External API failure on ${event.route}`,
                breadcrumbs: ['external_api_call', detail],
                metrics: compactMetrics({ route: event.route, reason, latency: event.latency }),
            };
        }
        case 'FAULT_DB_TIMEOUT':
            return {
                symptoms: 'DB timeout or pool exhaustion on /test-fault/db-timeout',
                breadcrumbs: ['pg_sleep_executed', 'queue_pool_limit'],
                metrics: compactMetrics({ route: event.route, reason: event.reason, latency: event.latency }),
            };
        default:
            return {
                symptoms: 'Unknown fault',
                breadcrumbs: [],
                metrics: compactMetrics({ route: event.route, reason: event.reason }),
            };
    }
}
