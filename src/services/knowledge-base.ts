import { readNumberConfig } from '../config/json-config.js';
import type { FaultCode } from '../types/incident.js';
import { getErrorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

/** A resolved incident written up ahead of time so retrieval has history on day one. */
export interface SeedIncident {
    key: string;
    errorCode: FaultCode;
    symptoms: string;
    breadcrumbs: string[];
    rootCause: string;
    remediation: string;
    verification: string;
}

export interface SeedUploadResult {
    filename: string;
    documentId: string | null;
    error?: string;
}

export interface SeedSummary {
    uploaded: number;
    failed: number;
    results: SeedUploadResult[];
}

/** The slice of the evidence client that seeding needs; {@link BackboardClient} satisfies it. */
export interface DocumentUploader {
    uploadDocument(assistantId: string, content: string, filename: string): Promise<string>;
}

export interface SeedOptions {
    entries?: readonly SeedIncident[];
    /** Pause between uploads. Defaults to `KB_SEED_DELAY_MS`. */
    delayMs?: number;
}

const DEFAULT_SEED_DELAY_MS = 1_500;

// ── Entries ─────────────────────────────────────────────────────────────────

export const SEED_INCIDENTS: readonly SeedIncident[] = [
    {
        key: 'KB-SQL-001',
        errorCode: 'FAULT_SQL_INJECTION_TEST',
        symptoms: 'POST /test-fault/run answered 500; the database rejected a statement with "syntax error at or near FROM".',
        breadcrumbs: ['invalid_sql_executed', 'test_fault_endpoint'],
        rootCause: 'The fault route sends a statement with no column list straight to the driver.',
        remediation: 'Catch the driver error on the fault route, roll back the session and answer a structured 500.',
        verification: 'Replayed the route: the error is caught, the session is clean and the next query succeeds.',
    },
    {
        key: 'KB-SQL-002',
        errorCode: 'FAULT_SQL_INJECTION_TEST',
        symptoms: 'Requests after a failed statement hung with "current transaction is aborted" until the worker restarted.',
        breadcrumbs: ['invalid_sql_executed', 'db_session_rollback_needed'],
        rootCause: 'The failed statement left the pooled connection inside an aborted transaction.',
        remediation: 'Roll back in the error handler before the connection returns to the pool.',
        verification: 'Ran the fault route followed by 50 normal requests; all 50 succeeded.',
    },
    {
        key: 'KB-SQL-003',
        errorCode: 'FAULT_SQL_INJECTION_TEST',
        symptoms: 'Search endpoint returned every row when the query string contained a quote followed by OR 1=1.',
        breadcrumbs: ['string_built_sql', 'search_endpoint'],
        rootCause: 'The search filter was concatenated into the SQL text instead of bound as a parameter.',
        remediation: 'Switch the filter to a bound parameter and add a regression case for quoted input.',
        verification: 'The quoted payload now matches nothing and the parameterised query plan is unchanged.',
    },
    {
        key: 'KB-EXT-001',
        errorCode: 'FAULT_EXTERNAL_API_LATENCY',
        symptoms: 'GET /test-fault/external p95 rose to 9.8s; upstream calls hung until the worker timeout.',
        breadcrumbs: ['external_timeout', 'no_client_timeout'],
        rootCause: 'The outbound HTTP client had no timeout, so a slow upstream held workers indefinitely.',
        remediation: 'Set a 3s client timeout and return a degraded payload when it fires.',
        verification: 'With the upstream delayed by 10s, the route answers in 3.1s with the fallback payload.',
    },
    {
        key: 'KB-EXT-002',
        errorCode: 'FAULT_EXTERNAL_API_LATENCY',
        symptoms: 'Error rate reached 40% during an upstream brownout as retries multiplied outbound traffic.',
        breadcrumbs: ['external_timeout', 'retry_storm'],
        rootCause: 'Immediate retries without backoff tripled load on an upstream that was already slow.',
        remediation: 'Add exponential backoff with jitter and a circuit breaker that opens after 5 failures.',
        verification: 'Replayed the brownout: outbound volume stayed flat and the breaker recovered after 30s.',
    },
    {
        key: 'KB-EXT-003',
        errorCode: 'FAULT_EXTERNAL_API_LATENCY',
        symptoms: 'Worker memory climbed to the container limit while upstream latency was high, followed by restarts.',
        breadcrumbs: ['external_timeout', 'request_queue_buildup', 'oom_kill'],
        rootCause: 'In-flight requests piled up behind the slow upstream and each held its response buffer.',
        remediation: 'Bound concurrent upstream calls and shed excess requests with a 503.',
        verification: 'Under 100 concurrent slow calls memory peaked well below the limit with no restarts.',
    },
    {
        key: 'KB-DB-001',
        errorCode: 'FAULT_DB_TIMEOUT',
        symptoms: 'GET /test-fault/db-timeout took over 5s and the pool reported no free connections.',
        breadcrumbs: ['pg_sleep_executed', 'queue_pool_limit'],
        rootCause: 'Long pg_sleep queries held every pooled connection, starving other requests.',
        remediation: 'Set a 2s statement timeout on the session and raise the pool size to 20.',
        verification: 'The slow query is cancelled at 2s and concurrent requests keep getting connections.',
    },
    {
        key: 'KB-DB-002',
        errorCode: 'FAULT_DB_TIMEOUT',
        symptoms: 'Checkout latency spiked after a deploy; database CPU was idle but connections were exhausted.',
        breadcrumbs: ['queue_pool_limit', 'connection_leak'],
        rootCause: 'A new code path opened sessions without returning them to the pool on error.',
        remediation: 'Release sessions in a finally block and enable pool pre-ping.',
        verification: 'Pool usage stays flat across 1000 requests that include the failing path.',
    },
    {
        key: 'KB-DB-003',
        errorCode: 'FAULT_DB_TIMEOUT',
        symptoms: 'Nightly report queries timed out and blocked the API for several minutes.',
        breadcrumbs: ['long_running_query', 'lock_wait'],
        rootCause: 'An unindexed report query held row locks that API writes waited on.',
        remediation: 'Add the missing index and move the report to a read replica.',
        verification: 'The report finishes in 4s and API write latency is unchanged while it runs.',
    },
];

// ── Rendering ───────────────────────────────────────────────────────────────

export function buildSeedDocument(entry: SeedIncident): string {
    return [
        `IncidentID: ${entry.key}`,
        `ErrorCode: ${entry.errorCode}`,
        `Symptoms: ${entry.symptoms}`,
        `Breadcrumbs: ${JSON.stringify(entry.breadcrumbs)}`,
        `RootCause: ${entry.rootCause}`,
        `Remediation: ${entry.remediation}`,
        `Verification: ${entry.verification}`,
        'Resolved: true',
        '',
    ].join('\n');
}

export function seedFilename(entry: SeedIncident): string {
    return `${entry.key.toLowerCase()}.txt`;
}

// ── Seeding ─────────────────────────────────────────────────────────────────

/**
 * Upload each entry to the assistant's document store, one at a time.
 * A failed upload is recorded in its result and does not stop the rest.
 */
export async function seedKnowledgeBase(
    uploader: DocumentUploader,
    assistantId: string,
    options: SeedOptions = {},
): Promise<SeedSummary> {
    const entries = options.entries ?? SEED_INCIDENTS;
    const delayMs = options.delayMs ?? readNumberConfig('KB_SEED_DELAY_MS', DEFAULT_SEED_DELAY_MS);
    const results: SeedUploadResult[] = [];

    for (const [index, entry] of entries.entries()) {
        const filename = seedFilename(entry);
        const position = `[${index + 1}/${entries.length}]`;
        try {
            const documentId = await uploader.uploadDocument(assistantId, buildSeedDocument(entry), filename);
            results.push({ filename, documentId });
            void logThought(`[KnowledgeBase] ${position} Uploaded ${filename} as ${documentId}.`);
        } catch (error) {
            const message = getErrorMessage(error);
            results.push({ filename, documentId: null, error: message });
            void logThought(`[KnowledgeBase] ${position} Failed to upload ${filename}: ${message}`);
        }

        if (delayMs > 0 && index < entries.length - 1) {
            await new Promise((resolve) => setTimeout(resolve, delayMs));
        }
    }

    const uploaded = results.filter((result) => result.documentId !== null).length;
    return { uploaded, failed: results.length - uploaded, results };
}
