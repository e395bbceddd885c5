import { FAULT_CODES, type FaultCode } from '../types/incident.js';
import type { ActionSpec, ManualTriageAction } from '../types/remediation.js';

/**
 * Code-reviewed remediation playbooks, one per fault code.
 *
 * This table is the executor's only source of runnable scripts; nothing
 * derived from incident text or model output can add to it.
 */
export const PLAYBOOKS: Readonly<Record<FaultCode, ActionSpec>> = {
    FAULT_SQL_INJECTION_TEST: {
        faultCode: 'FAULT_SQL_INJECTION_TEST',
        actionId: 'fix_fault_sql_injection',
        scriptPath: 'scripts/remediation/fix_fault_sql_injection.sh',
        summary: 'Wrap faulty SQL path with controlled exception handling and explicit transaction rollback.',
        verificationHint: 'Re-run /test-fault/run and verify no open transaction leakage in logs/metrics.',
    },
    FAULT_EXTERNAL_API_LATENCY: {
        faultCode: 'FAULT_EXTERNAL_API_LATENCY',
        actionId: 'fix_fault_external_api_latency',
        scriptPath: 'scripts/remediation/fix_fault_external_api_latency.sh',
        summary: 'Enable timeout-aware retries with backoff and degraded fallback for upstream failures.',
        verificationHint: 'Re-run /test-fault/external-api and verify latency/error rate returns within threshold.',
    },
    FAULT_DB_TIMEOUT: {
        faultCode: 'FAULT_DB_TIMEOUT',
        actionId: 'fix_fault_db_timeout',
        scriptPath: 'scripts/remediation/fix_fault_db_timeout.sh',
        summary: 'Apply DB timeout/pool hardening and reduce long-running test query blast radius.',
        verificationHint: 'Re-run /test-fault/db-timeout concurrently and verify pool stability and healthy /up checks.',
    },
};

/** Lowercase markers per fault code; scanned in {@link FAULT_CODES} order. */
export const FAULT_KEYWORDS: Readonly<Record<FaultCode, readonly string[]>> = {
    FAULT_SQL_INJECTION_TEST: ['invalid sql', 'syntax error', 'programmingerror', 'rollback'],
    FAULT_EXTERNAL_API_LATENCY: ['timeout', 'upstream', 'connectionerror', 'latency', 'retry'],
    FAULT_DB_TIMEOUT: ['pg_sleep', 'queuepool', 'pool exhaustion', 'statement_timeout', 'db timeout'],
};

export const MANUAL_TRIAGE_ACTION: Readonly<ManualTriageAction> = {
    faultCode: null,
    actionId: 'manual_triage',
    scriptPath: null,
    summary: 'No deterministic playbook matched this incident.',
    verificationHint: 'Escalate to on-call and attach logs + RAG output.',
};

/** Script paths the executor may run, exactly as declared in {@link PLAYBOOKS}. */
export const ALLOWED_SCRIPT_PATHS: ReadonlySet<string> = new Set(
    FAULT_CODES.map((code) => PLAYBOOKS[code].scriptPath),
);

export function getPlaybook(code: FaultCode): ActionSpec {
    return PLAYBOOKS[code];
}

/** First fault code (in table order) with a keyword contained in `text`. */
export function inferFaultCodeFromText(text: string): FaultCode | null {
    const lowered = text.toLowerCase();
    for (const code of FAULT_CODES) {
        if (FAULT_KEYWORDS[code].some((keyword) => lowered.includes(keyword))) {
            return code;
        }
    }
    return null;
}

export function textHasKeyword(code: FaultCode, text: string): boolean {
    const lowered = text.toLowerCase();
    return FAULT_KEYWORDS[code].some((keyword) => lowered.includes(keyword));
}
