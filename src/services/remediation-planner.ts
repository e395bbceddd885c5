import { isFaultCode, type FaultCode, type Incident } from '../types/incident.js';
import type {
    PlanDecision,
    RemediationPlan,
    SelectedAction,
    WorkflowStep,
} from '../types/remediation.js';
import { parseBreadcrumbs } from './incident-store.js';
import {
    MANUAL_TRIAGE_ACTION,
    getPlaybook,
    inferFaultCodeFromText,
    textHasKeyword,
} from './playbooks.js';

export const AGENT_WORKFLOW: readonly WorkflowStep[] = [
    'detect',
    'retrieve_context',
    'propose_fix',
    'await_approval',
    'execute_playbook',
    'verify_health',
];

const MAX_CONFIDENCE = 0.99;

interface StoredEvidence {
    content: string;
    retrievedMemories: unknown[];
    retrievedFiles: unknown[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Decode `ragResponse`; anything malformed counts as empty evidence. */
export function parseStoredEvidence(ragResponse: string | null): StoredEvidence {
    const empty: StoredEvidence = { content: '', retrievedMemories: [], retrievedFiles: [] };
    if (!ragResponse) {
        return empty;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(ragResponse);
    } catch {
        return empty;
    }
    if (!isRecord(parsed)) {
        return empty;
    }

    return {
        content: typeof parsed.content === 'string' ? parsed.content : '',
        retrievedMemories: Array.isArray(parsed.retrieved_memories) ? parsed.retrieved_memories : [],
        retrievedFiles: Array.isArray(parsed.retrieved_files) ? parsed.retrieved_files : [],
    };
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

export function scoreConfidence(
    storedCode: string,
    faultCode: FaultCode | null,
    evidence: StoredEvidence,
    breadcrumbs: string[],
): number {
    if (faultCode === null) {
        return 0;
    }

    let score = storedCode === faultCode ? 0.65 : 0.35;
    if (evidence.retrievedMemories.length > 0) score += 0.15;
    if (evidence.retrievedFiles.length > 0) score += 0.1;
    if (textHasKeyword(faultCode, breadcrumbs.join(' '))) score += 0.1;
    if (textHasKeyword(faultCode, evidence.content)) score += 0.1;

    return round2(Math.min(score, MAX_CONFIDENCE));
}

/**
 * Derive a deterministic remediation plan from an incident and its stored
 * evidence. Pure: reads the incident, touches nothing.
 */
export function buildRemediationPlan(incident: Incident): RemediationPlan {
    const evidence = parseStoredEvidence(incident.ragResponse);
    const breadcrumbs = parseBreadcrumbs(incident);
    const faultCode = isFaultCode(incident.errorCode)
        ? incident.errorCode
        : inferFaultCodeFromText(evidence.content);

    let decision: PlanDecision;
    let selectedAction: SelectedAction;
    let confidence: number;

    if (faultCode) {
        decision = 'ready_for_approval';
        selectedAction = { ...getPlaybook(faultCode) };
        confidence = scoreConfidence(incident.errorCode, faultCode, evidence, breadcrumbs);
    } else {
        decision = 'manual_triage_required';
        selectedAction = { ...MANUAL_TRIAGE_ACTION };
        confidence = 0;
    }

    return {
        incidentId: incident.id,
        workflow: [...AGENT_WORKFLOW],
        decision,
        requiresApproval: true,
        confidence,
        selectedAction,
        evidence: {
            ragSummary: evidence.content,
            retrievedMemoryCount: evidence.retrievedMemories.length,
            retrievedFileCount: evidence.retrievedFiles.length,
        },
    };
}
