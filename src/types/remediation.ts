import type { FaultCode } from './incident.js';

/** Fixed playbook entry. One per {@link FaultCode}; never derived from runtime input. */
export interface ActionSpec {
    faultCode: FaultCode;
    actionId: string;
    scriptPath: string;
    summary: string;
    verificationHint: string;
}

export interface ManualTriageAction {
    faultCode: null;
    actionId: 'manual_triage';
    scriptPath: null;
    summary: string;
    verificationHint: string;
}

export type SelectedAction = ActionSpec | ManualTriageAction;

export type WorkflowStep =
    | 'detect'
    | 'retrieve_context'
    | 'propose_fix'
    | 'await_approval'
    | 'execute_playbook'
    | 'verify_health';

export type PlanDecision = 'ready_for_approval' | 'manual_triage_required';

export interface PlanEvidenceSummary {
    ragSummary: string;
    retrievedMemoryCount: number;
    retrievedFileCount: number;
}

export interface RemediationPlan {
    incidentId: number;
    workflow: WorkflowStep[];
    decision: PlanDecision;
    requiresApproval: true;
    confidence: number;
    selectedAction: SelectedAction;
    evidence: PlanEvidenceSummary;
}

// ── Approval ────────────────────────────────────────────────────────────────

export interface ExecutionPayload {
    actionId: string;
    scriptPath: string;
    verificationHint: string;
}

export type ApprovalResult =
    | { status: 'approval_required'; message: string; plan: RemediationPlan }
    | { status: 'blocked'; message: string; plan: RemediationPlan }
    | {
        status: 'approved_for_pipeline';
        message: string;
        execution: ExecutionPayload;
        plan: RemediationPlan;
    };

export type ApprovalStatus = ApprovalResult['status'];

// ── Execution ───────────────────────────────────────────────────────────────

/** Executor input; payloads may arrive from callers other than the gate. */
export interface ExecutionRequest {
    status: string;
    execution?: Partial<ExecutionPayload>;
}

export interface ExecutionOutcome {
    actionId: string;
    scriptPath: string;
    returnCode: number;
    stdout: string;
    stderr: string;
    verificationHint: string;
}

export type ExecutionResult =
    | { status: 'blocked'; message: string }
    | { status: 'failed'; message: string; executionResult?: ExecutionOutcome }
    | { status: 'executed'; message: string; executionResult: ExecutionOutcome };
