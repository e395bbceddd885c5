import type { ApprovalResult, RemediationPlan } from '../types/remediation.js';

export const APPROVAL_MESSAGES = {
    approvalRequired: 'Set approve=true to execute the selected remediation playbook.',
    manualTriage: 'No safe playbook available; manual triage required.',
    approved: 'Execute the selected remediation script in CI/CD, then run verification checks.',
} as const;

/** Turn a plan into an execution payload only when explicitly approved. Pure. */
export function approvePlan(plan: RemediationPlan, approved: boolean): ApprovalResult {
    if (!approved) {
        return { status: 'approval_required', message: APPROVAL_MESSAGES.approvalRequired, plan };
    }

    const action = plan.selectedAction;
    if (action.actionId === 'manual_triage' || action.scriptPath === null) {
        return { status: 'blocked', message: APPROVAL_MESSAGES.manualTriage, plan };
    }

    return {
        status: 'approved_for_pipeline',
        message: APPROVAL_MESSAGES.approved,
        execution: {
            actionId: action.actionId,
            scriptPath: action.scriptPath,
            verificationHint: action.verificationHint,
        },
        plan,
    };
}
