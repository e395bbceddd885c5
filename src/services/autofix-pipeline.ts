import type { FaultEvent } from '../types/incident.js';
import type { ExecutionResult, PlanDecision } from '../types/remediation.js';
import { getErrorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import type { ActionExecutor } from './action-executor.js';
import { approvePlan } from './approval-gate.js';
import { buildAutofixInputs, parseFaultLog } from './fault-parser.js';
import type { FaultDedupGate } from './fault-dedup.js';
import type { IncidentBroadcaster } from './incident-broadcaster.js';
import type { IncidentLifecycle } from './incident-lifecycle.js';
import { buildRemediationPlan } from './remediation-planner.js';

export interface AutofixPipelineDeps {
    lifecycle: IncidentLifecycle;
    executor: ActionExecutor;
    gate: FaultDedupGate;
    broadcaster: IncidentBroadcaster;
    /** Read on every line so the flag can change without a restart. */
    isEnabled: () => boolean;
}

export interface AutofixOutcome {
    incidentId: number;
    decision: PlanDecision;
    actionId: string;
    executionStatus: ExecutionResult['status'];
    resolved: boolean;
}

export type IngestResult =
    | { status: 'not_a_fault' }
    | { status: 'disabled'; event: FaultEvent }
    | { status: 'duplicate'; event: FaultEvent }
    | { status: 'accepted'; event: FaultEvent };

/**
 * Unattended remediation for structured fault log lines:
 * parse, dedup, record and analyze, plan, approve, execute, resolve.
 */
export class AutofixPipeline {
    readonly #deps: AutofixPipelineDeps;
    readonly #inFlight: Set<Promise<void>> = new Set();

    constructor(deps: AutofixPipelineDeps) {
        this.#deps = deps;
    }

    /** Admitted events are processed in the background; this never waits on them. */
    ingestLine(line: string): IngestResult {
        const event = parseFaultLog(line);
        if (!event) {
            return { status: 'not_a_fault' };
        }
        if (!this.#deps.isEnabled()) {
            return { status: 'disabled', event };
        }
        if (!this.#deps.gate.admit(event)) {
            void logThought(`[AutofixPipeline] Suppressed duplicate ${event.errorCode} on ${event.route}.`);
            return { status: 'duplicate', event };
        }

        const task = this.process(event)
            .then(() => undefined)
            .catch((error: unknown) => {
                void logThought(`[AutofixPipeline] Autofix for ${event.errorCode} failed: ${getErrorMessage(error)}`);
            })
            .finally(() => {
                this.#inFlight.delete(task);
            });
        this.#inFlight.add(task);
        return { status: 'accepted', event };
    }

    async process(event: FaultEvent): Promise<AutofixOutcome> {
        const { lifecycle, executor, broadcaster } = this.#deps;
        const inputs = buildAutofixInputs(event);

        const incident = await lifecycle.detectAndAnalyze(
            event.errorCode,
            inputs.symptoms,
            inputs.breadcrumbs,
            inputs.metrics,
        );
        broadcaster.publish('created', incident);

        const plan = buildRemediationPlan(incident);
        const approval = approvePlan(plan, true);
        const execution = await executor.execute(approval);

        const executed = execution.status === 'executed';
        const verification = (execution.status !== 'blocked' && execution.executionResult?.verificationHint)
            || execution.message;
        const rootCause = plan.evidence.ragSummary || incident.rootCause || `Auto-detected ${event.errorCode}`;

        const resolved = await lifecycle.resolve(incident, {
            rootCause,
            remediation: plan.selectedAction.summary,
            verification,
            resolved: executed,
        });
        broadcaster.publish('auto_resolved', resolved);

        void logThought(
            `[AutofixPipeline] Incident ${incident.id}: ${plan.decision}, ${plan.selectedAction.actionId} -> ${execution.status}.`,
        );

        return {
            incidentId: incident.id,
            decision: plan.decision,
            actionId: plan.selectedAction.actionId,
            executionStatus: execution.status,
            resolved: executed,
        };
    }

    /** Wait for every background run started so far. */
    async drain(): Promise<void> {
        await Promise.all([...this.#inFlight]);
    }

    get pendingCount(): number {
        return this.#inFlight.size;
    }
}
