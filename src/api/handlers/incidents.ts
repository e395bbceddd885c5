import type { Request, Response } from 'express';
import type {
    CreateIncidentBody,
    IngestLogData,
    ResolveIncidentBody,
    SetupAssistantBody,
} from '../../types/api.js';
import type { Incident } from '../../types/incident.js';
import type { AssistantSetup } from '../../services/evidence-retriever.js';
import type { AutofixPipeline } from '../../services/autofix-pipeline.js';
import type { IncidentBroadcaster } from '../../services/incident-broadcaster.js';
import type { IncidentLifecycle } from '../../services/incident-lifecycle.js';
import type { IncidentStore } from '../../services/incident-store.js';
import { seedKnowledgeBase, type DocumentUploader } from '../../services/knowledge-base.js';
import type { ReconstructionJob } from '../../services/reconstruction-job.js';
import { approvePlan } from '../../services/approval-gate.js';
import { buildRemediationPlan } from '../../services/remediation-planner.js';
import { mapError, readBody, sendError, sendOk } from '../shared.js';

/** Provisions the evidence assistant; {@link BackboardClient} satisfies it. */
export interface AssistantProvisioner {
    setupAssistant(name?: string, systemPrompt?: string): Promise<AssistantSetup>;
}

/** Target of knowledge-base seeding; {@link BackboardClient} satisfies it. */
export interface KnowledgeBaseTarget extends DocumentUploader {
    readonly isConfigured: boolean;
    readonly assistantId: string | null;
}

export interface IncidentDeps {
    store: IncidentStore;
    lifecycle: IncidentLifecycle;
    broadcaster: IncidentBroadcaster;
    pipeline: AutofixPipeline;
    isAutoRemediateEnabled: () => boolean;
    reconstruction?: ReconstructionJob;
    assistants?: AssistantProvisioner;
    knowledgeBase?: KnowledgeBaseTarget;
}

const DEFAULT_LIST_LIMIT = 100;
const MAX_LIST_LIMIT = 500;

// ── Body parsing ────────────────────────────────────────────────────────────

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

function nullableString(value: unknown): string | null | undefined {
    return value === null ? null : optionalString(value);
}

function parseCreateBody(raw: Record<string, unknown>): CreateIncidentBody | string {
    let breadcrumbs: string[] | undefined;
    if (raw.breadcrumbs !== undefined) {
        if (!Array.isArray(raw.breadcrumbs)) {
            return 'breadcrumbs must be an array of strings.';
        }
        const items: unknown[] = raw.breadcrumbs;
        breadcrumbs = items.filter((item): item is string => typeof item === 'string');
        if (breadcrumbs.length !== items.length) {
            return 'breadcrumbs must be an array of strings.';
        }
    }
    return {
        error_code: optionalString(raw.error_code),
        symptoms: optionalString(raw.symptoms),
        breadcrumbs,
    };
}

function parseResolveBody(raw: Record<string, unknown>): ResolveIncidentBody {
    return {
        root_cause: nullableString(raw.root_cause),
        remediation: nullableString(raw.remediation),
        verification: nullableString(raw.verification),
        resolved: typeof raw.resolved === 'boolean' ? raw.resolved : undefined,
    };
}

function parseLimit(value: unknown): number {
    const requested = Number(value ?? DEFAULT_LIST_LIMIT);
    return Number.isFinite(requested) && requested > 0
        ? Math.min(MAX_LIST_LIMIT, Math.floor(requested))
        : DEFAULT_LIST_LIMIT;
}

/** Look up `:id`, answering 400/404 itself when it cannot. */
function findIncident(deps: IncidentDeps, req: Request, res: Response): Incident | null {
    const rawId = req.params.id;
    if (!/^\d+$/.test(rawId)) {
        sendError(res, 'Invalid incident id.', 400);
        return null;
    }
    const incident = deps.store.get(Number(rawId));
    if (!incident) {
        sendError(res, 'Incident not found.', 404);
        return null;
    }
    return incident;
}

// ── Handlers ────────────────────────────────────────────────────────────────

/** GET /incidents: newest first. */
export function handleListIncidents(deps: IncidentDeps) {
    return (req: Request, res: Response): void => {
        sendOk(res, { incidents: deps.store.listRecent(parseLimit(req.query.limit)) });
    };
}

/** GET /incidents/:id */
export function handleGetIncident(deps: IncidentDeps) {
    return (req: Request, res: Response): void => {
        const incident = findIncident(deps, req, res);
        if (incident) {
            sendOk(res, incident);
        }
    };
}

/** POST /incidents: record only; analysis is a separate call. */
export function handleCreateIncident(deps: IncidentDeps) {
    return (req: Request, res: Response): void => {
        const body = parseCreateBody(readBody(req));
        if (typeof body === 'string') {
            sendError(res, body, 400);
            return;
        }

        try {
            const incident = deps.lifecycle.record(
                body.error_code ?? 'UNKNOWN',
                body.symptoms ?? '',
                body.breadcrumbs ?? [],
            );
            deps.broadcaster.publish('created', incident);
            sendOk(res, incident, 201);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}

/** POST /incidents/:id/analyze */
export function handleAnalyzeIncident(deps: IncidentDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const incident = findIncident(deps, req, res);
        if (!incident) return;

        try {
            const analyzed = await deps.lifecycle.analyze(incident);
            deps.broadcaster.publish('analyzed', analyzed);
            sendOk(res, analyzed);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}

/** POST /incidents/:id/agent-plan */
export function handleBuildPlan(deps: IncidentDeps) {
    return (req: Request, res: Response): void => {
        const incident = findIncident(deps, req, res);
        if (incident) {
            sendOk(res, buildRemediationPlan(incident));
        }
    };
}

/**
 * POST /incidents/:id/agent-execute: approve the plan for the CI/CD
 * pipeline. The script itself runs elsewhere.
 */
export function handleExecutePlan(deps: IncidentDeps) {
    return (req: Request, res: Response): void => {
        const incident = findIncident(deps, req, res);
        if (!incident) return;

        const approve = readBody(req).approve;
        const approved = typeof approve === 'boolean' ? approve : deps.isAutoRemediateEnabled();
        const plan = buildRemediationPlan(incident);
        const result = approvePlan(plan, approved);

        if (result.status !== 'approved_for_pipeline') {
            sendOk(res, result, 400);
            return;
        }

        try {
            const ragSummary = plan.evidence.ragSummary;
            const updated = deps.store.update(incident.id, {
                remediation: plan.selectedAction.summary,
                ...(!incident.rootCause && ragSummary ? { rootCause: ragSummary } : {}),
            });
            deps.broadcaster.publish('plan_approved', updated);
            sendOk(res, result);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}

/** POST /incidents/:id/resolve */
export function handleResolveIncident(deps: IncidentDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const incident = findIncident(deps, req, res);
        if (!incident) return;

        const body = parseResolveBody(readBody(req));
        try {
            const resolved = await deps.lifecycle.resolve(incident, {
                rootCause: body.root_cause ?? '',
                remediation: body.remediation ?? '',
                verification: body.verification ?? '',
                resolved: body.resolved ?? true,
            });
            deps.broadcaster.publish('resolved', resolved);
            sendOk(res, resolved);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}

/** POST /incidents/setup-assistant: one-time evidence store provisioning. */
export function handleSetupAssistant(deps: IncidentDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        if (!deps.assistants) {
            sendError(res, 'Evidence assistant provisioning not initialized.', 503);
            return;
        }

        const raw = readBody(req);
        const body: SetupAssistantBody = {
            name: optionalString(raw.name),
            description: optionalString(raw.description),
        };
        try {
            const setup = await deps.assistants.setupAssistant(body.name, body.description);
            sendOk(res, {
                ...setup,
                message: 'Save assistantId as BACKBOARD_ASSISTANT_ID and threadId as BACKBOARD_THREAD_ID.',
            }, 201);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}

/** POST /incidents/seed-kb: upload the built-in resolved incidents to the evidence store. */
export function handleSeedKnowledgeBase(deps: IncidentDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        const target = deps.knowledgeBase;
        if (!target) {
            sendError(res, 'Knowledge base seeding not initialized.', 503);
            return;
        }
        if (!target.isConfigured || !target.assistantId) {
            sendError(
                res,
                'BACKBOARD_API_KEY and BACKBOARD_ASSISTANT_ID must be set. Call POST /incidents/setup-assistant first.',
                400,
            );
            return;
        }

        try {
            sendOk(res, await seedKnowledgeBase(target, target.assistantId), 201);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}

/** POST /incidents/ingest-log: hand one structured fault line to the autofix pipeline. */
export function handleIngestLog(deps: IncidentDeps) {
    return (req: Request, res: Response): void => {
        const line = readBody(req).line;
        if (typeof line !== 'string' || !line.trim()) {
            sendError(res, 'Body must include a non-empty "line" string.', 400);
            return;
        }

        const result = deps.pipeline.ingestLine(line);
        switch (result.status) {
            case 'not_a_fault':
                sendError(res, 'Line is not a structured fault event.', 400);
                return;
            case 'duplicate':
            case 'disabled': {
                const data: IngestLogData = { accepted: false, reason: result.status, event: result.event };
                sendOk(res, data);
                return;
            }
            case 'accepted': {
                const data: IngestLogData = { accepted: true, event: result.event };
                sendOk(res, data, 202);
                return;
            }
        }
    };
}

/** GET /incidents/reconstructed: latest job snapshot, or a fresh run. */
export function handleReconstructed(deps: IncidentDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        if (!deps.reconstruction) {
            sendError(res, 'Log reconstruction not initialized.', 503);
            return;
        }

        const refresh = req.query.refresh === 'true';
        try {
            const snapshot = !refresh && deps.reconstruction.latest
                ? deps.reconstruction.latest
                : await deps.reconstruction.run();
            sendOk(res, snapshot);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}
