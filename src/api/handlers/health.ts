import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { IncidentStore } from '../../services/incident-store.js';
import type { JobScheduler } from '../../services/job-scheduler.js';
import { RECONSTRUCTION_JOB_ID, type ReconstructionJob } from '../../services/reconstruction-job.js';
import type { WsHub } from '../websocket-hub.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    store: IncidentStore;
    scheduler: JobScheduler;
    isAutoRemediateEnabled: () => boolean;
    evidenceConfigured: boolean;
    reconstruction?: ReconstructionJob;
    wsHub?: WsHub;
}

/** GET /health: Returns process health and subsystem summaries. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const job = deps.scheduler.getJob(RECONSTRUCTION_JOB_ID) ?? null;

        const data: HealthData = {
            status: job?.status === 'error' ? 'degraded' : 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            incidents: { total: deps.store.count() },
            autoRemediate: deps.isAutoRemediateEnabled(),
            evidenceConfigured: deps.evidenceConfigured,
            websocket: deps.wsHub?.getMetrics() ?? null,
            reconstruction: {
                job,
                lastGeneratedAt: deps.reconstruction?.latest?.generatedAt ?? null,
            },
        };

        sendOk(res, data);
    };
}
