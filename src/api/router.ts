import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth, type HealthDeps } from './handlers/health.js';
import { handleConfigValidate } from './handlers/config-validate.js';
import {
    handleAnalyzeIncident,
    handleBuildPlan,
    handleCreateIncident,
    handleExecutePlan,
    handleGetIncident,
    handleIngestLog,
    handleListIncidents,
    handleReconstructed,
    handleResolveIncident,
    handleSeedKnowledgeBase,
    handleSetupAssistant,
    type IncidentDeps,
} from './handlers/incidents.js';
import {
    handleReadSourceFile,
    handleWriteSourceFile,
    type SourceControlDeps,
} from './handlers/source-control.js';
import { requestLogger, requireSignature, sendError, sendOk, setRawRequestBody } from './shared.js';
import type { WsHub } from './websocket-hub.js';
import { getConfigValue } from '../config/json-config.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps extends IncidentDeps, SourceControlDeps {
    health: Omit<HealthDeps, 'store' | 'reconstruction' | 'wsHub' | 'isAutoRemediateEnabled'>;
    wsHub?: WsHub;
}

const DEFAULT_PORT = 8000;

/**
 * Build the control-plane express app without binding a port.
 *
 * Endpoints:
 *   GET  /health                        Process health snapshot
 *   GET  /config/validate               Runtime config report (signed)
 *   GET  /incidents                     Recent incidents, newest first
 *   GET  /incidents/reconstructed       Latest log-reconstruction snapshot
 *   GET  /incidents/:id                 Single incident
 *   POST /incidents                     Record an incident
 *   POST /incidents/ingest-log          Feed one fault line to the autofix pipeline
 *   POST /incidents/setup-assistant     Provision the evidence assistant (signed)
 *   POST /incidents/seed-kb             Upload built-in resolved incidents (signed)
 *   POST /incidents/:id/analyze         Query evidence for an incident
 *   POST /incidents/:id/agent-plan      Build the remediation plan
 *   POST /incidents/:id/agent-execute   Approve the plan for the pipeline
 *   POST /incidents/:id/resolve         Resolve and index an incident
 *   GET  /source/file?path=             Read a repository file (signed)
 *   PUT  /source/file                   Optimistic repository write (signed)
 *   GET  /ws/metrics                    WebSocket hub metrics (signed)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({
        verify: (req, _res, buffer) => {
            setRawRequestBody(req, buffer);
        },
    }));
    app.use(requestLogger);

    const healthDeps: HealthDeps = {
        ...deps.health,
        store: deps.store,
        isAutoRemediateEnabled: deps.isAutoRemediateEnabled,
        reconstruction: deps.reconstruction,
        wsHub: deps.wsHub,
    };

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(healthDeps));
    app.get('/config/validate', requireSignature, handleConfigValidate());

    app.get('/incidents', handleListIncidents(deps));
    app.get('/incidents/reconstructed', handleReconstructed(deps));
    app.get('/incidents/:id', handleGetIncident(deps));
    app.post('/incidents', handleCreateIncident(deps));
    app.post('/incidents/ingest-log', handleIngestLog(deps));
    app.post('/incidents/setup-assistant', requireSignature, handleSetupAssistant(deps));
    app.post('/incidents/seed-kb', requireSignature, handleSeedKnowledgeBase(deps));
    app.post('/incidents/:id/analyze', handleAnalyzeIncident(deps));
    app.post('/incidents/:id/agent-plan', handleBuildPlan(deps));
    app.post('/incidents/:id/agent-execute', handleExecutePlan(deps));
    app.post('/incidents/:id/resolve', handleResolveIncident(deps));

    app.get('/source/file', requireSignature, handleReadSourceFile(deps));
    app.put('/source/file', requireSignature, handleWriteSourceFile(deps));

    app.get('/ws/metrics', requireSignature, (_req, res) => {
        if (!deps.wsHub) {
            sendError(res, 'WebSocket hub not initialized.', 503);
            return;
        }
        sendOk(res, deps.wsHub.getMetrics());
    });

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    return app;
}

/** Create the app, attach the WebSocket hub and start listening on `API_PORT`. */
export function startApiServer(deps: ApiServerDeps): Server {
    const app = createApiApp(deps);
    const port = Number(getConfigValue('API_PORT')) || DEFAULT_PORT;
    const server = createServer(app);

    if (deps.wsHub) {
        deps.wsHub.attach(server);
    }

    server.listen(port, () => {
        console.log(`[faultline API] Control plane listening on http://localhost:${port}`);
        void logThought(`[API] HTTP server started on port ${port}.`);
    });
    return server;
}
