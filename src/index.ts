import 'dotenv/config';
import path from 'node:path';
import { startApiServer } from './api/router.js';
import { WsHub } from './api/websocket-hub.js';
import { assertRuntimeConfig } from './config/env-validator.js';
import {
    DEFAULT_LOG_GROUP,
    getConfigValue,
    readBooleanConfig,
    readListConfig,
    readNumberConfig,
} from './config/json-config.js';
import { ActionExecutor } from './services/action-executor.js';
import { AutofixPipeline } from './services/autofix-pipeline.js';
import { openDatabase } from './services/db.js';
import { BackboardClient } from './services/evidence-retriever.js';
import { FaultDedupGate } from './services/fault-dedup.js';
import { IncidentBroadcaster } from './services/incident-broadcaster.js';
import { IncidentLifecycle } from './services/incident-lifecycle.js';
import { IncidentStore } from './services/incident-store.js';
import { JobScheduler } from './services/job-scheduler.js';
import { JsonlLogEventSource } from './services/log-event-source.js';
import { ReconstructionJob } from './services/reconstruction-job.js';
import { GitHubSourceControl } from './services/source-control.js';
import { getErrorMessage } from './utils/errors.js';
import { logThought } from './utils/logger.js';

const DEFAULT_RECONSTRUCT_CRON = '*/30 * * * * *';
const DEFAULT_LOG_EVENTS_PATH = 'memory/log-events.jsonl';
const SNAPSHOT_INCIDENT_LIMIT = 20;

// ── Config preflight ─────────────────────────────────────────────────────────

try {
    const preflight = assertRuntimeConfig();
    if (preflight.issues.length > 0) {
        const summary = preflight.issues.map((issue) => issue.message).join(' | ');
        console.warn(`[faultline] Config warnings: ${summary}`);
        void logThought(`[Config] ${summary}`);
    }
} catch (error) {
    console.error(`[faultline] Startup blocked by config preflight: ${getErrorMessage(error)}`);
    process.exit(1);
}

const isAutoRemediateEnabled = (): boolean => readBooleanConfig('AGENT_AUTO_REMEDIATE', true);

// ── Persistence & Evidence ───────────────────────────────────────────────────

const db = openDatabase();
const store = new IncidentStore(db);
const backboard = new BackboardClient();
const lifecycle = new IncidentLifecycle({ store, retriever: backboard });

if (!backboard.isConfigured) {
    void logThought('[faultline] BACKBOARD_API_KEY not set; evidence queries will fail and be skipped.');
}

// ── Broadcast ────────────────────────────────────────────────────────────────

const wsHub = new WsHub();
const broadcaster = new IncidentBroadcaster(wsHub);

// ── Autofix Pipeline ─────────────────────────────────────────────────────────

const executor = new ActionExecutor({
    projectRoot: path.resolve(getConfigValue('PROJECT_ROOT') ?? process.cwd()),
    timeoutMs: readNumberConfig('REMEDIATION_TIMEOUT_MS', 60_000),
});
const gate = new FaultDedupGate({ windowMs: readNumberConfig('DEDUP_WINDOW_MS', 2_000) });
const pipeline = new AutofixPipeline({ lifecycle, executor, gate, broadcaster, isEnabled: isAutoRemediateEnabled });

// ── Scheduled Reconstruction ─────────────────────────────────────────────────

const scheduler = new JobScheduler();
const configuredGroups = readListConfig('LOG_GROUPS');
const reconstruction = new ReconstructionJob(
    {
        scheduler,
        source: new JsonlLogEventSource(path.resolve(getConfigValue('LOG_EVENTS_PATH') ?? DEFAULT_LOG_EVENTS_PATH)),
        broadcaster,
    },
    {
        cronExpression: getConfigValue('LOG_RECONSTRUCT_CRON') ?? DEFAULT_RECONSTRUCT_CRON,
        logGroups: configuredGroups.length > 0 ? configuredGroups : [DEFAULT_LOG_GROUP],
        lookbackMinutes: readNumberConfig('LOG_LOOKBACK_MINUTES', 120),
        onlyFaultCodes: readBooleanConfig('LOG_ONLY_FAULT_CODES', true),
    },
);
reconstruction.register();

scheduler.on('job:error', (event) => {
    void logThought(`[faultline] Job '${event.jobId}' failed: ${event.error ?? 'unknown error'}`);
});

// ── Initial snapshot for new subscribers ─────────────────────────────────────

wsHub.onSubscribe = (clientId, topics) => {
    wsHub.sendSnapshotTo(clientId, {
        incidents: topics.includes('incidents')
            ? {
                recent: store.listRecent(SNAPSHOT_INCIDENT_LIMIT),
                reconstructed: reconstruction.latest,
            }
            : undefined,
        health: topics.includes('health')
            ? { incidents: store.count(), jobs: scheduler.listJobs() }
            : undefined,
    });
};

// ── Control Plane HTTP API ───────────────────────────────────────────────────

const server = startApiServer({
    store,
    lifecycle,
    broadcaster,
    pipeline,
    isAutoRemediateEnabled,
    reconstruction,
    assistants: backboard,
    knowledgeBase: backboard,
    sourceControl: new GitHubSourceControl(),
    wsHub,
    health: { scheduler, evidenceConfigured: backboard.isConfigured },
});

void logThought('[faultline] Process started; pipeline, scheduler and API initialized.');

// ── Signal Handlers ──────────────────────────────────────────────────────────

function shutdown(signal: string): void {
    scheduler.stopAll();
    wsHub.stop();
    server.close();
    void pipeline.drain().finally(() => {
        db.close();
        void logThought(`[faultline] Received ${signal}; services stopped.`);
        process.exit(0);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
