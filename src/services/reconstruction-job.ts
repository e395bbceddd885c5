import type { IncidentDashboardSummary, LogEvent, ReconstructedIncident } from '../types/log-events.js';
import { logThought } from '../utils/logger.js';
import type { IncidentBroadcaster } from './incident-broadcaster.js';
import { summarizeIncidents } from './incident-summary.js';
import { selectReconstruction } from './log-bucketing.js';
import type { LogEventSource } from './log-event-source.js';
import type { JobScheduler } from './job-scheduler.js';

export const RECONSTRUCTION_JOB_ID = 'log-reconstruction';

export interface ReconstructionJobConfig {
    cronExpression: string;
    logGroups: readonly string[];
    lookbackMinutes: number;
    onlyFaultCodes: boolean;
    allowedFaultCodes?: readonly string[];
}

export interface ReconstructionJobDeps {
    scheduler: JobScheduler;
    source: LogEventSource;
    broadcaster: IncidentBroadcaster;
    now?: () => Date;
}

export interface ReconstructionSnapshot {
    generatedAt: string;
    eventCount: number;
    incidents: ReconstructedIncident[];
    summary: IncidentDashboardSummary;
}

/**
 * Periodically rebuilds incidents from recent log events and keeps the
 * latest snapshot for readers. Runs on the shared {@link JobScheduler}.
 */
export class ReconstructionJob {
    readonly #deps: ReconstructionJobDeps;
    readonly #config: ReconstructionJobConfig;
    readonly #now: () => Date;
    #latest: ReconstructionSnapshot | null = null;

    constructor(deps: ReconstructionJobDeps, config: ReconstructionJobConfig) {
        this.#deps = deps;
        this.#config = config;
        this.#now = deps.now ?? (() => new Date());
    }

    /** Register on the scheduler; `autoStart` false leaves it to `start()`. */
    register(autoStart = true): void {
        this.#deps.scheduler.register({
            id: RECONSTRUCTION_JOB_ID,
            cronExpression: this.#config.cronExpression,
            description: 'Rebuild incidents from recent log events',
            handler: async () => {
                await this.run();
            },
            autoStart,
        });
    }

    start(): void {
        this.#deps.scheduler.start(RECONSTRUCTION_JOB_ID);
    }

    stop(): void {
        this.#deps.scheduler.stop(RECONSTRUCTION_JOB_ID);
    }

    get latest(): ReconstructionSnapshot | null {
        return this.#latest;
    }

    async run(): Promise<ReconstructionSnapshot> {
        const events: LogEvent[] = await this.#deps.source.fetchRecent({
            logGroups: this.#config.logGroups,
            lookbackMinutes: this.#config.lookbackMinutes,
        });

        const incidents = selectReconstruction(
            events,
            this.#config.logGroups,
            this.#config.onlyFaultCodes,
            { allowedFaultCodes: this.#config.allowedFaultCodes },
        );
        const now = this.#now();
        const snapshot: ReconstructionSnapshot = {
            generatedAt: now.toISOString(),
            eventCount: events.length,
            incidents,
            summary: summarizeIncidents(incidents, now),
        };

        this.#latest = snapshot;
        this.#deps.broadcaster.publish('reconstructed', { summary: snapshot.summary, incidents });
        void logThought(
            `[ReconstructionJob] Rebuilt ${incidents.length} incident(s) from ${events.length} log event(s).`,
        );
        return snapshot;
    }
}
