import type {
    EvidenceResult,
    Incident,
    IncidentPatch,
    IncidentResolution,
} from '../types/incident.js';
import { getErrorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import type { EvidenceRetriever } from './evidence-retriever.js';
import { parseBreadcrumbs, type IncidentStore } from './incident-store.js';

export interface IncidentLifecycleDeps {
    store: IncidentStore;
    retriever: EvidenceRetriever;
}

/**
 * Record, analyze and resolve incidents.
 *
 * Evidence retrieval and re-indexing are best-effort: their failures are
 * logged and the incident is returned as last committed. Storage errors
 * propagate.
 */
export class IncidentLifecycle {
    readonly #store: IncidentStore;
    readonly #retriever: EvidenceRetriever;

    constructor(deps: IncidentLifecycleDeps) {
        this.#store = deps.store;
        this.#retriever = deps.retriever;
    }

    record(errorCode: string, symptoms: string, breadcrumbs: string[] = []): Incident {
        const incident = this.#store.create({ errorCode, symptoms, breadcrumbs });
        void logThought(`[IncidentLifecycle] Recorded incident ${incident.id} (${incident.errorCode}).`);
        return incident;
    }

    async analyze(incident: Incident, metrics?: Record<string, string>): Promise<Incident> {
        const markers = parseBreadcrumbs(incident);

        let evidence: EvidenceResult;
        try {
            evidence = await this.#retriever.queryIncident({ symptoms: incident.symptoms, markers, metrics });
        } catch (error) {
            void logThought(
                `[IncidentLifecycle] Evidence query failed for incident ${incident.id}: ${getErrorMessage(error)}`,
            );
            return incident;
        }

        const patch: IncidentPatch = {
            ragQuery: JSON.stringify({ symptoms: incident.symptoms, markers }),
            ragResponse: JSON.stringify({
                content: evidence.content,
                retrieved_memories: evidence.retrievedMemories,
                retrieved_files: evidence.retrievedFiles,
            }),
            // The evidence service returns no score.
            ragConfidence: null,
        };
        if (!incident.rootCause && evidence.content) {
            patch.rootCause = evidence.content;
        }

        return this.#store.update(incident.id, patch);
    }

    async detectAndAnalyze(
        errorCode: string,
        symptoms: string,
        breadcrumbs: string[] = [],
        metrics?: Record<string, string>,
    ): Promise<Incident> {
        const incident = this.record(errorCode, symptoms, breadcrumbs);
        return this.analyze(incident, metrics);
    }

    /** Commit the outcome, then index the incident back into the evidence store. */
    async resolve(incident: Incident, resolution: IncidentResolution): Promise<Incident> {
        const resolved = this.#store.update(incident.id, {
            rootCause: resolution.rootCause ?? '',
            remediation: resolution.remediation ?? '',
            verification: resolution.verification,
            resolved: resolution.resolved ?? true,
        });

        let documentId: string | null;
        try {
            documentId = await this.#retriever.indexIncident(resolved);
        } catch (error) {
            void logThought(`[IncidentLifecycle] Indexing incident ${resolved.id} failed: ${getErrorMessage(error)}`);
            return resolved;
        }

        void logThought(`[IncidentLifecycle] Resolved incident ${resolved.id}, indexed as ${documentId ?? 'none'}.`);
        if (!documentId) {
            return resolved;
        }
        return this.#store.update(resolved.id, { evidenceDocId: documentId });
    }
}
