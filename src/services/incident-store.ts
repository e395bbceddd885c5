import type { Incident, IncidentCreateInput, IncidentPatch } from '../types/incident.js';
import {
    countIncidentRows,
    getIncidentRow,
    insertIncidentRow,
    listIncidentRows,
    updateIncidentRow,
    type IncidentDatabase,
    type IncidentRow,
    type IncidentRowPatch,
} from './db.js';

export interface IncidentStoreOptions {
    now?: () => Date;
}

/**
 * Durable incident records over SQLite.
 *
 * Every write is a single statement, so readers never observe a partial
 * mutation. Errors from the driver propagate: an incident without a
 * persisted identity is meaningless.
 */
export class IncidentStore {
    readonly #db: IncidentDatabase;
    readonly #now: () => Date;

    constructor(db: IncidentDatabase, options: IncidentStoreOptions = {}) {
        this.#db = db;
        this.#now = options.now ?? (() => new Date());
    }

    create(input: IncidentCreateInput): Incident {
        const detectedAt = this.#now().toISOString();
        const id = insertIncidentRow(this.#db, {
            detectedAt,
            errorCode: input.errorCode,
            symptoms: input.symptoms,
            breadcrumbsJson: input.breadcrumbs ? JSON.stringify(input.breadcrumbs) : null,
        });
        return this.#require(id);
    }

    get(id: number): Incident | null {
        const row = getIncidentRow(this.#db, id);
        return row ? toIncident(row) : null;
    }

    /** Apply `patch` and return the committed record. Throws if the incident does not exist. */
    update(id: number, patch: IncidentPatch): Incident {
        const updated = updateIncidentRow(this.#db, id, toRowPatch(patch), this.#now().toISOString());
        if (!updated) {
            throw new Error(`Incident ${id} not found.`);
        }
        return this.#require(id);
    }

    /** Newest first. */
    listRecent(limit = 100): Incident[] {
        return listIncidentRows(this.#db, limit).map(toIncident);
    }

    count(): number {
        return countIncidentRows(this.#db);
    }

    #require(id: number): Incident {
        const incident = this.get(id);
        if (!incident) {
            throw new Error(`Incident ${id} vanished after write.`);
        }
        return incident;
    }
}

function toIncident(row: IncidentRow): Incident {
    return {
        id: row.id,
        detectedAt: row.detected_at,
        errorCode: row.error_code,
        symptoms: row.symptoms,
        breadcrumbs: row.breadcrumbs,
        rootCause: row.root_cause,
        remediation: row.remediation,
        verification: row.verification,
        resolved: row.resolved === 1,
        ragQuery: row.rag_query,
        ragResponse: row.rag_response,
        ragConfidence: row.rag_confidence,
        evidenceDocId: row.evidence_doc_id,
        updatedAt: row.updated_at,
    };
}

function toRowPatch(patch: IncidentPatch): IncidentRowPatch {
    return {
        root_cause: patch.rootCause,
        remediation: patch.remediation,
        verification: patch.verification,
        resolved: patch.resolved === undefined ? undefined : patch.resolved ? 1 : 0,
        rag_query: patch.ragQuery,
        rag_response: patch.ragResponse,
        rag_confidence: patch.ragConfidence,
        evidence_doc_id: patch.evidenceDocId,
    };
}

/** Decode the stored breadcrumb list; malformed or missing JSON yields `[]`. */
export function parseBreadcrumbs(incident: Pick<Incident, 'breadcrumbs'>): string[] {
    if (!incident.breadcrumbs) {
        return [];
    }
    try {
        const parsed: unknown = JSON.parse(incident.breadcrumbs);
        return Array.isArray(parsed) ? parsed.map((item) => String(item)) : [];
    } catch {
        return [];
    }
}
