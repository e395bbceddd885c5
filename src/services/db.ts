import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import { getConfigValue } from '../config/json-config.js';

export type IncidentDatabase = Database.Database;

const DEFAULT_DB_PATH = 'memory/faultline.db';
const IN_MEMORY = ':memory:';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS incidents (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    detected_at TEXT NOT NULL,
    error_code TEXT NOT NULL,
    symptoms TEXT NOT NULL DEFAULT '',
    breadcrumbs TEXT,
    root_cause TEXT,
    remediation TEXT,
    verification TEXT,
    resolved INTEGER NOT NULL DEFAULT 0,
    rag_query TEXT,
    rag_response TEXT,
    rag_confidence REAL,
    evidence_doc_id TEXT,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_incidents_detected_at
    ON incidents(detected_at DESC);
  CREATE INDEX IF NOT EXISTS idx_incidents_error_code
    ON incidents(error_code);
`;

/**
 * Open (and migrate) the incident database.
 *
 * Pass `':memory:'` for an isolated, process-local store.
 */
export function openDatabase(filePath?: string): IncidentDatabase {
    const target = filePath ?? getConfigValue('DATABASE_PATH') ?? DEFAULT_DB_PATH;

    if (target !== IN_MEMORY) {
        const resolved = path.resolve(target);
        if (!fs.existsSync(path.dirname(resolved))) {
            fs.mkdirSync(path.dirname(resolved), { recursive: true });
        }
        const db = new Database(resolved);
        db.pragma('journal_mode = WAL');
        db.exec(SCHEMA);
        return db;
    }

    const db = new Database(IN_MEMORY);
    db.exec(SCHEMA);
    return db;
}

// ── Incident Rows ───────────────────────────────────────────────────────────

export interface IncidentRow {
    id: number;
    detected_at: string;
    error_code: string;
    symptoms: string;
    breadcrumbs: string | null;
    root_cause: string | null;
    remediation: string | null;
    verification: string | null;
    resolved: number;
    rag_query: string | null;
    rag_response: string | null;
    rag_confidence: number | null;
    evidence_doc_id: string | null;
    updated_at: string;
}

export interface IncidentRowInput {
    detectedAt: string;
    errorCode: string;
    symptoms: string;
    breadcrumbsJson: string | null;
}

/** Columns that may change after creation. `error_code` and `detected_at` never do. */
export interface IncidentRowPatch {
    root_cause?: string | null;
    remediation?: string | null;
    verification?: string | null;
    resolved?: number;
    rag_query?: string | null;
    rag_response?: string | null;
    rag_confidence?: number | null;
    evidence_doc_id?: string | null;
}

type SqlValue = string | number | null;

const PATCHABLE_COLUMNS = [
    'root_cause',
    'remediation',
    'verification',
    'resolved',
    'rag_query',
    'rag_response',
    'rag_confidence',
    'evidence_doc_id',
] as const satisfies ReadonlyArray<keyof IncidentRowPatch>;

export function insertIncidentRow(db: IncidentDatabase, input: IncidentRowInput): number {
    const result = db
        .prepare<[string, string, string, string | null, string]>(`
            INSERT INTO incidents (detected_at, error_code, symptoms, breadcrumbs, updated_at)
            VALUES (?, ?, ?, ?, ?)
        `)
        .run(input.detectedAt, input.errorCode, input.symptoms, input.breadcrumbsJson, input.detectedAt);
    return Number(result.lastInsertRowid);
}

export function getIncidentRow(db: IncidentDatabase, id: number): IncidentRow | undefined {
    return db.prepare<[number], IncidentRow>('SELECT * FROM incidents WHERE id = ?').get(id);
}

/** Apply a patch in one statement; returns false when no row matched. */
export function updateIncidentRow(
    db: IncidentDatabase,
    id: number,
    patch: IncidentRowPatch,
    updatedAt: string,
): boolean {
    const assignments: string[] = [];
    const values: SqlValue[] = [];

    for (const column of PATCHABLE_COLUMNS) {
        const value = patch[column];
        if (value === undefined) continue;
        assignments.push(`${column} = ?`);
        values.push(value);
    }

    assignments.push('updated_at = ?');
    values.push(updatedAt, id);

    const result = db
        .prepare<SqlValue[]>(`UPDATE incidents SET ${assignments.join(', ')} WHERE id = ?`)
        .run(...values);
    return result.changes > 0;
}

export function listIncidentRows(db: IncidentDatabase, limit = 100): IncidentRow[] {
    const boundedLimit = Math.max(1, Math.min(500, Math.floor(limit)));
    return db
        .prepare<[number], IncidentRow>(`
            SELECT *
            FROM incidents
            ORDER BY detected_at DESC, id DESC
            LIMIT ?
        `)
        .all(boundedLimit);
}

export function countIncidentRows(db: IncidentDatabase): number {
    const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM incidents').get();
    return row?.count ?? 0;
}
