import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { LogEvent } from '../types/log-events.js';
import { getErrorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

export interface LogEventQuery {
    logGroups: readonly string[];
    lookbackMinutes: number;
}

/** Supplier of recent raw log events. */
export interface LogEventSource {
    fetchRecent(query: LogEventQuery): Promise<LogEvent[]>;
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toLogEvent(value: unknown): LogEvent | null {
    if (!isObjectRecord(value)) return null;
    const { logGroup, logStream, timestamp, message } = value;
    if (typeof logGroup !== 'string' || typeof message !== 'string') return null;
    if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) return null;
    return {
        logGroup,
        logStream: typeof logStream === 'string' ? logStream : '',
        timestamp,
        message: message.replace(/\n+$/, ''),
    };
}

export interface JsonlLogEventSourceOptions {
    now?: () => number;
}

/**
 * Reads one `{logGroup, logStream, timestamp, message}` object per line.
 * A missing file yields no events; unparseable lines are skipped.
 */
export class JsonlLogEventSource implements LogEventSource {
    readonly #filePath: string;
    readonly #now: () => number;

    constructor(filePath: string, options: JsonlLogEventSourceOptions = {}) {
        this.#filePath = path.resolve(filePath);
        this.#now = options.now ?? (() => Date.now());
    }

    async fetchRecent(query: LogEventQuery): Promise<LogEvent[]> {
        if (query.logGroups.length === 0) {
            return [];
        }

        let raw: string;
        try {
            raw = await readFile(this.#filePath, 'utf8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return [];
            }
            throw error;
        }

        const since = this.#now() - query.lookbackMinutes * 60_000;
        const groups = new Set(query.logGroups);
        const events: LogEvent[] = [];
        let skipped = 0;

        for (const line of raw.split(/\r?\n/)) {
            if (!line.trim()) continue;
            let parsed: unknown;
            try {
                parsed = JSON.parse(line);
            } catch (error) {
                skipped++;
                if (skipped === 1) {
                    void logThought(`[LogEventSource] Skipping malformed line in ${this.#filePath}: ${getErrorMessage(error)}`);
                }
                continue;
            }
            const event = toLogEvent(parsed);
            if (!event || !event.message) continue;
            if (!groups.has(event.logGroup) || event.timestamp < since) continue;
            events.push(event);
        }

        return events.sort((left, right) => right.timestamp - left.timestamp);
    }
}
