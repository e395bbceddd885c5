import { performance } from 'node:perf_hooks';
import type { FaultEvent } from '../types/incident.js';

export interface FaultDedupOptions {
    windowMs: number;
    /** Monotonic clock in milliseconds. */
    now?: () => number;
}

const DEFAULT_WINDOW_MS = 2_000;

/**
 * At-most-one-per-window gate for identical fault events.
 *
 * Compares only against the last admission for a key, so a stream faster
 * than the window still yields one admission per window. Check-and-set is
 * synchronous and therefore atomic on the event loop.
 */
export class FaultDedupGate {
    readonly #windowMs: number;
    readonly #now: () => number;
    readonly #lastAdmitted: Map<string, number> = new Map();

    constructor(options: Partial<FaultDedupOptions> = {}) {
        this.#windowMs = Math.max(0, Math.floor(options.windowMs ?? DEFAULT_WINDOW_MS));
        this.#now = options.now ?? (() => performance.now());
    }

    get windowMs(): number {
        return this.#windowMs;
    }

    admit(event: FaultEvent): boolean {
        const key = this.#buildKey(event);
        const now = this.#now();
        const last = this.#lastAdmitted.get(key);

        if (last !== undefined && now - last < this.#windowMs) {
            return false;
        }

        this.#lastAdmitted.set(key, now);
        return true;
    }

    clear(): void {
        this.#lastAdmitted.clear();
    }

    getTrackedCount(): number {
        return this.#lastAdmitted.size;
    }

    #buildKey(event: FaultEvent): string {
        return `${event.errorCode}:${event.route}:${event.reason}`;
    }
}
