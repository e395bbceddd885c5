import type { Request, Response, NextFunction } from 'express';
import type { IncomingMessage } from 'node:http';
import { createHmac, timingSafeEqual, randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { getConfigValue } from '../config/json-config.js';
import { EvidenceRetrievalError, SourceControlError, StaleVersionError } from '../utils/errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

const rawBodies = new WeakMap<IncomingMessage, string>();

function isObjectRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stableStringify(value: unknown): string {
    if (Array.isArray(value)) {
        return `[${value.map((item) => stableStringify(item)).join(',')}]`;
    }
    if (!isObjectRecord(value)) {
        const serialized = JSON.stringify(value);
        return serialized ?? 'null';
    }
    const keys = Object.keys(value).sort((left, right) => left.localeCompare(right));
    const entries = keys.map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${entries.join(',')}}`;
}

function getSignaturePayloadCandidates(req: Request): string[] {
    const payloads = new Set<string>();
    const rawBody = rawBodies.get(req);
    // No body bytes were received (e.g. GET): the signed payload is empty.
    payloads.add(rawBody ?? '');

    if (req.body === undefined) {
        return [...payloads];
    }

    const stringified: unknown = JSON.stringify(req.body);
    if (typeof stringified === 'string') {
        payloads.add(stringified);
    }
    payloads.add(stableStringify(req.body));

    return [...payloads];
}

/** JSON body as a record; anything else reads as empty. */
export function readBody(req: Request): Record<string, unknown> {
    const body: unknown = req.body;
    return isObjectRecord(body) ? body : {};
}

/** `express.json({ verify })` hook: keep the exact bytes the client signed. */
export function setRawRequestBody(req: IncomingMessage, buffer: Buffer): void {
    rawBodies.set(req, buffer.toString('utf8'));
}

function readCorrelationId(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: readCorrelationId(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        correlationId: readCorrelationId(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

/**
 * Validate the `X-Signature` header on incoming signed API requests.
 *
 * Expected format: `sha256=<hex digest of HMAC-SHA256(body, API_SECRET)>`
 *
 * If API_SECRET is not configured, all signed API requests are rejected.
 */
export function requireSignature(req: Request, res: Response, next: NextFunction): void {
    const apiSecret = getConfigValue('API_SECRET') ?? '';

    if (!apiSecret) {
        void logThought('[API] Signed request rejected: API_SECRET not configured.');
        sendError(res, 'Signed API endpoints are unavailable (missing API_SECRET).', 503);
        return;
    }

    const signatureHeader = req.headers['x-signature'];
    if (typeof signatureHeader !== 'string' || !signatureHeader.startsWith('sha256=')) {
        void logThought('[API] Signed request rejected: missing or malformed X-Signature header.');
        sendError(res, 'Missing or malformed X-Signature header.', 401);
        return;
    }

    const providedHex = signatureHeader.slice('sha256='.length);
    if (!/^[a-f0-9]{64}$/i.test(providedHex)) {
        void logThought('[API] Signed request rejected: malformed signature digest.');
        sendError(res, 'Malformed signature digest.', 401);
        return;
    }
    const provided = Buffer.from(providedHex, 'hex');
    const signatureMatches = getSignaturePayloadCandidates(req).some((payload) => {
        const expected = createHmac('sha256', apiSecret).update(payload).digest();
        return provided.length === expected.length && timingSafeEqual(provided, expected);
    });

    if (!signatureMatches) {
        void logThought('[API] Signed request rejected: signature mismatch.');
        sendError(res, 'Invalid signature.', 403);
        return;
    }

    next();
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof StaleVersionError) {
        return { status: 409, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof EvidenceRetrievalError) {
        return { status: 502, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof SourceControlError) {
        const status = err.status === 400 || err.status === 404 ? err.status : 502;
        return { status, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof Error) {
        if (err.message.includes('not initialized') || err.message.includes('not configured')) {
            return { status: 503, message: scrubSensitiveText(err.message) };
        }
        if (err.message.includes('not found')) {
            return { status: 404, message: scrubSensitiveText(err.message) };
        }
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
