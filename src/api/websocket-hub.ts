import type { IncomingMessage, Server } from 'node:http';
import { randomUUID, timingSafeEqual } from 'node:crypto';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { getConfigValue } from '../config/json-config.js';
import { logThought } from '../utils/logger.js';
import type {
    WsAuthOkMessage,
    WsErrorMessage,
    WsEventEnvelope,
    WsEventTopic,
    WsHubMetrics,
    WsInboundMessage,
    WsPongMessage,
    WsSnapshotPayload,
    WsSubscribedMessage,
} from '../types/websocket.js';
import { WS_EVENT_TOPICS, WsCloseCode, isWsEventTopic } from '../types/websocket.js';

// ── Constants ──────────────────────────────────────────────────────────────────

const DEFAULT_AUTH_TIMEOUT_MS = 5_000;
const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
/** Default backpressure threshold in kilobytes (see WsHubConfig.maxClientQueue). */
const DEFAULT_MAX_CLIENT_QUEUE = 200;

// ── Internal Client State ──────────────────────────────────────────────────────

interface ClientState {
    id: string;
    ws: WebSocket;
    authenticated: boolean;
    subscriptions: Set<WsEventTopic>;
    authTimer: ReturnType<typeof setTimeout> | null;
    isAlive: boolean;
    connectedAt: number;
}

// ── Config ─────────────────────────────────────────────────────────────────────

export interface WsHubConfig {
    authTimeoutMs?: number;
    heartbeatIntervalMs?: number;
    /**
     * Per-client backpressure threshold in kilobytes. Frames are dropped
     * while `ws.bufferedAmount` exceeds `maxClientQueue * 1024` bytes.
     */
    maxClientQueue?: number;
    /** Shared secret for the auth handshake. Defaults to config `API_SECRET`. */
    resolveSecret?: () => string | undefined;
}

type ParsedInbound =
    | { ok: true; message: WsInboundMessage }
    | { ok: false; error: string };

function isObjectRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseInbound(raw: RawData | string): ParsedInbound {
    let parsed: unknown;
    try {
        parsed = JSON.parse(String(raw));
    } catch {
        return { ok: false, error: 'Invalid JSON.' };
    }

    if (!isObjectRecord(parsed) || typeof parsed.type !== 'string') {
        return { ok: false, error: 'Malformed message: missing "type" field.' };
    }

    switch (parsed.type) {
        case 'auth':
            return { ok: true, message: { type: 'auth', token: typeof parsed.token === 'string' ? parsed.token : '' } };
        case 'subscribe': {
            const topics = Array.isArray(parsed.topics) ? parsed.topics : [];
            const invalid = topics.filter((topic) => !isWsEventTopic(topic)).map(String);
            if (invalid.length > 0 && invalid.length === topics.length) {
                return { ok: false, error: `Invalid topics: ${invalid.join(', ')}. Valid topics: ${WS_EVENT_TOPICS.join(', ')}.` };
            }
            return { ok: true, message: { type: 'subscribe', topics: topics.filter(isWsEventTopic) } };
        }
        case 'ping':
            return { ok: true, message: { type: 'ping' } };
        default:
            return { ok: false, error: `Unknown message type: ${parsed.type}` };
    }
}

function secretsMatch(expected: string, provided: string): boolean {
    const left = Buffer.from(expected);
    const right = Buffer.from(provided);
    return left.length === right.length && timingSafeEqual(left, right);
}

// ── WsHub ──────────────────────────────────────────────────────────────────────

/**
 * Incident broadcast hub on `/ws`.
 *
 *  - Clients authenticate with the shared secret within `authTimeoutMs`.
 *  - Authenticated clients subscribe to `incidents` and/or `health`.
 *  - Events fan out at most once; slow consumers drop frames.
 *  - A ping/pong heartbeat evicts stale connections.
 */
export class WsHub {
    readonly #config: Required<WsHubConfig>;
    readonly #clients: Map<string, ClientState> = new Map();
    #wss: WebSocketServer | null = null;
    #heartbeatTimer: ReturnType<typeof setInterval> | null = null;
    #seq = 0;

    #metrics: Omit<WsHubMetrics, 'activeClients'> = {
        totalConnections: 0,
        authFailures: 0,
        droppedEvents: 0,
        staleCleaned: 0,
        lastEventAt: null,
    };

    /** Called after a client subscribes, so the caller can push an initial snapshot. */
    onSubscribe: ((clientId: string, topics: WsEventTopic[]) => void) | null = null;

    constructor(config: WsHubConfig = {}) {
        this.#config = {
            authTimeoutMs: config.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS,
            heartbeatIntervalMs: config.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS,
            maxClientQueue: config.maxClientQueue ?? DEFAULT_MAX_CLIENT_QUEUE,
            resolveSecret: config.resolveSecret ?? (() => getConfigValue('API_SECRET')),
        };
    }

    // ── Lifecycle ──────────────────────────────────────────────────────────────

    /** Attach to an HTTP server before it starts listening. */
    attach(server: Server): void {
        this.#wss = new WebSocketServer({ server, path: '/ws' });

        this.#wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
            this.#handleConnection(ws, req);
        });

        this.#heartbeatTimer = setInterval(() => {
            this.#runHeartbeat();
        }, this.#config.heartbeatIntervalMs);

        void logThought('[WsHub] WebSocket hub attached on /ws.');
    }

    stop(): void {
        if (this.#heartbeatTimer) {
            clearInterval(this.#heartbeatTimer);
            this.#heartbeatTimer = null;
        }

        for (const client of this.#clients.values()) {
            this.#closeClient(client, WsCloseCode.ServerShutdown, 'Server shutting down.');
        }
        this.#clients.clear();

        this.#wss?.close();
        this.#wss = null;
        void logThought('[WsHub] WebSocket hub stopped.');
    }

    // ── Publishing ─────────────────────────────────────────────────────────────

    /** Fan `payload` out to every authenticated subscriber of `topic`. */
    publish<T>(topic: WsEventTopic, payload: T): void {
        const envelope: WsEventEnvelope<T> = {
            type: 'event',
            v: 1,
            topic,
            seq: ++this.#seq,
            ts: new Date().toISOString(),
            payload,
        };
        const frame = JSON.stringify(envelope);
        this.#metrics.lastEventAt = envelope.ts;

        for (const client of this.#clients.values()) {
            if (!client.authenticated || !client.subscriptions.has(topic)) continue;
            this.#sendRaw(client, frame);
        }
    }

    sendSnapshotTo(clientId: string, snapshot: Omit<WsSnapshotPayload, 'type' | 'v' | 'ts'>): void {
        const client = this.#clients.get(clientId);
        if (!client || !client.authenticated) return;

        const message: WsSnapshotPayload = { type: 'snapshot', v: 1, ts: new Date().toISOString(), ...snapshot };
        this.#sendRaw(client, JSON.stringify(message));
    }

    // ── Diagnostics ────────────────────────────────────────────────────────────

    getMetrics(): WsHubMetrics {
        return {
            activeClients: this.#clients.size,
            totalConnections: this.#metrics.totalConnections,
            authFailures: this.#metrics.authFailures,
            droppedEvents: this.#metrics.droppedEvents,
            staleCleaned: this.#metrics.staleCleaned,
            lastEventAt: this.#metrics.lastEventAt,
        };
    }

    // ── Connection Handling ─────────────────────────────────────────────────────

    #handleConnection(ws: WebSocket, _req: IncomingMessage): void {
        const clientId = randomUUID();
        this.#metrics.totalConnections++;

        const client: ClientState = {
            id: clientId,
            ws,
            authenticated: false,
            subscriptions: new Set(),
            authTimer: null,
            isAlive: true,
            connectedAt: Date.now(),
        };

        this.#clients.set(clientId, client);

        client.authTimer = setTimeout(() => {
            if (!client.authenticated) {
                this.#metrics.authFailures++;
                void logThought(`[WsHub] Client ${clientId} auth timeout; closing connection.`);
                this.#closeClient(client, WsCloseCode.AuthRequired, 'Authentication required.');
            }
        }, this.#config.authTimeoutMs);

        ws.on('pong', () => {
            client.isAlive = true;
        });

        ws.on('message', (data: RawData) => {
            this.#handleMessage(client, data);
        });

        ws.on('close', () => {
            this.#cleanupClient(client);
        });

        ws.on('error', (err: Error) => {
            void logThought(`[WsHub] Client ${clientId} socket error: ${err.message}`);
            this.#cleanupClient(client);
        });

        void logThought(`[WsHub] New connection: ${clientId}.`);
    }

    #handleMessage(client: ClientState, rawData: RawData): void {
        const parsed = parseInbound(rawData);
        if (!parsed.ok) {
            const code = parsed.error.startsWith('Invalid topics') ? WsCloseCode.InvalidSubscription : 400;
            this.#sendError(client, code, parsed.error);
            return;
        }

        const message = parsed.message;
        switch (message.type) {
            case 'auth':
                this.#handleAuth(client, message.token);
                break;
            case 'subscribe':
                this.#handleSubscribe(client, message.topics);
                break;
            case 'ping': {
                const pong: WsPongMessage = { type: 'pong', ts: new Date().toISOString() };
                this.#sendRaw(client, JSON.stringify(pong));
                break;
            }
        }
    }

    #handleAuth(client: ClientState, token: string): void {
        const apiSecret = this.#config.resolveSecret() ?? '';

        if (!apiSecret || !token || !secretsMatch(apiSecret, token)) {
            this.#metrics.authFailures++;
            void logThought(`[WsHub] Client ${client.id} authentication failed (invalid token).`);
            this.#sendError(client, WsCloseCode.AuthFailed, 'Authentication failed.');
            this.#closeClient(client, WsCloseCode.AuthFailed, 'Authentication failed.');
            return;
        }

        if (client.authTimer) {
            clearTimeout(client.authTimer);
            client.authTimer = null;
        }

        client.authenticated = true;
        const ack: WsAuthOkMessage = { type: 'auth_ok', clientId: client.id, ts: new Date().toISOString() };
        this.#sendRaw(client, JSON.stringify(ack));
        void logThought(`[WsHub] Client ${client.id} authenticated.`);
    }

    #handleSubscribe(client: ClientState, topics: WsEventTopic[]): void {
        if (!client.authenticated) {
            this.#sendError(client, WsCloseCode.AuthRequired, 'Not authenticated.');
            return;
        }

        for (const topic of topics) {
            client.subscriptions.add(topic);
        }

        const ack: WsSubscribedMessage = { type: 'subscribed', topics, ts: new Date().toISOString() };
        this.#sendRaw(client, JSON.stringify(ack));
        void logThought(`[WsHub] Client ${client.id} subscribed to [${topics.join(', ')}].`);

        if (this.onSubscribe && topics.length > 0) {
            this.onSubscribe(client.id, topics);
        }
    }

    // ── Heartbeat ──────────────────────────────────────────────────────────────

    #runHeartbeat(): void {
        for (const client of [...this.#clients.values()]) {
            if (!client.isAlive) {
                void logThought(`[WsHub] Client ${client.id} missed a heartbeat; evicting.`);
                this.#metrics.staleCleaned++;
                this.#closeClient(client, WsCloseCode.StaleConnection, 'Stale connection.');
                continue;
            }

            client.isAlive = false;

            try {
                client.ws.ping();
            } catch (error) {
                // The close/error handlers clean up the client.
                void logThought(`[WsHub] Ping to ${client.id} failed: ${error instanceof Error ? error.message : String(error)}`);
            }
        }
    }

    // ── Helpers ────────────────────────────────────────────────────────────────

    #closeClient(client: ClientState, code: number, reason: string): void {
        if (client.authTimer) {
            clearTimeout(client.authTimer);
            client.authTimer = null;
        }

        try {
            client.ws.close(code, reason);
        } catch (error) {
            void logThought(`[WsHub] Close of ${client.id} failed: ${error instanceof Error ? error.message : String(error)}`);
        }

        this.#clients.delete(client.id);
    }

    #cleanupClient(client: ClientState): void {
        if (client.authTimer) {
            clearTimeout(client.authTimer);
            client.authTimer = null;
        }

        if (this.#clients.delete(client.id)) {
            void logThought(`[WsHub] Client ${client.id} disconnected.`);
        }
    }

    #sendRaw(client: ClientState, data: string): void {
        if (client.ws.readyState !== WebSocket.OPEN) {
            return;
        }

        if (client.ws.bufferedAmount > this.#config.maxClientQueue * 1024) {
            this.#metrics.droppedEvents++;
            void logThought(`[WsHub] Client ${client.id} backpressure limit hit; dropping event.`);
            return;
        }

        try {
            client.ws.send(data);
        } catch {
            this.#metrics.droppedEvents++;
        }
    }

    #sendError(client: ClientState, code: number, message: string): void {
        const frame: WsErrorMessage = { type: 'error', code, message, ts: new Date().toISOString() };
        this.#sendRaw(client, JSON.stringify(frame));
    }
}
