import { getConfigValue } from '../config/json-config.js';
import type { EvidenceQuery, EvidenceResult, Incident } from '../types/incident.js';
import { EvidenceRetrievalError, getErrorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

/** Oracle that answers incident questions from indexed past incidents. */
export interface EvidenceRetriever {
    queryIncident(query: EvidenceQuery): Promise<EvidenceResult>;
    /** Returns the document id, or `null` when indexing is not configured. */
    indexIncident(incident: Incident): Promise<string | null>;
}

export interface AssistantSetup {
    assistantId: string;
    threadId: string;
}

export interface BackboardConfig {
    apiKey: string;
    baseUrl: string;
    assistantId: string | null;
    threadId: string | null;
    llmProvider: string;
    modelName: string;
    timeoutMs: number;
    retry: RetryOptions;
}

export const DEFAULT_BACKBOARD_BASE_URL = 'https://app.backboard.io/api';
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_ASSISTANT_NAME = 'Incident RAG Assistant';
const DEFAULT_SYSTEM_PROMPT =
    'You are an incident analysis assistant. Use the documents stored for past incident diagnosis '
    + 'and remediation to suggest root cause analysis and safe remediation actions.';
const CLOSING_QUESTION = 'What are the closest past incidents and recommended remediations?';

export function resolveBackboardConfig(overrides: Partial<BackboardConfig> = {}): BackboardConfig {
    return {
        apiKey: getConfigValue('BACKBOARD_API_KEY') ?? '',
        baseUrl: getConfigValue('BACKBOARD_BASE_URL') ?? DEFAULT_BACKBOARD_BASE_URL,
        assistantId: getConfigValue('BACKBOARD_ASSISTANT_ID') ?? null,
        threadId: getConfigValue('BACKBOARD_THREAD_ID') ?? null,
        llmProvider: getConfigValue('BACKBOARD_LLM_PROVIDER') ?? 'openai',
        modelName: getConfigValue('BACKBOARD_MODEL_NAME') ?? 'gpt-4o',
        timeoutMs: DEFAULT_TIMEOUT_MS,
        retry: { maxAttempts: 2, baseDelayMs: 500 },
        ...overrides,
    };
}

// ── Text builders ───────────────────────────────────────────────────────────

export function buildEvidenceQueryText(query: EvidenceQuery): string {
    const parts = [`New incident detected:\nSymptoms: ${query.symptoms}`];
    if (query.markers.length > 0) {
        parts.push(`Markers: ${query.markers.join(', ')}`);
    }
    const metrics = Object.entries(query.metrics ?? {});
    if (metrics.length > 0) {
        parts.push(`Metrics: ${metrics.map(([key, value]) => `${key}=${value}`).join(', ')}`);
    }
    parts.push(CLOSING_QUESTION);
    return parts.join('\n');
}

export function buildIncidentDocument(incident: Incident): string {
    return [
        `IncidentID: ${incident.id}`,
        `ErrorCode: ${incident.errorCode}`,
        `Symptoms: ${incident.symptoms}`,
        `Breadcrumbs: ${incident.breadcrumbs ?? ''}`,
        `RootCause: ${incident.rootCause ?? ''}`,
        `Remediation: ${incident.remediation ?? ''}`,
        `Verification: ${incident.verification ?? ''}`,
        `Resolved: ${incident.resolved}`,
        '',
    ].join('\n');
}

// ── Response decoding ───────────────────────────────────────────────────────

function isObjectRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringField(data: unknown, field: string): string {
    const value = isObjectRecord(data) ? data[field] : undefined;
    return typeof value === 'string' ? value : '';
}

function readArrayField(data: Record<string, unknown>, field: string): unknown[] {
    const value = data[field];
    return Array.isArray(value) ? value : [];
}

function isRetryable(error: unknown): boolean {
    if (error instanceof EvidenceRetrievalError) {
        return error.status === null || error.status >= 500;
    }
    return true;
}

// ── Client ──────────────────────────────────────────────────────────────────

/**
 * Backboard REST client. Auth via `X-API-Key`; every request is bounded by
 * `timeoutMs` and retried on transport errors and 5xx responses.
 */
export class BackboardClient implements EvidenceRetriever {
    readonly #config: BackboardConfig;
    readonly #baseUrl: string;
    #threadId: string | null;

    constructor(config: BackboardConfig = resolveBackboardConfig()) {
        this.#config = config;
        this.#baseUrl = config.baseUrl.replace(/\/+$/, '');
        this.#threadId = config.threadId;
    }

    get isConfigured(): boolean {
        return this.#config.apiKey.length > 0;
    }

    get assistantId(): string | null {
        return this.#config.assistantId;
    }

    async createAssistant(name: string, systemPrompt: string): Promise<string> {
        const data = await this.#request('POST', '/assistants', {
            body: JSON.stringify({ name, system_prompt: systemPrompt }),
            headers: { 'Content-Type': 'application/json' },
        });
        const assistantId = readStringField(data, 'assistant_id');
        void logThought(`[Backboard] Created assistant ${assistantId}.`);
        return assistantId;
    }

    async createThread(assistantId: string): Promise<string> {
        const data = await this.#request('POST', `/assistants/${encodeURIComponent(assistantId)}/threads`, {
            body: JSON.stringify({}),
            headers: { 'Content-Type': 'application/json' },
        });
        const threadId = readStringField(data, 'thread_id');
        void logThought(`[Backboard] Created thread ${threadId} for assistant ${assistantId}.`);
        return threadId;
    }

    /** One-time provisioning of an assistant and its first thread. */
    async setupAssistant(
        name = DEFAULT_ASSISTANT_NAME,
        systemPrompt = DEFAULT_SYSTEM_PROMPT,
    ): Promise<AssistantSetup> {
        const assistantId = await this.createAssistant(name, systemPrompt);
        const threadId = await this.createThread(assistantId);
        return { assistantId, threadId };
    }

    async uploadDocument(assistantId: string, content: string, filename: string): Promise<string> {
        const data = await this.#request('POST', `/assistants/${encodeURIComponent(assistantId)}/documents`, {
            body: () => {
                const form = new FormData();
                form.append('file', new Blob([content], { type: 'text/plain' }), filename);
                return form;
            },
        });
        return readStringField(data, 'document_id');
    }

    async addMessage(threadId: string, content: string): Promise<EvidenceResult> {
        const data = await this.#request('POST', `/threads/${encodeURIComponent(threadId)}/messages`, {
            body: new URLSearchParams({
                content,
                llm_provider: this.#config.llmProvider,
                model_name: this.#config.modelName,
                memory: 'Auto',
                stream: 'false',
            }).toString(),
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        });

        if (!isObjectRecord(data)) {
            throw new EvidenceRetrievalError('Backboard message response was not a JSON object.');
        }
        return {
            content: readStringField(data, 'content') || readStringField(data, 'message'),
            retrievedMemories: readArrayField(data, 'retrieved_memories'),
            retrievedFiles: readArrayField(data, 'retrieved_files'),
        };
    }

    async queryIncident(query: EvidenceQuery): Promise<EvidenceResult> {
        const threadId = await this.#ensureThread();
        const result = await this.addMessage(threadId, buildEvidenceQueryText(query));
        void logThought(
            `[Backboard] Query returned ${result.retrievedMemories.length} memories, ${result.retrievedFiles.length} files.`,
        );
        return result;
    }

    async indexIncident(incident: Incident): Promise<string | null> {
        const assistantId = this.#config.assistantId;
        if (!assistantId) {
            void logThought('[Backboard] BACKBOARD_ASSISTANT_ID not configured; skipping index.');
            return null;
        }

        const documentId = await this.uploadDocument(
            assistantId,
            buildIncidentDocument(incident),
            `incident_${incident.id}.txt`,
        );
        void logThought(`[Backboard] Indexed incident ${incident.id} as document ${documentId}.`);
        return documentId;
    }

    async #ensureThread(): Promise<string> {
        if (this.#threadId) {
            return this.#threadId;
        }
        const assistantId = this.#config.assistantId;
        if (!assistantId) {
            throw new EvidenceRetrievalError(
                'BACKBOARD_THREAD_ID is not configured and no BACKBOARD_ASSISTANT_ID is available to create one.',
            );
        }
        this.#threadId = await this.createThread(assistantId);
        return this.#threadId;
    }

    async #request(
        method: string,
        path: string,
        init: { body: string | (() => FormData); headers?: Record<string, string> },
    ): Promise<unknown> {
        if (!this.isConfigured) {
            throw new EvidenceRetrievalError('BACKBOARD_API_KEY is not configured.');
        }

        const url = `${this.#baseUrl}${path}`;
        const result = await withRetry(
            async () => {
                let response: Response;
                try {
                    response = await fetch(url, {
                        method,
                        headers: { 'X-API-Key': this.#config.apiKey, ...init.headers },
                        body: typeof init.body === 'function' ? init.body() : init.body,
                        signal: AbortSignal.timeout(this.#config.timeoutMs),
                    });
                } catch (error) {
                    throw new EvidenceRetrievalError(`Backboard ${method} ${path} failed: ${getErrorMessage(error)}`);
                }

                if (!response.ok) {
                    throw new EvidenceRetrievalError(
                        `Backboard ${method} ${path} returned HTTP ${response.status}.`,
                        response.status,
                    );
                }
                const data: unknown = await response.json();
                return data;
            },
            { ...this.#config.retry, label: `backboard:${method} ${path}`, shouldRetry: isRetryable },
        );

        if (!result.ok) {
            if (result.cause instanceof EvidenceRetrievalError) {
                throw result.cause;
            }
            throw new EvidenceRetrievalError(result.error ?? `Backboard ${method} ${path} failed.`);
        }
        return result.value;
    }
}
