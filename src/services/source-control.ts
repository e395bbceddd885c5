import { getConfigValue } from '../config/json-config.js';
import { SourceControlError, StaleVersionError, getErrorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

export interface SourceFile {
    path: string;
    content: string;
    /** Opaque version token; pass it back to {@link SourceControl.writeFile}. */
    version: string;
}

export interface SourceWriteResult {
    path: string;
    commitSha: string | null;
    branch: string;
}

/** Versioned file store with optimistic concurrency on writes. */
export interface SourceControl {
    readFile(path: string): Promise<SourceFile>;
    /** Rejects with {@link StaleVersionError} when `expectedVersion` is no longer current. */
    writeFile(path: string, content: string, expectedVersion: string, message?: string): Promise<SourceWriteResult>;
}

export interface GitHubSourceControlConfig {
    token: string;
    owner: string;
    repo: string;
    branch: string;
    apiUrl: string;
    timeoutMs: number;
    retry: RetryOptions;
}

const DEFAULT_API_URL = 'https://api.github.com';
const DEFAULT_TIMEOUT_MS = 15_000;
const USER_AGENT = 'faultline-source-control';
// Outer wrapper only; fences inside the content are kept.
const OPENING_FENCE_RE = /^```[^\n]*\n/;
const CLOSING_FENCE_RE = /\n?```$/;

export function resolveGitHubConfig(overrides: Partial<GitHubSourceControlConfig> = {}): GitHubSourceControlConfig {
    return {
        token: getConfigValue('GITHUB_TOKEN') ?? '',
        owner: getConfigValue('GITHUB_OWNER') ?? '',
        repo: getConfigValue('GITHUB_REPO') ?? '',
        branch: getConfigValue('GITHUB_BRANCH') ?? 'main',
        apiUrl: getConfigValue('GITHUB_API_URL') ?? DEFAULT_API_URL,
        timeoutMs: DEFAULT_TIMEOUT_MS,
        retry: { maxAttempts: 2, baseDelayMs: 500 },
        ...overrides,
    };
}

/** Remove markdown code fences a model may wrap around file content. */
export function stripCodeFences(content: string): string {
    const trimmed = content.trim();
    if (!OPENING_FENCE_RE.test(trimmed)) {
        return trimmed;
    }
    return trimmed.replace(OPENING_FENCE_RE, '').replace(CLOSING_FENCE_RE, '\n');
}

/** Drop leading slashes and reject empty or parent-directory segments. */
export function normalizeRepoPath(filePath: string): string {
    const normalized = filePath.trim().replace(/^\/+/, '');
    const segments = normalized.split('/');
    if (!normalized || segments.some((segment) => segment === '' || segment === '.' || segment === '..')) {
        throw new SourceControlError(`Invalid repository path: '${filePath}'.`, 400);
    }
    return normalized;
}

function encodeRepoPath(normalized: string): string {
    return normalized.split('/').map(encodeURIComponent).join('/');
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRetryable(error: unknown): boolean {
    if (error instanceof StaleVersionError) return false;
    if (error instanceof SourceControlError) {
        return error.status === null || error.status >= 500;
    }
    return true;
}

/** GitHub contents API over `fetch`; the blob sha is the version token. */
export class GitHubSourceControl implements SourceControl {
    readonly #config: GitHubSourceControlConfig;

    constructor(config: GitHubSourceControlConfig = resolveGitHubConfig()) {
        this.#config = { ...config, apiUrl: config.apiUrl.replace(/\/+$/, '') };
    }

    get isConfigured(): boolean {
        return Boolean(this.#config.token && this.#config.owner && this.#config.repo);
    }

    get branch(): string {
        return this.#config.branch;
    }

    async readFile(filePath: string): Promise<SourceFile> {
        const normalized = normalizeRepoPath(filePath);
        const query = new URLSearchParams({ ref: this.#config.branch });
        const result = await withRetry(
            () => this.#request('GET', `${this.#contentsPath(normalized)}?${query.toString()}`, normalized),
            { ...this.#config.retry, label: `github:read ${normalized}`, shouldRetry: isRetryable },
        );
        if (!result.ok) {
            throw result.cause instanceof SourceControlError
                ? result.cause
                : new SourceControlError(result.error ?? `Reading ${normalized} failed.`);
        }

        const data = result.value;
        if (!isObjectRecord(data) || typeof data.content !== 'string' || typeof data.sha !== 'string') {
            throw new SourceControlError(`GitHub returned no file content for ${normalized}.`);
        }

        return {
            path: normalized,
            content: Buffer.from(data.content, 'base64').toString('utf8'),
            version: data.sha,
        };
    }

    /** Single attempt; never retried. */
    async writeFile(
        filePath: string,
        content: string,
        expectedVersion: string,
        message?: string,
    ): Promise<SourceWriteResult> {
        const normalized = normalizeRepoPath(filePath);
        if (!expectedVersion) {
            throw new SourceControlError('An expected version is required to write a file.', 400);
        }

        const body = {
            message: message?.trim() || `Update ${normalized}`,
            content: Buffer.from(stripCodeFences(content), 'utf8').toString('base64'),
            sha: expectedVersion,
            branch: this.#config.branch,
        };
        const data = await this.#request('PUT', this.#contentsPath(normalized), normalized, body);

        const commit = isObjectRecord(data) && isObjectRecord(data.commit) ? data.commit : null;
        const commitSha = commit && typeof commit.sha === 'string' ? commit.sha : null;
        void logThought(`[GitHubSourceControl] Wrote ${normalized} on ${this.#config.branch} (${commitSha ?? 'no sha'}).`);
        return { path: normalized, commitSha, branch: this.#config.branch };
    }

    #contentsPath(normalized: string): string {
        const owner = encodeURIComponent(this.#config.owner);
        const repo = encodeURIComponent(this.#config.repo);
        return `/repos/${owner}/${repo}/contents/${encodeRepoPath(normalized)}`;
    }

    async #request(method: 'GET' | 'PUT', requestPath: string, filePath: string, body?: unknown): Promise<unknown> {
        if (!this.isConfigured) {
            throw new SourceControlError('GITHUB_TOKEN, GITHUB_OWNER and GITHUB_REPO must be configured.');
        }

        let response: Response;
        try {
            response = await fetch(`${this.#config.apiUrl}${requestPath}`, {
                method,
                headers: {
                    Authorization: `Bearer ${this.#config.token}`,
                    Accept: 'application/vnd.github+json',
                    'Content-Type': 'application/json',
                    'User-Agent': USER_AGENT,
                },
                body: body === undefined ? undefined : JSON.stringify(body),
                signal: AbortSignal.timeout(this.#config.timeoutMs),
            });
        } catch (error) {
            throw new SourceControlError(`GitHub ${method} ${filePath} failed: ${getErrorMessage(error)}`);
        }

        if (response.status === 409 || response.status === 412) {
            throw new StaleVersionError(filePath, response.status);
        }
        if (!response.ok) {
            throw new SourceControlError(`GitHub ${method} ${filePath} returned HTTP ${response.status}.`, response.status);
        }

        const data: unknown = await response.json();
        return data;
    }
}
