import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';

export interface FaultlineConfig {
    runtime: {
        apiPort: number;
        apiSecret: string;
        databasePath: string;
        logDir: string;
        projectRoot: string;
    };
    agent: {
        autoRemediate: boolean;
        dedupWindowMs: number;
        remediationTimeoutMs: number;
    };
    backboard: {
        apiKey: string;
        baseUrl: string;
        assistantId: string;
        threadId: string;
        llmProvider: string;
        modelName: string;
        seedDelayMs: number;
    };
    github: {
        token: string;
        owner: string;
        repo: string;
        branch: string;
        apiUrl: string;
    };
    logs: {
        groups: string[];
        eventsPath: string;
        lookbackMinutes: number;
        onlyFaultCodes: boolean;
        faultCodes: string[];
        reconstructCron: string;
    };
}

export const DEFAULT_LOG_GROUP = '/aws/lambda/FaultRouter';

export const DEFAULT_CONFIG: FaultlineConfig = {
    runtime: {
        apiPort: 8000,
        apiSecret: '',
        databasePath: 'memory/faultline.db',
        logDir: 'memory/logs',
        projectRoot: '',
    },
    agent: {
        autoRemediate: true,
        dedupWindowMs: 2_000,
        remediationTimeoutMs: 60_000,
    },
    backboard: {
        apiKey: '',
        baseUrl: 'https://app.backboard.io/api',
        assistantId: '',
        threadId: '',
        llmProvider: 'openai',
        modelName: 'gpt-4o',
        seedDelayMs: 1_500,
    },
    github: {
        token: '',
        owner: '',
        repo: '',
        branch: 'main',
        apiUrl: 'https://api.github.com',
    },
    logs: {
        groups: [DEFAULT_LOG_GROUP],
        eventsPath: 'memory/log-events.jsonl',
        lookbackMinutes: 120,
        onlyFaultCodes: true,
        faultCodes: [],
        reconstructCron: '*/30 * * * * *',
    },
};

/** Flat keys accepted by {@link getConfigValue}; each is also an env override. */
export type ConfigKey =
    | 'API_PORT'
    | 'API_SECRET'
    | 'DATABASE_PATH'
    | 'LOG_DIR'
    | 'PROJECT_ROOT'
    | 'AGENT_AUTO_REMEDIATE'
    | 'DEDUP_WINDOW_MS'
    | 'REMEDIATION_TIMEOUT_MS'
    | 'BACKBOARD_API_KEY'
    | 'BACKBOARD_BASE_URL'
    | 'BACKBOARD_ASSISTANT_ID'
    | 'BACKBOARD_THREAD_ID'
    | 'BACKBOARD_LLM_PROVIDER'
    | 'BACKBOARD_MODEL_NAME'
    | 'KB_SEED_DELAY_MS'
    | 'GITHUB_TOKEN'
    | 'GITHUB_OWNER'
    | 'GITHUB_REPO'
    | 'GITHUB_BRANCH'
    | 'GITHUB_API_URL'
    | 'LOG_GROUPS'
    | 'LOG_EVENTS_PATH'
    | 'LOG_LOOKBACK_MINUTES'
    | 'LOG_ONLY_FAULT_CODES'
    | 'LOG_FAULT_CODES'
    | 'LOG_RECONSTRUCT_CRON';

const CONFIG_KEY_READERS: Record<ConfigKey, (config: FaultlineConfig) => string | number | boolean> = {
    API_PORT: (c) => c.runtime.apiPort,
    API_SECRET: (c) => c.runtime.apiSecret,
    DATABASE_PATH: (c) => c.runtime.databasePath,
    LOG_DIR: (c) => c.runtime.logDir,
    PROJECT_ROOT: (c) => c.runtime.projectRoot,
    AGENT_AUTO_REMEDIATE: (c) => c.agent.autoRemediate,
    DEDUP_WINDOW_MS: (c) => c.agent.dedupWindowMs,
    REMEDIATION_TIMEOUT_MS: (c) => c.agent.remediationTimeoutMs,
    BACKBOARD_API_KEY: (c) => c.backboard.apiKey,
    BACKBOARD_BASE_URL: (c) => c.backboard.baseUrl,
    BACKBOARD_ASSISTANT_ID: (c) => c.backboard.assistantId,
    BACKBOARD_THREAD_ID: (c) => c.backboard.threadId,
    BACKBOARD_LLM_PROVIDER: (c) => c.backboard.llmProvider,
    BACKBOARD_MODEL_NAME: (c) => c.backboard.modelName,
    KB_SEED_DELAY_MS: (c) => c.backboard.seedDelayMs,
    GITHUB_TOKEN: (c) => c.github.token,
    GITHUB_OWNER: (c) => c.github.owner,
    GITHUB_REPO: (c) => c.github.repo,
    GITHUB_BRANCH: (c) => c.github.branch,
    GITHUB_API_URL: (c) => c.github.apiUrl,
    LOG_GROUPS: (c) => c.logs.groups.join(','),
    LOG_EVENTS_PATH: (c) => c.logs.eventsPath,
    LOG_LOOKBACK_MINUTES: (c) => c.logs.lookbackMinutes,
    LOG_ONLY_FAULT_CODES: (c) => c.logs.onlyFaultCodes,
    LOG_FAULT_CODES: (c) => c.logs.faultCodes.join(','),
    LOG_RECONSTRUCT_CRON: (c) => c.logs.reconstructCron,
};

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'y', 'on']);

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.FAULTLINE_CONFIG_PATH) {
        return path.resolve(process.env.FAULTLINE_CONFIG_PATH);
    }
    return path.resolve('faultline.json');
}

// ── Merge Helpers ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionOf(loaded: Record<string, unknown>, name: string): Record<string, unknown> {
    const section = loaded[name];
    return isRecord(section) ? section : {};
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function pickNumber(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = source[key];
    return typeof value === 'boolean' ? value : fallback;
}

function pickStringList(source: Record<string, unknown>, key: string, fallback: string[]): string[] {
    const value = source[key];
    return Array.isArray(value)
        ? value.filter((item): item is string => typeof item === 'string')
        : [...fallback];
}

export function mergeWithDefaults(loaded: unknown): FaultlineConfig {
    const root = isRecord(loaded) ? loaded : {};
    const runtime = sectionOf(root, 'runtime');
    const agent = sectionOf(root, 'agent');
    const backboard = sectionOf(root, 'backboard');
    const github = sectionOf(root, 'github');
    const logs = sectionOf(root, 'logs');
    const d = DEFAULT_CONFIG;

    return {
        runtime: {
            apiPort: pickNumber(runtime, 'apiPort', d.runtime.apiPort),
            apiSecret: pickString(runtime, 'apiSecret', d.runtime.apiSecret),
            databasePath: pickString(runtime, 'databasePath', d.runtime.databasePath),
            logDir: pickString(runtime, 'logDir', d.runtime.logDir),
            projectRoot: pickString(runtime, 'projectRoot', d.runtime.projectRoot),
        },
        agent: {
            autoRemediate: pickBoolean(agent, 'autoRemediate', d.agent.autoRemediate),
            dedupWindowMs: pickNumber(agent, 'dedupWindowMs', d.agent.dedupWindowMs),
            remediationTimeoutMs: pickNumber(agent, 'remediationTimeoutMs', d.agent.remediationTimeoutMs),
        },
        backboard: {
            apiKey: pickString(backboard, 'apiKey', d.backboard.apiKey),
            baseUrl: pickString(backboard, 'baseUrl', d.backboard.baseUrl),
            assistantId: pickString(backboard, 'assistantId', d.backboard.assistantId),
            threadId: pickString(backboard, 'threadId', d.backboard.threadId),
            llmProvider: pickString(backboard, 'llmProvider', d.backboard.llmProvider),
            modelName: pickString(backboard, 'modelName', d.backboard.modelName),
            seedDelayMs: pickNumber(backboard, 'seedDelayMs', d.backboard.seedDelayMs),
        },
        github: {
            token: pickString(github, 'token', d.github.token),
            owner: pickString(github, 'owner', d.github.owner),
            repo: pickString(github, 'repo', d.github.repo),
            branch: pickString(github, 'branch', d.github.branch),
            apiUrl: pickString(github, 'apiUrl', d.github.apiUrl),
        },
        logs: {
            groups: pickStringList(logs, 'groups', d.logs.groups),
            eventsPath: pickString(logs, 'eventsPath', d.logs.eventsPath),
            lookbackMinutes: pickNumber(logs, 'lookbackMinutes', d.logs.lookbackMinutes),
            onlyFaultCodes: pickBoolean(logs, 'onlyFaultCodes', d.logs.onlyFaultCodes),
            faultCodes: pickStringList(logs, 'faultCodes', d.logs.faultCodes),
            reconstructCron: pickString(logs, 'reconstructCron', d.logs.reconstructCron),
        },
    };
}

// ── Cached Flat KV Adapter ──────────────────────────────────────────────────

let cachedConfig: FaultlineConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): FaultlineConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            const content = readFileSync(configPath, 'utf8');
            cachedConfig = mergeWithDefaults(JSON.parse(content));
            return cachedConfig;
        }
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Faultline Config] Failed to parse JSON config at ${configPath}: ${message}`);
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

/**
 * Resolve a configuration value.
 *
 * Precedence: non-empty environment variable, then `faultline.json`
 * (merged with defaults). Empty strings count as unset.
 */
export function getConfigValue(key: ConfigKey): string | undefined {
    const envValue = process.env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    const config = cachedConfig ?? reloadConfigSync();
    const jsonValue = String(CONFIG_KEY_READERS[key](config));
    return jsonValue.trim() !== '' ? jsonValue : undefined;
}

export function readNumberConfig(key: ConfigKey, fallback: number): number {
    const raw = getConfigValue(key);
    if (!raw) {
        return fallback;
    }
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function readBooleanConfig(key: ConfigKey, fallback: boolean): boolean {
    const raw = getConfigValue(key);
    if (raw === undefined) {
        return fallback;
    }
    return TRUTHY_VALUES.has(raw.trim().toLowerCase());
}

export function readListConfig(key: ConfigKey): string[] {
    return (getConfigValue(key) ?? '')
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
}
