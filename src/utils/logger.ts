import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { getConfigValue } from '../config/json-config.js';

const DEFAULT_LOG_DIR = 'memory/logs';
const REDACTED = '[REDACTED]';
const MIN_SECRET_LENGTH = 6;
const SENSITIVE_KEY_PATTERN = /(?:_KEY|_TOKEN|_SECRET|PASSWORD)$/;
const INLINE_SECRET_PATTERN =
    /\b(api[_-]?key|token|secret|password|authorization)\b(\s*[:=]\s*)("?)([^\s"',;]+)\3/gi;

function resolveLogDir(): string {
    return path.resolve(getConfigValue('LOG_DIR') ?? DEFAULT_LOG_DIR);
}

function todayLogPath(): string {
    const dateIso = new Date().toISOString().slice(0, 10);
    return path.join(resolveLogDir(), `${dateIso}.md`);
}

function collectSensitiveValues(): string[] {
    const values: string[] = [];
    for (const [key, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_SECRET_LENGTH) continue;
        if (key === 'API_SECRET' || SENSITIVE_KEY_PATTERN.test(key)) {
            values.push(value);
        }
    }
    // Longest first so overlapping values never leave a partial secret behind.
    return values.sort((left, right) => right.length - left.length);
}

/**
 * Redact credentials from free text before it reaches logs or API responses.
 *
 * Covers raw values of sensitive environment keys and inline
 * `key=value` / `key: value` assignments.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;
    for (const value of collectSensitiveValues()) {
        scrubbed = scrubbed.split(value).join(REDACTED);
    }
    return scrubbed.replace(INLINE_SECRET_PATTERN, (_match, key: string, separator: string) => {
        return `${key}${separator}${REDACTED}`;
    });
}

async function appendEntry(kind: string, body: string): Promise<void> {
    const entry = `\n## ${kind} @ ${new Date().toISOString()}\n${scrubSensitiveText(body)}\n`;
    try {
        const target = todayLogPath();
        await mkdir(path.dirname(target), { recursive: true });
        await appendFile(target, entry, 'utf8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to append ${kind} entry: ${message}`);
    }
}

/** Append an operational note to today's log journal. Never throws. */
export async function logThought(message: string): Promise<void> {
    await appendEntry('thought', message);
}

/** Record a subprocess invocation with its (scrubbed) output and exit code. */
export async function logSystemCommand(command: string, output: string, exitCode: number): Promise<void> {
    await appendEntry('command', `$ ${command}\nexit=${exitCode}\n${output}`);
}
