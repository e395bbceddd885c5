import { execFile } from 'node:child_process';
import { realpath, stat } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import type { ExecutionOutcome, ExecutionRequest, ExecutionResult } from '../types/remediation.js';
import { logSystemCommand, logThought, scrubSensitiveText } from '../utils/logger.js';
import { ALLOWED_SCRIPT_PATHS } from './playbooks.js';

const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_OUTPUT_BUFFER = 1024 * 1024;
const MAX_LOG_OUTPUT_LENGTH = 8_000;
/** Reported when the script is killed for exceeding its timeout. */
export const TIMEOUT_RETURN_CODE = 124;

export const EXECUTOR_MESSAGES = {
    notApproved: 'Execution payload is not approved.',
    notAllowed: 'Script path is not in the approved playbook allow-list.',
    outsideRoot: 'Script path resolves outside the project root.',
    executed: 'Remediation playbook executed.',
    failed: 'Remediation playbook failed.',
} as const;

export interface ActionExecutorOptions {
    projectRoot: string;
    timeoutMs?: number;
    /** Defaults to the script paths declared by the playbook table. */
    allowList?: ReadonlySet<string>;
}

interface ExecError extends Error {
    code?: number | string | null;
    killed?: boolean;
    signal?: NodeJS.Signals | null;
    stdout?: string;
    stderr?: string;
}

function isExecError(error: unknown): error is ExecError {
    return error instanceof Error;
}

function isWithinRoot(root: string, candidate: string): boolean {
    const relative = path.relative(root, candidate);
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await stat(filePath)).isFile();
    } catch {
        return false;
    }
}

function truncateForLog(output: string): string {
    if (output.length <= MAX_LOG_OUTPUT_LENGTH) {
        return output;
    }
    return `${output.slice(0, MAX_LOG_OUTPUT_LENGTH)}\n...[truncated]`;
}

/**
 * Runs approved remediation scripts with `bash` under the project root.
 *
 * Only paths present in the allow-list run, and the resolved file must stay
 * inside the root. Script output is returned verbatim (trimmed), never
 * interpreted.
 */
export class ActionExecutor {
    readonly #root: string;
    readonly #timeoutMs: number;
    readonly #allowList: ReadonlySet<string>;

    constructor(options: ActionExecutorOptions) {
        this.#root = path.resolve(options.projectRoot);
        this.#timeoutMs = Math.max(1, Math.floor(options.timeoutMs ?? DEFAULT_TIMEOUT_MS));
        this.#allowList = options.allowList ?? ALLOWED_SCRIPT_PATHS;
    }

    get projectRoot(): string {
        return this.#root;
    }

    async execute(request: ExecutionRequest): Promise<ExecutionResult> {
        if (request.status !== 'approved_for_pipeline') {
            return { status: 'blocked', message: EXECUTOR_MESSAGES.notApproved };
        }

        const scriptPath = request.execution?.scriptPath;
        if (typeof scriptPath !== 'string' || !this.#allowList.has(scriptPath)) {
            void logThought(`[ActionExecutor] Blocked script outside allow-list: ${String(scriptPath)}`);
            return { status: 'blocked', message: EXECUTOR_MESSAGES.notAllowed };
        }

        const scriptAbs = path.resolve(this.#root, scriptPath);
        if (!isWithinRoot(this.#root, scriptAbs)) {
            void logThought(`[ActionExecutor] Blocked script escaping project root: ${scriptPath}`);
            return { status: 'blocked', message: EXECUTOR_MESSAGES.outsideRoot };
        }

        if (!(await isFile(scriptAbs))) {
            return { status: 'failed', message: `Script not found: ${scriptPath}` };
        }

        // Symlinks must not lead out of the root either.
        const [realRoot, realScript] = await Promise.all([realpath(this.#root), realpath(scriptAbs)]);
        if (!isWithinRoot(realRoot, realScript)) {
            void logThought(`[ActionExecutor] Blocked symlinked script escaping project root: ${scriptPath}`);
            return { status: 'blocked', message: EXECUTOR_MESSAGES.outsideRoot };
        }

        const outcome = await this.#run(scriptAbs, {
            actionId: request.execution?.actionId ?? '',
            scriptPath,
            verificationHint: request.execution?.verificationHint ?? '',
        });

        if (outcome.returnCode === 0) {
            return { status: 'executed', message: EXECUTOR_MESSAGES.executed, executionResult: outcome };
        }
        return { status: 'failed', message: EXECUTOR_MESSAGES.failed, executionResult: outcome };
    }

    async #run(
        scriptAbs: string,
        meta: Pick<ExecutionOutcome, 'actionId' | 'scriptPath' | 'verificationHint'>,
    ): Promise<ExecutionOutcome> {
        const commandPreview = `bash ${meta.scriptPath}`;
        let returnCode: number;
        let stdout: string;
        let stderr: string;

        try {
            const result = await execFileAsync('bash', [scriptAbs], {
                cwd: this.#root,
                timeout: this.#timeoutMs,
                killSignal: 'SIGKILL',
                windowsHide: true,
                maxBuffer: MAX_OUTPUT_BUFFER,
            });
            returnCode = 0;
            stdout = result.stdout.trim();
            stderr = result.stderr.trim();
        } catch (error: unknown) {
            if (!isExecError(error)) {
                throw error;
            }
            stdout = (error.stdout ?? '').trim();
            stderr = (error.stderr ?? '').trim();
            if (error.killed && error.signal === 'SIGKILL') {
                returnCode = TIMEOUT_RETURN_CODE;
                stderr = [stderr, `Timed out after ${this.#timeoutMs}ms.`].filter(Boolean).join('\n');
            } else if (typeof error.code === 'number') {
                returnCode = error.code;
            } else {
                returnCode = 1;
                stderr = [stderr, error.message].filter(Boolean).join('\n');
            }
        }

        const logged = truncateForLog(scrubSensitiveText([stdout, stderr].filter(Boolean).join('\n')));
        await logSystemCommand(commandPreview, logged || '(no output)', returnCode);

        return {
            actionId: meta.actionId,
            scriptPath: meta.scriptPath,
            returnCode,
            stdout,
            stderr,
            verificationHint: meta.verificationHint,
        };
    }
}
