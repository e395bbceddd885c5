/** Raised when the evidence service cannot be reached or answers with a non-2xx status. */
export class EvidenceRetrievalError extends Error {
    readonly status: number | null;

    constructor(message: string, status: number | null = null) {
        super(message);
        this.name = 'EvidenceRetrievalError';
        this.status = status;
    }
}

export class SourceControlError extends Error {
    readonly status: number | null;

    constructor(message: string, status: number | null = null) {
        super(message);
        this.name = 'SourceControlError';
        this.status = status;
    }
}

/** The expected version token no longer matches the stored file. Never retried. */
export class StaleVersionError extends SourceControlError {
    readonly path: string;

    constructor(path: string, status: number) {
        super(`Version conflict writing ${path}; re-read the file and retry.`, status);
        this.name = 'StaleVersionError';
        this.path = path;
    }
}

export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
