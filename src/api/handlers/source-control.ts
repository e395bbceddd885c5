import type { Request, Response } from 'express';
import type { WriteSourceFileBody } from '../../types/api.js';
import type { SourceControl } from '../../services/source-control.js';
import { mapError, readBody, sendError, sendOk } from '../shared.js';

export interface SourceControlDeps {
    sourceControl?: SourceControl;
}

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

/** GET /source/file?path= */
export function handleReadSourceFile(deps: SourceControlDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        if (!deps.sourceControl) {
            sendError(res, 'Source control not initialized.', 503);
            return;
        }

        const filePath = req.query.path;
        if (typeof filePath !== 'string' || !filePath.trim()) {
            sendError(res, 'Query parameter "path" is required.', 400);
            return;
        }

        try {
            sendOk(res, await deps.sourceControl.readFile(filePath));
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}

/** PUT /source/file: optimistic write; a stale `version` answers 409. */
export function handleWriteSourceFile(deps: SourceControlDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        if (!deps.sourceControl) {
            sendError(res, 'Source control not initialized.', 503);
            return;
        }

        const raw = readBody(req);
        const body: WriteSourceFileBody = {
            path: optionalString(raw.path),
            content: optionalString(raw.content),
            version: optionalString(raw.version),
            message: optionalString(raw.message),
        };
        if (!body.path || body.content === undefined || !body.version) {
            sendError(res, 'Body must include "path", "content" and "version".', 400);
            return;
        }

        try {
            const result = await deps.sourceControl.writeFile(body.path, body.content, body.version, body.message);
            sendOk(res, result);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}
