import type { Request, Response } from 'express';
import type { ConfigValidationData } from '../../types/api.js';
import { validateRuntimeConfig } from '../../config/env-validator.js';
import { sendOk } from '../shared.js';

/** GET /config/validate: key-level report; values never leave the process. */
export function handleConfigValidate() {
    return (_req: Request, res: Response): void => {
        const result = validateRuntimeConfig();
        const missingKeys = result.issues
            .filter((issue) => issue.class === 'missing_required' || issue.class === 'missing_conditional')
            .map((issue) => issue.key);

        const data: ConfigValidationData = {
            ok: result.ok,
            missingKeys,
            presentKeys: result.presentKeys,
            issues: result.issues,
            activeFeatures: result.activeFeatures,
            fatalIssues: result.fatalIssues,
            validatedAt: result.validatedAt,
        };

        // 200 even with issues; `ok` carries the verdict.
        sendOk(res, data);
    };
}
