/**
 * Runtime configuration validator.
 *
 * Produces redaction-safe diagnostics for missing required keys, partially
 * configured features and malformed numeric settings. Values are never
 * included in the output.
 */

import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigKeySpec } from './env-schema.js';
import { getConfigValue, type ConfigKey } from './json-config.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'missing_conditional' | 'format_error';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  message: string;
  remediation: string;
}

export interface ConfigValidationResult {
  ok: boolean;
  presentKeys: string[];
  issues: ConfigIssue[];
  activeFeatures: string[];
  fatalIssues: ConfigIssue[];
  validatedAt: string;
}

// ── Internal helpers ─────────────────────────────────────────────────────────

const NUMERIC_RULES: Partial<Record<ConfigKey, { min: number; max: number }>> = {
  API_PORT: { min: 1, max: 65_535 },
  DEDUP_WINDOW_MS: { min: 0, max: Number.MAX_SAFE_INTEGER },
  REMEDIATION_TIMEOUT_MS: { min: 1, max: Number.MAX_SAFE_INTEGER },
  LOG_LOOKBACK_MINUTES: { min: 1, max: Number.MAX_SAFE_INTEGER },
};

function hasValue(key: ConfigKey): boolean {
  return getConfigValue(key) !== undefined;
}

function formatError(spec: ConfigKeySpec): string | null {
  const rule = NUMERIC_RULES[spec.key];
  const raw = getConfigValue(spec.key);
  if (!rule || raw === undefined) {
    return null;
  }

  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed) || parsed < rule.min || parsed > rule.max) {
    return `${spec.key} must be an integer in range ${rule.min}–${rule.max}, got '${raw.trim()}'.`;
  }
  return null;
}

function detectActiveFeatures(): Set<string> {
  const active = new Set<string>();
  for (const spec of CONFIG_SCHEMA) {
    if (spec.class === 'conditional' && spec.condition && hasValue(spec.key)) {
      active.add(spec.condition);
    }
  }
  return active;
}

// ── Public API ───────────────────────────────────────────────────────────────

export function validateRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const presentKeys: string[] = [];
  const activeFeatures = detectActiveFeatures();

  for (const spec of CONFIG_SCHEMA) {
    const present = hasValue(spec.key);
    if (present) {
      presentKeys.push(spec.key);
    }

    const formatErr = formatError(spec);
    if (formatErr) {
      issues.push({ key: spec.key, class: 'format_error', message: formatErr, remediation: spec.remediation });
      continue;
    }

    if (present) {
      continue;
    }

    if (spec.class === 'required') {
      issues.push({
        key: spec.key,
        class: 'missing_required',
        message: `Required config key '${spec.key}' is missing. ${spec.description}`,
        remediation: spec.remediation,
      });
      continue;
    }

    // A conditional key only matters once its feature is partially configured.
    if (spec.class === 'conditional' && spec.condition && spec.activatedBy && hasValue(spec.activatedBy)) {
      issues.push({
        key: spec.key,
        class: 'missing_conditional',
        message: `Feature '${spec.condition}' is partially configured; '${spec.key}' is missing. ${spec.description}`,
        remediation: spec.remediation,
      });
    }
  }

  const fatalIssues = issues.filter((i) => i.class === 'missing_required');

  return {
    ok: fatalIssues.length === 0 && !issues.some((i) => i.class === 'format_error'),
    presentKeys: presentKeys.sort(),
    issues,
    activeFeatures: [...activeFeatures].sort(),
    fatalIssues,
    validatedAt: now().toISOString(),
  };
}

/** Throws a redaction-safe error when required keys are missing. */
export function assertRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const result = validateRuntimeConfig(now);

  if (result.fatalIssues.length > 0) {
    const reasons = result.fatalIssues.map((i) => i.message).join(' | ');
    throw new Error(`Runtime config validation failed: ${reasons}`);
  }

  return result;
}
