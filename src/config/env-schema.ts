/**
 * Registry of every configuration key faultline reads.
 *
 * Each entry declares:
 *   - `key`         Flat key name (env variable / `getConfigValue` key).
 *   - `type`        Whether the value is a sensitive secret or a plain setting.
 *   - `class`       'required' | 'optional' | 'conditional'.
 *   - `scope`       Subsystem that owns the key.
 *   - `condition`   Feature gate that makes a conditional key applicable.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

import type { ConfigKey } from './json-config.js';

export type ConfigKeyClass = 'required' | 'optional' | 'conditional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'runtime' | 'agent' | 'evidence' | 'source_control' | 'logs';

/** Feature gates referenced by conditional keys, as `<subsystem>:<feature>`. */
export type ConfigCondition = 'evidence:backboard' | 'source_control:github';

export interface ConfigKeySpec {
  key: ConfigKey;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  /** Applies only when class === 'conditional'. */
  condition?: ConfigCondition;
  /** Key whose presence switches the condition on. */
  activatedBy?: ConfigKey;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Runtime ────────────────────────────────────────────────────────────────
  {
    key: 'API_SECRET',
    type: 'secret',
    class: 'required',
    scope: 'runtime',
    description: 'Shared secret for signed API routes and WebSocket authentication.',
    remediation: 'Set API_SECRET in .env or runtime.apiSecret in faultline.json.',
  },
  {
    key: 'API_PORT',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Listening port for the HTTP control plane (default: 8000).',
    remediation: 'Set API_PORT to an integer in range 1-65535, e.g. API_PORT=8080.',
  },
  {
    key: 'DATABASE_PATH',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'SQLite file for the incident store (default: memory/faultline.db).',
    remediation: 'Set DATABASE_PATH to a writable file path.',
  },
  {
    key: 'PROJECT_ROOT',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Trusted root that remediation scripts must resolve inside (default: working directory).',
    remediation: 'Set PROJECT_ROOT to the directory containing scripts/remediation.',
  },

  // ── Agent ──────────────────────────────────────────────────────────────────
  {
    key: 'AGENT_AUTO_REMEDIATE',
    type: 'env',
    class: 'optional',
    scope: 'agent',
    description: 'Auto-run approved playbooks for ingested fault lines (default: true).',
    remediation: 'Set AGENT_AUTO_REMEDIATE=false to require explicit approval.',
  },
  {
    key: 'DEDUP_WINDOW_MS',
    type: 'env',
    class: 'optional',
    scope: 'agent',
    description: 'Suppression window for identical fault events (default: 2000).',
    remediation: 'Set DEDUP_WINDOW_MS to a non-negative integer.',
  },
  {
    key: 'REMEDIATION_TIMEOUT_MS',
    type: 'env',
    class: 'optional',
    scope: 'agent',
    description: 'Hard timeout for remediation scripts (default: 60000).',
    remediation: 'Set REMEDIATION_TIMEOUT_MS to a positive integer.',
  },

  // ── Evidence service ───────────────────────────────────────────────────────
  {
    key: 'BACKBOARD_API_KEY',
    type: 'secret',
    class: 'conditional',
    condition: 'evidence:backboard',
    activatedBy: 'BACKBOARD_ASSISTANT_ID',
    scope: 'evidence',
    description: 'API key for the Backboard retrieval service.',
    remediation: 'Set BACKBOARD_API_KEY; without it incidents are recorded without evidence.',
  },
  {
    key: 'BACKBOARD_ASSISTANT_ID',
    type: 'env',
    class: 'conditional',
    condition: 'evidence:backboard',
    activatedBy: 'BACKBOARD_API_KEY',
    scope: 'evidence',
    description: 'Assistant that owns indexed incident documents.',
    remediation: 'Call POST /incidents/setup-assistant and store the returned id as BACKBOARD_ASSISTANT_ID.',
  },
  {
    key: 'BACKBOARD_BASE_URL',
    type: 'env',
    class: 'optional',
    scope: 'evidence',
    description: 'Backboard API base URL (default: https://app.backboard.io/api).',
    remediation: 'Override BACKBOARD_BASE_URL for a self-hosted deployment.',
  },
  {
    key: 'BACKBOARD_THREAD_ID',
    type: 'env',
    class: 'optional',
    scope: 'evidence',
    description: 'Reuse an existing thread for queries instead of creating one per query.',
    remediation: 'Set BACKBOARD_THREAD_ID to pin queries to one thread.',
  },
  {
    key: 'KB_SEED_DELAY_MS',
    type: 'env',
    class: 'optional',
    scope: 'evidence',
    description: 'Pause between knowledge-base seed uploads (default: 1500).',
    remediation: 'Lower KB_SEED_DELAY_MS only if the evidence service allows bursts.',
  },

  // ── Source control ─────────────────────────────────────────────────────────
  {
    key: 'GITHUB_TOKEN',
    type: 'secret',
    class: 'conditional',
    condition: 'source_control:github',
    activatedBy: 'GITHUB_REPO',
    scope: 'source_control',
    description: 'Token with contents read/write access to the target repository.',
    remediation: 'Set GITHUB_TOKEN to a fine-grained token scoped to the repository.',
  },
  {
    key: 'GITHUB_OWNER',
    type: 'env',
    class: 'conditional',
    condition: 'source_control:github',
    activatedBy: 'GITHUB_REPO',
    scope: 'source_control',
    description: 'Repository owner (user or organisation).',
    remediation: 'Set GITHUB_OWNER alongside GITHUB_REPO.',
  },
  {
    key: 'GITHUB_REPO',
    type: 'env',
    class: 'conditional',
    condition: 'source_control:github',
    activatedBy: 'GITHUB_TOKEN',
    scope: 'source_control',
    description: 'Repository name that fixes are written to.',
    remediation: 'Set GITHUB_REPO alongside GITHUB_OWNER.',
  },

  // ── Log reconstruction ─────────────────────────────────────────────────────
  {
    key: 'LOG_EVENTS_PATH',
    type: 'env',
    class: 'optional',
    scope: 'logs',
    description: 'JSON-lines file of shipped log events (default: memory/log-events.jsonl).',
    remediation: 'Point LOG_EVENTS_PATH at the file your log shipper writes.',
  },
  {
    key: 'LOG_LOOKBACK_MINUTES',
    type: 'env',
    class: 'optional',
    scope: 'logs',
    description: 'How far back reconstruction reads (default: 120).',
    remediation: 'Set LOG_LOOKBACK_MINUTES to a positive integer.',
  },
  {
    key: 'LOG_RECONSTRUCT_CRON',
    type: 'env',
    class: 'optional',
    scope: 'logs',
    description: 'Cron expression for the reconstruction job (default: every 30 seconds).',
    remediation: 'Set LOG_RECONSTRUCT_CRON to a valid node-cron expression.',
  },
] as const;

export const CONFIG_SCHEMA_MAP: ReadonlyMap<string, ConfigKeySpec> = new Map(
  CONFIG_SCHEMA.map((spec) => [spec.key, spec]),
);
