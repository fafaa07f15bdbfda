/**
 * Config validation (Zod) and deep merge utility.
 *
 * Each section is validated on its own: an invalid section is reported and
 * replaced by its defaults, the rest of the file still applies.
 * Unknown keys are dropped.
 */

import { z } from 'zod';
import type { SwitchyardConfig } from './config-types.js';
import {
  DEFAULT_DAEMON_CONFIG,
  DEFAULT_ACTIVITY_CONFIG,
  DEFAULT_MAILBOX_CONFIG,
  DEFAULT_SPAWN_CONFIG,
  DEFAULT_AUDIT_CONFIG,
  DEFAULT_ERROR_REPORTING_CONFIG,
} from './config-defaults.js';

// ---------- Deep merge ----------

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively merge `source` into `target`.
 * - Objects are merged recursively (not replaced)
 * - Arrays and primitives from `source` override `target`
 * - `undefined` values in source are skipped
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];

    if (srcVal === undefined) continue;

    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }

  return result;
}

// ---------- Zod schemas ----------

const positive = z.number().positive();
const positiveInt = z.number().int().positive();

const DaemonSchema = z
  .object({
    tick_seconds: positive,
    health_check_seconds: positive,
    cleanup_seconds: positive,
    sleep_slice_ms: positiveInt,
    restart_wait_ms: z.number().int().nonnegative(),
    stop_timeout_ms: positiveInt,
    start_timeout_ms: positiveInt,
  })
  .partial();

const ActivitySchema = z
  .object({
    window_seconds: positive,
    buffer_size: positiveInt,
    debounce_ms: z.number().int().nonnegative(),
    ignore: z.array(z.string().min(1)),
  })
  .partial();

const MailboxSchema = z
  .object({
    backend: z.enum(['file', 'sqlite']),
    retention_days: positive,
    max_messages: positiveInt,
  })
  .partial();

const SpawnSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()),
  })
  .partial();

const AuditSchema = z
  .object({
    max_context_lines: positiveInt,
  })
  .partial();

const ErrorReportingSchema = z
  .object({
    enabled: z.boolean(),
    level: z.enum(['error', 'warn', 'info', 'debug']),
    max_file_size_mb: positive,
  })
  .partial();

// ---------- Resolution ----------

export interface ConfigResolution {
  config: SwitchyardConfig;
  /** Human-readable problems found in the raw config, one per invalid value. */
  issues: string[];
}

function resolveSection<T extends object>(
  name: string,
  schema: z.ZodType<Partial<T>, z.ZodTypeDef, unknown>,
  raw: unknown,
  defaults: T,
  issues: string[]
): T {
  if (raw === undefined) return { ...defaults };

  const result = schema.safeParse(raw);
  if (!result.success) {
    for (const issue of result.error.issues) {
      const path = [name, ...issue.path].join('.');
      issues.push(`Invalid config value at "${path}": ${issue.message}`);
    }
    return { ...defaults };
  }

  return { ...defaults, ...result.data };
}

/**
 * Validate a merged raw config and fill in defaults. Never throws.
 */
export function resolveConfig(raw: Record<string, unknown>): ConfigResolution {
  const issues: string[] = [];

  const config: SwitchyardConfig = {
    daemon: resolveSection('daemon', DaemonSchema, raw.daemon, DEFAULT_DAEMON_CONFIG, issues),
    activity: resolveSection('activity', ActivitySchema, raw.activity, DEFAULT_ACTIVITY_CONFIG, issues),
    mailbox: resolveSection('mailbox', MailboxSchema, raw.mailbox, DEFAULT_MAILBOX_CONFIG, issues),
    spawn: resolveSection('spawn', SpawnSchema, raw.spawn, DEFAULT_SPAWN_CONFIG, issues),
    audit: resolveSection('audit', AuditSchema, raw.audit, DEFAULT_AUDIT_CONFIG, issues),
    error_reporting: resolveSection(
      'error_reporting',
      ErrorReportingSchema,
      raw.error_reporting,
      DEFAULT_ERROR_REPORTING_CONFIG,
      issues
    ),
  };

  return { config, issues };
}
