/**
 * JSON file stores for daemon state.
 *
 * Writes are whole-file and atomic (temp file + rename), so a reader in
 * another process sees either the previous or the next value. Content that
 * fails to parse or validate reads as absent and is reported to the fault log.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logError } from './fault-logger.js';
import { CorruptStateError } from './errors.js';

// ============================================================================
// Generic store
// ============================================================================

export type StoreReadResult<T> =
  | { status: 'missing' }
  | { status: 'ok'; value: T }
  | { status: 'corrupt'; reason: string };

export interface JsonStore<T> {
  readonly path: string;
  /** Value, or null when missing or corrupt. */
  read(): T | null;
  /** Distinguishes missing from corrupt. */
  inspect(): StoreReadResult<T>;
  write(value: T): void;
  remove(): boolean;
  /** Move a corrupt file aside to `<file>.corrupt`. */
  quarantine(): string | null;
}

export function writeFileAtomic(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmpPath, content);
  fs.renameSync(tmpPath, filePath);
}

export function createJsonStore<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  component: string
): JsonStore<T> {
  function inspect(): StoreReadResult<T> {
    if (!fs.existsSync(filePath)) return { status: 'missing' };

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
      return { status: 'corrupt', reason: err instanceof Error ? err.message : String(err) };
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      const reason = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return { status: 'corrupt', reason };
    }
    return { status: 'ok', value: result.data };
  }

  return {
    path: filePath,

    inspect,

    read(): T | null {
      const result = inspect();
      if (result.status === 'corrupt') {
        logError(
          component,
          `Ignoring corrupt state file ${filePath}`,
          new CorruptStateError(result.reason, { path: filePath })
        );
        return null;
      }
      return result.status === 'ok' ? result.value : null;
    },

    write(value: T): void {
      // Round-trip through the schema so key order is stable across rewrites
      const normalized = schema.parse(value);
      writeFileAtomic(filePath, JSON.stringify(normalized, null, 2) + '\n');
    },

    remove(): boolean {
      if (!fs.existsSync(filePath)) return false;
      fs.unlinkSync(filePath);
      return true;
    },

    quarantine(): string | null {
      if (!fs.existsSync(filePath)) return null;
      const target = `${filePath}.corrupt`;
      fs.renameSync(filePath, target);
      return target;
    },
  };
}

// ============================================================================
// Daemon status
// ============================================================================

export const DAEMON_STATES = ['starting', 'running', 'stopping', 'stopped', 'error'] as const;
export type DaemonState = (typeof DAEMON_STATES)[number];

export const ContextActivitySchema = z.object({
  last_activity: z.string().nullable(),
  seconds_ago: z.number().int().nonnegative().nullable(),
  recent_events: z.number().int().nonnegative(),
});

export const HealthIssuesSchema = z.object({
  critical: z.array(z.string()),
  warning: z.array(z.string()),
  info: z.array(z.string()),
});

export const StatusDataSchema = z.object({
  health_score: z.number().optional(),
  issues: HealthIssuesSchema.optional(),
  last_health_check: z.string().optional(),
  last_cleanup: z.string().optional(),
  messages_trimmed: z.number().int().nonnegative().optional(),
  active_context: z.string().nullable().optional(),
  activity: z.record(ContextActivitySchema).optional(),
  watcher: z
    .object({
      directories: z.number().int().nonnegative(),
      failed: z.number().int().nonnegative(),
      forwarded: z.number().int().nonnegative(),
    })
    .optional(),
  port_mode: z.enum(['normal', 'fallback']).optional(),
  ports: z.record(z.number()).optional(),
  error: z.string().optional(),
});

export const DaemonStatusSchema = z.object({
  state: z.enum(DAEMON_STATES),
  pid: z.number().int().positive(),
  started_at: z.string(),
  last_update: z.string(),
  data: StatusDataSchema,
});

export type ContextActivityRecord = z.infer<typeof ContextActivitySchema>;
export type HealthIssues = z.infer<typeof HealthIssuesSchema>;
export type DaemonStatusData = z.infer<typeof StatusDataSchema>;
export type DaemonStatusRecord = z.infer<typeof DaemonStatusSchema>;

export type StatusStore = JsonStore<DaemonStatusRecord>;

export function createStatusStore(filePath: string): StatusStore {
  return createJsonStore(filePath, DaemonStatusSchema, 'status-store');
}
