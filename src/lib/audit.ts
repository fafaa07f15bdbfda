/**
 * Project health audit
 *
 * Default health scorer for the daemon and the `audit` command.
 *
 * Checks:
 * - every context file exists (critical) and stays under the line limit (warning)
 * - every watch directory exists (info)
 * - full mode only: file counts per watch directory, message log size
 *
 * Score: 100 - 20 per critical - 5 per warning - 1 per info, floored at 0.
 */

import fs from 'fs';
import path from 'path';
import { glob } from 'glob';
import type { ContextRegistry } from './registry.js';
import type { HealthIssues } from './status-store.js';
import { WATCHER_IGNORE_GLOBS } from './patterns.js';
import { errorMessage } from './errors.js';
import { logWarn } from './fault-logger.js';
import type { Mailbox } from '../daemon/mailbox.js';

export const SEVERITY_WEIGHTS = {
  critical: 20,
  warning: 5,
  info: 1,
} as const;

export interface WatchDirReport {
  /** Relative to the project root. */
  dir: string;
  exists: boolean;
  /** Full mode only. */
  files: number | null;
}

export interface ContextAuditEntry {
  id: string;
  file: string;
  exists: boolean;
  lines: number | null;
  watch: WatchDirReport[];
}

export interface AuditReport {
  score: number;
  issues: HealthIssues;
  contexts: ContextAuditEntry[];
  mailbox: { total: number; unread: number } | null;
  quick: boolean;
  summary: string;
}

export interface AuditOptions {
  registry: ContextRegistry;
  quick?: boolean;
  maxContextLines?: number;
  /** Message log to report on in full mode. */
  mailbox?: Mailbox;
}

export interface HealthResult {
  score: number;
  issues: HealthIssues;
}

/** Anything the daemon can call for its periodic health check. */
export type HealthScorer = () => Promise<HealthResult>;

export const DEFAULT_MAX_CONTEXT_LINES = 500;

export function scoreIssues(issues: HealthIssues): number {
  const penalty =
    issues.critical.length * SEVERITY_WEIGHTS.critical +
    issues.warning.length * SEVERITY_WEIGHTS.warning +
    issues.info.length * SEVERITY_WEIGHTS.info;
  return Math.max(0, 100 - penalty);
}

export function countLines(content: string): number {
  if (content.length === 0) return 0;
  const lines = content.split('\n').length;
  return content.endsWith('\n') ? lines - 1 : lines;
}

function relative(root: string, target: string): string {
  return path.relative(root, target).split(path.sep).join('/');
}

export async function runAudit(options: AuditOptions): Promise<AuditReport> {
  const { registry } = options;
  const quick = options.quick ?? false;
  const maxLines = options.maxContextLines ?? DEFAULT_MAX_CONTEXT_LINES;
  const issues: HealthIssues = { critical: [], warning: [], info: [] };
  const contexts: ContextAuditEntry[] = [];

  const watchDirs = registry.watchDirs();

  for (const id of registry.ids()) {
    const filePath = registry.contextFilePath(id);
    const file = relative(registry.root, filePath);
    const entry: ContextAuditEntry = { id, file, exists: fs.existsSync(filePath), lines: null, watch: [] };

    if (!entry.exists) {
      issues.critical.push(`Context file missing for ${id}: ${file}`);
    } else {
      entry.lines = countLines(fs.readFileSync(filePath, 'utf-8'));
      if (entry.lines > maxLines) {
        issues.warning.push(`${file} has ${entry.lines} lines (limit ${maxLines})`);
      }
    }

    for (const dir of watchDirs.get(id) ?? []) {
      const report: WatchDirReport = { dir: relative(registry.root, dir), exists: fs.existsSync(dir), files: null };
      if (!report.exists) {
        issues.info.push(`Watch directory missing for ${id}: ${report.dir}`);
      } else if (!quick) {
        const files = await glob('**/*', { cwd: dir, nodir: true, dot: true, ignore: WATCHER_IGNORE_GLOBS });
        report.files = files.length;
      }
      entry.watch.push(report);
    }

    contexts.push(entry);
  }

  let mailbox: AuditReport['mailbox'] = null;
  if (!quick && options.mailbox) {
    try {
      const messages = await options.mailbox.list();
      mailbox = { total: messages.length, unread: messages.filter((m) => m.read_at === null).length };
    } catch (err) {
      logWarn('audit', 'Could not read message log', { error: errorMessage(err) });
      issues.warning.push(`Message log unreadable: ${errorMessage(err)}`);
    }
  }

  const score = scoreIssues(issues);
  return {
    score,
    issues,
    contexts,
    mailbox,
    quick,
    summary: `Health Score: ${score} | Critical: ${issues.critical.length} | Warnings: ${issues.warning.length} | Info: ${issues.info.length}`,
  };
}
