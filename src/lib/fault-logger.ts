/**
 * Centralized fault logger for switchyard.
 *
 * Two channels:
 * 1. Local file: .switchyard/faults.log (JSON lines, with rotation)
 * 2. stderr echo when SWITCHYARD_DEBUG is set
 */

import fs from 'node:fs';
import { getStatePaths, getErrorReportingConfig, isDebugEnabled, takeConfigIssues } from './config.js';
import type { FaultLevel } from './config.js';

export type { FaultLevel } from './config.js';

export interface FaultEntry {
  timestamp: string;
  level: FaultLevel;
  component: string;
  message: string;
  code?: string;
  stack?: string;
  context?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<FaultLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// ---------------------------------------------------------------------------
// Channel 1: Local file with rotation
// ---------------------------------------------------------------------------

function rotateIfNeeded(logPath: string, maxSizeMb: number): void {
  if (!fs.existsSync(logPath)) return;
  if (fs.statSync(logPath).size > maxSizeMb * 1024 * 1024) {
    fs.renameSync(logPath, logPath + '.1');
  }
}

function writeToFile(entry: FaultEntry, maxSizeMb: number): void {
  const { stateDir, faultLog: logPath } = getStatePaths();

  if (!fs.existsSync(stateDir)) {
    fs.mkdirSync(stateDir, { recursive: true });
  }

  rotateIfNeeded(logPath, maxSizeMb);
  fs.appendFileSync(logPath, JSON.stringify(entry) + '\n');
}

// ---------------------------------------------------------------------------
// Channel 2: stderr (debug only)
// ---------------------------------------------------------------------------

function echoToStderr(entry: FaultEntry): void {
  const ctx = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  process.stderr.write(`[${entry.level}] [${entry.component}] ${entry.message}${ctx}\n`);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Log a fault to all configured channels.
 * Never throws: a failing channel reports itself on stderr and is skipped.
 */
export function logFault(
  level: FaultLevel,
  component: string,
  message: string,
  opts?: { error?: Error; context?: Record<string, unknown> }
): void {
  try {
    const config = getErrorReportingConfig();
    if (!config.enabled) return;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[config.level]) return;

    const code = opts?.error && 'code' in opts.error && typeof opts.error.code === 'string'
      ? opts.error.code
      : undefined;

    const entry: FaultEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      code,
      stack: opts?.error?.stack,
      context: opts?.context,
    };

    if (isDebugEnabled()) {
      echoToStderr(entry);
    }

    writeToFile(entry, config.max_file_size_mb);
  } catch (err) {
    process.stderr.write(
      `[fault-logger] could not record fault from ${component}: ${err instanceof Error ? err.message : String(err)}\n`
    );
  }
}

/** Log an error (convenience wrapper). */
export function logError(
  component: string,
  message: string,
  error?: Error,
  context?: Record<string, unknown>
): void {
  logFault('error', component, message, { error, context });
}

/** Log a warning (convenience wrapper). */
export function logWarn(
  component: string,
  message: string,
  context?: Record<string, unknown>
): void {
  logFault('warn', component, message, { context });
}

/** Log an info message (convenience wrapper). */
export function logInfo(
  component: string,
  message: string,
  context?: Record<string, unknown>
): void {
  logFault('info', component, message, { context });
}

/** Log a debug trace (only recorded under SWITCHYARD_DEBUG or level=debug). */
export function logDebug(
  component: string,
  message: string,
  context?: Record<string, unknown>
): void {
  logFault('debug', component, message, { context });
}

/** Record config problems found while loading config files. */
export function flushConfigIssues(): number {
  const issues = takeConfigIssues();
  for (const issue of issues) {
    logWarn('config', issue);
  }
  return issues.length;
}
