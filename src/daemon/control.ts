/**
 * Out-of-process daemon control: status, stop, restart.
 *
 * Everything here works from the PID lock and the status file, so any CLI
 * invocation can inspect or signal the daemon of a project.
 */

import { inspectPidLock, isProcessAlive, removePidLock, type ProcessProbe } from '../lib/lock.js';
import { createStatusStore, type DaemonState, type DaemonStatusData } from '../lib/status-store.js';
import type { StatePaths } from '../lib/config.js';
import { logInfo } from '../lib/fault-logger.js';
import { errnoCode } from '../lib/errors.js';
import type { StartResult } from './lifecycle.js';

// ============================================================================
// Types
// ============================================================================

export interface DaemonStatusReport {
  running: boolean;
  /** Lock names a process that no longer exists. */
  stale: boolean;
  pid: number | null;
  state: DaemonState;
  startedAt: string | null;
  lastUpdate: string | null;
  uptimeMs: number | null;
  data: DaemonStatusData;
}

export type StopOutcome =
  | { outcome: 'stopped'; pid: number }
  | { outcome: 'not-running' }
  | { outcome: 'stale'; pid: number | null }
  | { outcome: 'timeout'; pid: number };

export type Signaller = (pid: number, signal: NodeJS.Signals) => void;

export interface ControlOptions {
  probe?: ProcessProbe;
  now?: () => Date;
  kill?: Signaller;
  sleep?: (ms: number) => Promise<void>;
}

const POLL_MS = 100;

const defaultKill: Signaller = (pid, signal) => {
  process.kill(pid, signal);
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// ============================================================================
// Status
// ============================================================================

/**
 * Combine the PID lock with the recorded status. A stale lock is reported,
 * not cleaned.
 */
export function getDaemonStatus(paths: StatePaths, options: ControlOptions = {}): DaemonStatusReport {
  const probe = options.probe ?? isProcessAlive;
  const now = options.now ?? (() => new Date());

  const lock = inspectPidLock(paths.pidFile, probe);
  const record = createStatusStore(paths.statusFile).read();

  if (lock.state !== 'live') {
    return {
      running: false,
      stale: lock.state === 'stale',
      pid: lock.state === 'stale' ? lock.pid : null,
      state: 'stopped',
      startedAt: null,
      lastUpdate: record?.last_update ?? null,
      uptimeMs: null,
      data: record?.data ?? {},
    };
  }

  // A status file left by a previous daemon says nothing about this one
  const current = record && record.pid === lock.pid ? record : null;
  const startedAt = current?.started_at ?? null;
  const startedMs = startedAt ? Date.parse(startedAt) : NaN;

  return {
    running: true,
    stale: false,
    pid: lock.pid,
    state: current?.state ?? 'starting',
    startedAt,
    lastUpdate: current?.last_update ?? null,
    uptimeMs: Number.isNaN(startedMs) ? null : Math.max(0, now().getTime() - startedMs),
    data: current?.data ?? {},
  };
}

// ============================================================================
// Stop / restart
// ============================================================================

function sendSignal(kill: Signaller, pid: number, signal: NodeJS.Signals): boolean {
  try {
    kill(pid, signal);
    return true;
  } catch (err) {
    if (errnoCode(err) === 'ESRCH') return false;
    throw err;
  }
}

/**
 * SIGTERM the daemon and wait up to `timeoutMs` for its lock to disappear.
 * A lock naming a dead process is removed and reported as stale.
 */
export async function stopDaemon(
  paths: StatePaths,
  timeoutMs: number,
  options: ControlOptions = {}
): Promise<StopOutcome> {
  const probe = options.probe ?? isProcessAlive;
  const kill = options.kill ?? defaultKill;
  const sleep = options.sleep ?? defaultSleep;

  const lock = inspectPidLock(paths.pidFile, probe);
  if (lock.state === 'absent') return { outcome: 'not-running' };

  if (lock.state === 'stale' || !sendSignal(kill, lock.pid, 'SIGTERM')) {
    const pid = lock.pid;
    removePidLock(paths.pidFile);
    logInfo('daemon', 'Removed stale PID lock', { pid });
    return { outcome: 'stale', pid };
  }

  const attempts = Math.max(1, Math.ceil(timeoutMs / POLL_MS));
  for (let i = 0; i < attempts; i++) {
    await sleep(POLL_MS);
    const current = inspectPidLock(paths.pidFile, probe);
    if (current.state === 'absent') return { outcome: 'stopped', pid: lock.pid };
    if (current.state === 'stale') {
      // Died without cleaning up
      removePidLock(paths.pidFile);
      return { outcome: 'stopped', pid: lock.pid };
    }
    if (current.pid !== lock.pid) return { outcome: 'stopped', pid: lock.pid };
  }

  return { outcome: 'timeout', pid: lock.pid };
}

export interface RestartResult {
  /** PID that was signalled, if any. */
  signalled: number | null;
  start: StartResult;
}

/**
 * Best-effort SIGTERM, a fixed pause, then a background start whatever the
 * old daemon did.
 */
export async function restartDaemon(
  paths: StatePaths,
  waitMs: number,
  start: () => Promise<StartResult>,
  options: ControlOptions = {}
): Promise<RestartResult> {
  const probe = options.probe ?? isProcessAlive;
  const kill = options.kill ?? defaultKill;
  const sleep = options.sleep ?? defaultSleep;

  const lock = inspectPidLock(paths.pidFile, probe);
  let signalled: number | null = null;
  if (lock.state === 'live' && sendSignal(kill, lock.pid, 'SIGTERM')) {
    signalled = lock.pid;
    if (waitMs > 0) await sleep(waitMs);
  }

  return { signalled, start: await start() };
}
