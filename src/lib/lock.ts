import fs from 'fs';
import path from 'path';
import { StorageError, errnoCode } from './errors.js';

const LOCK_TIMEOUT_MS = 30000; // 30 seconds max lock hold time
const LOCK_RETRY_MS = 100; // Retry every 100ms
const LOCK_MAX_RETRIES = 300; // 30 seconds total wait time

export interface LockInfo {
  pid: number;
  timestamp: number;
  operation: string;
}

function parseLockInfo(content: string): LockInfo | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }
  if (
    raw !== null &&
    typeof raw === 'object' &&
    'pid' in raw &&
    'timestamp' in raw &&
    'operation' in raw &&
    typeof raw.pid === 'number' &&
    typeof raw.timestamp === 'number' &&
    typeof raw.operation === 'string'
  ) {
    return { pid: raw.pid, timestamp: raw.timestamp, operation: raw.operation };
  }
  return null;
}

function readLockInfo(lockPath: string): LockInfo | null {
  try {
    return parseLockInfo(fs.readFileSync(lockPath, 'utf-8'));
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw err;
  }
}

/**
 * Check if a process is still running.
 * EPERM means it exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === 'EPERM';
  }
}

/**
 * Check if lock is stale (unreadable, process dead or timeout exceeded)
 */
function isLockStale(lockInfo: LockInfo | null): boolean {
  if (!lockInfo) {
    return true;
  }

  if (!isProcessAlive(lockInfo.pid)) {
    return true;
  }

  if (Date.now() - lockInfo.timestamp > LOCK_TIMEOUT_MS) {
    return true;
  }

  return false;
}

/**
 * A lock file that cannot be parsed may be mid-write by its creator;
 * only treat it as stale once it has been unreadable for a while.
 */
function isLockFileStale(lockPath: string): boolean {
  const lockInfo = readLockInfo(lockPath);
  if (lockInfo) return isLockStale(lockInfo);
  try {
    return Date.now() - fs.statSync(lockPath).mtimeMs > LOCK_RETRY_MS * 10;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return true;
    throw err;
  }
}

function removeIfPresent(filePath: string): void {
  try {
    fs.unlinkSync(filePath);
  } catch (err) {
    if (errnoCode(err) !== 'ENOENT') throw err;
  }
}

// ============================================================================
// Advisory operation lock
// ============================================================================

/**
 * Acquire an advisory lock file for a read-modify-write operation.
 * Returns a release function to call when done.
 */
export async function acquireLock(lockPath: string, operation: string): Promise<() => void> {
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  const lockInfo: LockInfo = {
    pid: process.pid,
    timestamp: Date.now(),
    operation,
  };

  let retries = 0;

  while (retries < LOCK_MAX_RETRIES) {
    try {
      // 'wx' - exclusive create, fails if file exists
      fs.writeFileSync(lockPath, JSON.stringify(lockInfo), { flag: 'wx' });

      return () => {
        // Only remove if it's our lock
        const currentLock = readLockInfo(lockPath);
        if (currentLock && currentLock.pid === process.pid && currentLock.timestamp === lockInfo.timestamp) {
          removeIfPresent(lockPath);
        }
      };
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') {
        throw err;
      }
    }

    // Held by someone: reclaim if stale, otherwise wait and retry
    if (isLockFileStale(lockPath)) {
      removeIfPresent(lockPath);
      continue;
    }
    retries++;
    await new Promise((resolve) => setTimeout(resolve, LOCK_RETRY_MS));
  }

  throw new StorageError(
    `Could not acquire lock for ${operation} after ${(LOCK_MAX_RETRIES * LOCK_RETRY_MS) / 1000}s`,
    { lockPath }
  );
}

/**
 * Execute a function with lock protection
 */
export async function withLock<T>(lockPath: string, operation: string, fn: () => Promise<T>): Promise<T> {
  const release = await acquireLock(lockPath, operation);
  try {
    return await fn();
  } finally {
    release();
  }
}

// ============================================================================
// Daemon PID lock
// ============================================================================

export type ProcessProbe = (pid: number) => boolean;

export type PidLockState =
  | { state: 'absent' }
  | { state: 'live'; pid: number }
  | { state: 'stale'; pid: number | null };

export type PidLockResult =
  | { acquired: true; reclaimed: PidLockState | null }
  | { acquired: false; holder: number };

/** Parse a PID file: plain decimal text. */
export function readPidFile(pidFile: string): number | null {
  let content: string;
  try {
    content = fs.readFileSync(pidFile, 'utf-8').trim();
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw err;
  }
  if (!/^\d+$/.test(content)) return null;
  const pid = parseInt(content, 10);
  return pid > 0 ? pid : null;
}

export function inspectPidLock(pidFile: string, probe: ProcessProbe = isProcessAlive): PidLockState {
  if (!fs.existsSync(pidFile)) return { state: 'absent' };
  const pid = readPidFile(pidFile);
  if (pid !== null && probe(pid)) return { state: 'live', pid };
  return { state: 'stale', pid };
}

/**
 * Take the daemon PID lock for `pid`. A lock naming a dead process (or
 * holding garbage) is removed and retaken.
 */
export function acquirePidLock(
  pidFile: string,
  pid: number = process.pid,
  probe: ProcessProbe = isProcessAlive
): PidLockResult {
  fs.mkdirSync(path.dirname(pidFile), { recursive: true });

  let reclaimed: PidLockState | null = null;
  for (let attempt = 0; attempt < 3; attempt++) {
    try {
      fs.writeFileSync(pidFile, String(pid), { flag: 'wx' });
      return { acquired: true, reclaimed };
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') throw err;
    }

    const current = inspectPidLock(pidFile, probe);
    if (current.state === 'live') {
      if (current.pid === pid) return { acquired: true, reclaimed };
      return { acquired: false, holder: current.pid };
    }
    if (current.state === 'stale') {
      reclaimed = current;
      removeIfPresent(pidFile);
    }
  }

  throw new StorageError(`Could not create PID lock ${pidFile}`, { pidFile });
}

/** Remove the PID lock if it names `pid`. */
export function releasePidLock(pidFile: string, pid: number = process.pid): boolean {
  if (readPidFile(pidFile) !== pid) return false;
  removeIfPresent(pidFile);
  return true;
}

/** Remove a PID lock regardless of owner (stale lock cleanup). */
export function removePidLock(pidFile: string): boolean {
  if (!fs.existsSync(pidFile)) return false;
  removeIfPresent(pidFile);
  return true;
}
