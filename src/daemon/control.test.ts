import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { getDaemonStatus, restartDaemon, stopDaemon, type Signaller } from './control.js';
import { getStatePaths, type StatePaths } from '../lib/config.js';
import { createStatusStore } from '../lib/status-store.js';

vi.mock('../lib/fault-logger.js', () => ({
  logError: vi.fn(),
  logInfo: vi.fn(),
}));

const T0 = Date.parse('2026-03-01T09:00:00.000Z');

describe('daemon control', () => {
  let root: string;
  let paths: StatePaths;
  let alive: Set<number>;
  const probe = (pid: number) => alive.has(pid);
  const sleep = async () => undefined;

  const writePid = (pid: string) => {
    fs.mkdirSync(paths.tmpDir, { recursive: true });
    fs.writeFileSync(paths.pidFile, pid);
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'switchyard-control-'));
    paths = getStatePaths(root);
    alive = new Set();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('getDaemonStatus', () => {
    it('should report not running without a lock', () => {
      const status = getDaemonStatus(paths, { probe });

      expect(status.running).toBe(false);
      expect(status.stale).toBe(false);
      expect(status.pid).toBeNull();
      expect(status.state).toBe('stopped');
    });

    it('should report a stale lock without removing it', () => {
      writePid('999');

      const status = getDaemonStatus(paths, { probe });

      expect(status.running).toBe(false);
      expect(status.stale).toBe(true);
      expect(status.pid).toBe(999);
      expect(fs.existsSync(paths.pidFile)).toBe(true);
    });

    it('should merge the recorded status of the live daemon', () => {
      writePid('4242');
      alive.add(4242);
      createStatusStore(paths.statusFile).write({
        state: 'running',
        pid: 4242,
        started_at: '2026-03-01T09:00:00.000Z',
        last_update: '2026-03-01T09:01:00.000Z',
        data: { active_context: 'dev', health_score: 90 },
      });

      const status = getDaemonStatus(paths, { probe, now: () => new Date(T0 + 90_000) });

      expect(status).toEqual({
        running: true,
        stale: false,
        pid: 4242,
        state: 'running',
        startedAt: '2026-03-01T09:00:00.000Z',
        lastUpdate: '2026-03-01T09:01:00.000Z',
        uptimeMs: 90_000,
        data: { active_context: 'dev', health_score: 90 },
      });
    });

    it('should ignore a status file written by another daemon', () => {
      writePid('4242');
      alive.add(4242);
      createStatusStore(paths.statusFile).write({
        state: 'stopped',
        pid: 1111,
        started_at: '2026-02-01T09:00:00.000Z',
        last_update: '2026-02-01T10:00:00.000Z',
        data: { active_context: 'dash' },
      });

      const status = getDaemonStatus(paths, { probe });

      expect(status.running).toBe(true);
      expect(status.state).toBe('starting');
      expect(status.uptimeMs).toBeNull();
      expect(status.data).toEqual({});
    });
  });

  describe('stopDaemon', () => {
    it('should report when nothing is running', async () => {
      expect(await stopDaemon(paths, 1000, { probe, sleep })).toEqual({ outcome: 'not-running' });
    });

    it('should clean up a stale lock', async () => {
      writePid('999');

      expect(await stopDaemon(paths, 1000, { probe, sleep })).toEqual({ outcome: 'stale', pid: 999 });
      expect(fs.existsSync(paths.pidFile)).toBe(false);
    });

    it('should signal the daemon and wait for its lock to go', async () => {
      writePid('4242');
      alive.add(4242);
      const signals: Array<[number, string]> = [];
      const kill: Signaller = (pid, signal) => {
        signals.push([pid, signal]);
        fs.unlinkSync(paths.pidFile);
      };

      expect(await stopDaemon(paths, 1000, { probe, sleep, kill })).toEqual({ outcome: 'stopped', pid: 4242 });
      expect(signals).toEqual([[4242, 'SIGTERM']]);
    });

    it('should time out when the lock stays', async () => {
      writePid('4242');
      alive.add(4242);

      const outcome = await stopDaemon(paths, 300, { probe, sleep, kill: () => undefined });

      expect(outcome).toEqual({ outcome: 'timeout', pid: 4242 });
      expect(fs.existsSync(paths.pidFile)).toBe(true);
    });

    it('should treat a vanished process as stale', async () => {
      writePid('4242');
      alive.add(4242);
      const kill: Signaller = () => {
        throw Object.assign(new Error('no such process'), { code: 'ESRCH' });
      };

      expect(await stopDaemon(paths, 1000, { probe, sleep, kill })).toEqual({ outcome: 'stale', pid: 4242 });
      expect(fs.existsSync(paths.pidFile)).toBe(false);
    });
  });

  describe('restartDaemon', () => {
    const started = { ok: true, mode: 'background', pid: 5151, reclaimed: false } as const;

    it('should signal the old daemon, pause, then start', async () => {
      writePid('4242');
      alive.add(4242);
      const order: string[] = [];

      const result = await restartDaemon(
        paths,
        2000,
        async () => {
          order.push('start');
          return started;
        },
        {
          probe,
          kill: (pid, signal) => void order.push(`${signal} ${pid}`),
          sleep: async (ms) => void order.push(`sleep ${ms}`),
        }
      );

      expect(result).toEqual({ signalled: 4242, start: started });
      expect(order).toEqual(['SIGTERM 4242', 'sleep 2000', 'start']);
    });

    it('should start even when nothing was running', async () => {
      const start = vi.fn(async () => started);

      const result = await restartDaemon(paths, 2000, start, { probe, sleep });

      expect(result.signalled).toBeNull();
      expect(start).toHaveBeenCalledTimes(1);
    });
  });
});
