/**
 * Daemon lifecycle
 *
 * One daemon per project, guarded by a PID lock. States:
 *
 *   stopped -> starting -> running -> stopping -> stopped
 *                             \-> error (callback fault; waits for stop)
 *
 * The main loop ticks at a fixed period and runs periodic tasks when their
 * own interval has elapsed. Sleep is sliced so a stop request is seen
 * within one slice; an in-flight callback always finishes first.
 */

import {
  acquirePidLock,
  inspectPidLock,
  isProcessAlive,
  releasePidLock,
  removePidLock,
  type ProcessProbe,
} from '../lib/lock.js';
import { createStatusStore, type DaemonState, type DaemonStatusData, type DaemonStatusRecord, type StatusStore } from '../lib/status-store.js';
import { ensureStateDirs, type DaemonConfig, type StatePaths } from '../lib/config.js';
import { logError, logInfo } from '../lib/fault-logger.js';
import {
  AlreadyRunningError,
  StorageError,
  SwitchyardError,
  ValidationError,
  errorMessage,
  isSwitchyardError,
} from '../lib/errors.js';
import { daemonCommand, nodeDetacher, type DetachRequest, type Detacher } from './detach.js';
import type { DaemonLog } from './log.js';

// ============================================================================
// Types
// ============================================================================

export interface PeriodicTask {
  name: string;
  intervalSeconds: number;
  run(): Promise<void> | void;
}

export interface LifecycleHooks {
  /** After the lock is held, before the first tick. */
  onStart?(): Promise<void> | void;
  /** Every tick while running. */
  onTick?(): Promise<void> | void;
  /** During shutdown, before the final status write. */
  onStop?(): Promise<void> | void;
  tasks?: PeriodicTask[];
}

export interface DaemonLifecycleOptions {
  paths: StatePaths;
  config: DaemonConfig;
  hooks?: LifecycleHooks;
  detacher?: Detacher;
  /** Command a background start launches. */
  command?: () => DetachRequest;
  probe?: ProcessProbe;
  now?: () => Date;
  pid?: number;
  /** Install SIGINT/SIGTERM/SIGHUP handlers on foreground start (default true). */
  installSignals?: boolean;
  log?: DaemonLog;
  sleep?: (ms: number) => Promise<void>;
}

export interface StartOptions {
  /** Default true; false detaches a child that runs in the foreground. */
  foreground?: boolean;
}

export type StartResult =
  | { ok: true; mode: 'foreground' | 'background'; pid: number; reclaimed: boolean }
  | { ok: false; error: SwitchyardError };

const BACKGROUND_POLL_MS = 100;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// ============================================================================
// Lifecycle
// ============================================================================

export class DaemonLifecycle {
  private readonly paths: StatePaths;
  private readonly config: DaemonConfig;
  private readonly hooks: LifecycleHooks;
  private readonly detacher: Detacher;
  private readonly command: () => DetachRequest;
  private readonly probe: ProcessProbe;
  private readonly now: () => Date;
  private readonly pid: number;
  private readonly installSignals: boolean;
  private readonly log: DaemonLog;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly store: StatusStore;

  private currentState: DaemonState = 'stopped';
  private startedAt: Date | null = null;
  private data: DaemonStatusData = {};
  private stopRequested = false;
  private stopReason = 'stop requested';
  private loop: Promise<void> | null = null;
  private readonly lastRun = new Map<string, number>();
  private readonly signalHandlers = new Map<NodeJS.Signals, () => void>();

  constructor(options: DaemonLifecycleOptions) {
    this.paths = options.paths;
    this.config = options.config;
    this.hooks = options.hooks ?? {};
    this.detacher = options.detacher ?? nodeDetacher;
    this.command = options.command ?? (() => daemonCommand(options.paths));
    this.probe = options.probe ?? isProcessAlive;
    this.now = options.now ?? (() => new Date());
    this.pid = options.pid ?? process.pid;
    this.installSignals = options.installSignals ?? true;
    this.log = options.log ?? (() => undefined);
    this.sleep = options.sleep ?? defaultSleep;
    this.store = createStatusStore(options.paths.statusFile);
  }

  get state(): DaemonState {
    return this.currentState;
  }

  /** In-process view of the status record. */
  snapshot(): DaemonStatusRecord {
    return {
      state: this.currentState,
      pid: this.pid,
      started_at: (this.startedAt ?? this.now()).toISOString(),
      last_update: this.now().toISOString(),
      data: { ...this.data },
    };
  }

  async start(options: StartOptions = {}): Promise<StartResult> {
    if (this.currentState !== 'stopped') {
      return { ok: false, error: new ValidationError(`Daemon is already ${this.currentState} in this process`) };
    }

    ensureStateDirs(this.paths);

    const lock = inspectPidLock(this.paths.pidFile, this.probe);
    if (lock.state === 'live' && lock.pid !== this.pid) {
      return { ok: false, error: new AlreadyRunningError(lock.pid) };
    }

    let reclaimed = false;
    if (lock.state === 'stale') {
      removePidLock(this.paths.pidFile);
      reclaimed = true;
      const holder = lock.pid === null ? 'unreadable' : String(lock.pid);
      logInfo('daemon', 'Removed stale PID lock', { pid: lock.pid });
      this.log(`[daemon] Removed stale PID lock (pid=${holder})`);
    }

    if (options.foreground === false) {
      return this.startBackground(reclaimed);
    }
    return this.startForeground(reclaimed);
  }

  /** Resolves once the main loop has exited and shutdown completed. */
  wait(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  /** Ask the loop to stop without waiting for it. */
  requestStop(reason: string = 'stop requested'): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.stopReason = reason;
  }

  /** Stop and wait for shutdown. */
  stop(reason?: string): Promise<void> {
    this.requestStop(reason);
    return this.wait();
  }

  /** Merge into `data` and rewrite the status file. */
  updateStatusData(patch: Partial<DaemonStatusData>): void {
    this.data = { ...this.data, ...patch };
    this.writeStatus();
  }

  // --------------------------------------------------------------------------
  // Start
  // --------------------------------------------------------------------------

  private async startBackground(reclaimed: boolean): Promise<StartResult> {
    let request: DetachRequest;
    try {
      request = this.command();
    } catch (err) {
      return { ok: false, error: toSwitchyardError(err) };
    }

    const { pid } = this.detacher.detach(request);
    if (pid === null) {
      return { ok: false, error: new StorageError(`Could not launch background daemon (${request.command})`) };
    }
    this.log(`[daemon] Launched background daemon (pid=${pid})`);

    const attempts = Math.max(1, Math.ceil(this.config.start_timeout_ms / BACKGROUND_POLL_MS));
    for (let i = 0; i < attempts; i++) {
      const lock = inspectPidLock(this.paths.pidFile, this.probe);
      if (lock.state === 'live') {
        return { ok: true, mode: 'background', pid: lock.pid, reclaimed };
      }
      await this.sleep(BACKGROUND_POLL_MS);
    }

    return {
      ok: false,
      error: new SwitchyardError(
        `Background daemon did not take the lock within ${this.config.start_timeout_ms}ms (see ${this.paths.daemonErr})`,
        'START_TIMEOUT',
        { pid }
      ),
    };
  }

  private async startForeground(reclaimed: boolean): Promise<StartResult> {
    const lock = acquirePidLock(this.paths.pidFile, this.pid, this.probe);
    if (!lock.acquired) {
      return { ok: false, error: new AlreadyRunningError(lock.holder) };
    }

    this.startedAt = this.now();
    this.stopRequested = false;
    this.data = {};
    this.lastRun.clear();
    this.setState('starting');
    if (this.installSignals) this.addSignalHandlers();

    try {
      await this.hooks.onStart?.();
    } catch (err) {
      const error = toSwitchyardError(err);
      logError('daemon', 'Daemon start hook failed', error);
      this.log(`[daemon] Start failed: ${error.message}`);
      this.data.error = error.message;
      this.setState('stopped');
      releasePidLock(this.paths.pidFile, this.pid);
      this.removeSignalHandlers();
      return { ok: false, error };
    }

    this.setState('running');
    this.log(`[daemon] Started (pid=${this.pid})`);
    this.loop = this.runLoop();
    return { ok: true, mode: 'foreground', pid: this.pid, reclaimed };
  }

  // --------------------------------------------------------------------------
  // Main loop
  // --------------------------------------------------------------------------

  private async runLoop(): Promise<void> {
    while (!this.stopRequested) {
      if (this.currentState === 'running') {
        await this.tick();
      }
      await this.sleepUntilNextTick();
    }
    await this.shutdown();
  }

  private async tick(): Promise<void> {
    try {
      await this.hooks.onTick?.();

      for (const task of this.hooks.tasks ?? []) {
        if (this.stopRequested) break;
        const nowMs = this.now().getTime();
        const last = this.lastRun.get(task.name);
        if (last !== undefined && nowMs - last < task.intervalSeconds * 1000) continue;
        this.lastRun.set(task.name, nowMs);
        await task.run();
      }

      this.writeStatus();
    } catch (err) {
      this.fail(err);
    }
  }

  private fail(err: unknown): void {
    const message = errorMessage(err);
    logError('daemon', 'Periodic callback failed, daemon entering error state', err instanceof Error ? err : undefined);
    this.log(`[daemon] Callback failed: ${message}`);
    this.data.error = message;
    this.setState('error');
  }

  private async sleepUntilNextTick(): Promise<void> {
    let remaining = this.config.tick_seconds * 1000;
    while (remaining > 0 && !this.stopRequested) {
      const slice = Math.min(this.config.sleep_slice_ms, remaining);
      await this.sleep(slice);
      remaining -= slice;
    }
  }

  private async shutdown(): Promise<void> {
    this.log(`[daemon] Shutting down (${this.stopReason})...`);
    this.setState('stopping');

    try {
      await this.hooks.onStop?.();
    } catch (err) {
      logError('daemon', 'Stop hook failed', err instanceof Error ? err : undefined);
      this.log(`[daemon] Stop hook failed: ${errorMessage(err)}`);
    }

    this.setState('stopped');
    releasePidLock(this.paths.pidFile, this.pid);
    this.removeSignalHandlers();
    this.log('[daemon] Shutdown complete');
  }

  // --------------------------------------------------------------------------
  // Status + signals
  // --------------------------------------------------------------------------

  private setState(state: DaemonState): void {
    this.currentState = state;
    this.writeStatus();
  }

  private writeStatus(): void {
    try {
      this.store.write(this.snapshot());
    } catch (err) {
      logError('daemon', 'Failed to write daemon status', err instanceof Error ? err : undefined, {
        path: this.store.path,
      });
    }
  }

  private addSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
    // SIGHUP only exists on Unix
    if (process.platform !== 'win32') {
      signals.push('SIGHUP');
    }

    for (const signal of signals) {
      const handler = () => {
        this.stop(signal).catch((err) => this.log(`[daemon] Shutdown failed: ${errorMessage(err)}`));
      };
      this.signalHandlers.set(signal, handler);
      process.on(signal, handler);
    }
  }

  private removeSignalHandlers(): void {
    for (const [signal, handler] of this.signalHandlers) {
      process.off(signal, handler);
    }
    this.signalHandlers.clear();
  }
}

function toSwitchyardError(err: unknown): SwitchyardError {
  if (isSwitchyardError(err)) return err;
  return new SwitchyardError(errorMessage(err));
}
