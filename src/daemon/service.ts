/**
 * Daemon service for switchyard
 *
 * Composes one project's runtime:
 * - lifecycle (PID lock, main loop, signals)
 * - file watcher feeding the activity tracker
 * - periodic health check (quick audit by default) and mailbox cleanup
 *
 * The status file is the daemon's only output; CLI invocations read it.
 */

import { getConfig, getPortMode, getStatePaths, type PortMode, type StatePaths, type SwitchyardConfig } from '../lib/config.js';
import { flushConfigIssues } from '../lib/fault-logger.js';
import { loadRegistry, type ContextRegistry } from '../lib/registry.js';
import { runAudit, type HealthScorer } from '../lib/audit.js';
import type { ProcessProbe } from '../lib/lock.js';
import type { ContextActivityRecord, DaemonStatusData } from '../lib/status-store.js';
import { createActivityTracker, type ActivityTracker, type ContextActivity } from './activity.js';
import { createFileActivityWatcher, type FileActivityWatcher, type WatchBackend, type WatcherStatus } from './watcher.js';
import { openMailbox } from './mailbox-backend.js';
import type { Mailbox } from './mailbox.js';
import { DaemonLifecycle, type PeriodicTask } from './lifecycle.js';
import { createDaemonLog, type DaemonLog } from './log.js';
import type { DetachRequest, Detacher } from './detach.js';

// ============================================================================
// Types
// ============================================================================

export interface DaemonRuntimeOptions {
  root: string;
  config?: SwitchyardConfig;
  registry?: ContextRegistry;
  portMode?: PortMode;
  healthScorer?: HealthScorer;
  watchBackend?: WatchBackend;
  detacher?: Detacher;
  command?: () => DetachRequest;
  probe?: ProcessProbe;
  now?: () => Date;
  pid?: number;
  installSignals?: boolean;
  sleep?: (ms: number) => Promise<void>;
  log?: DaemonLog;
}

export interface DaemonRuntime {
  readonly paths: StatePaths;
  readonly registry: ContextRegistry;
  readonly lifecycle: DaemonLifecycle;
  readonly tracker: ActivityTracker;
  readonly watcher: FileActivityWatcher;
  /** Opened on first use. */
  mailbox(): Mailbox;
}

// ============================================================================
// Status mapping
// ============================================================================

export function toActivityRecord(summary: Record<string, ContextActivity>): Record<string, ContextActivityRecord> {
  const record: Record<string, ContextActivityRecord> = {};
  for (const [context, entry] of Object.entries(summary)) {
    record[context] = {
      last_activity: entry.lastActivity,
      seconds_ago: entry.secondsAgo,
      recent_events: entry.recentEvents,
    };
  }
  return record;
}

function watcherData(status: WatcherStatus): NonNullable<DaemonStatusData['watcher']> {
  return {
    directories: status.directories.length,
    failed: status.failed.length,
    forwarded: status.forwarded,
  };
}

// ============================================================================
// Runtime
// ============================================================================

export function createDaemonRuntime(options: DaemonRuntimeOptions): DaemonRuntime {
  const config = options.config ?? getConfig();
  const paths = getStatePaths(options.root);
  const registry = options.registry ?? loadRegistry(options.root);
  const portMode = options.portMode ?? getPortMode();
  const log = options.log ?? createDaemonLog(paths.daemonLog);
  const now = options.now;
  const nowMs = now ? () => now().getTime() : undefined;

  const tracker = createActivityTracker({
    contexts: registry.ids(),
    windowSeconds: config.activity.window_seconds,
    bufferSize: config.activity.buffer_size,
    now: nowMs,
  });

  const watcher = createFileActivityWatcher({
    root: registry.root,
    directories: registry.watchDirs(),
    tracker,
    debounceMs: config.activity.debounce_ms,
    ignore: config.activity.ignore,
    backend: options.watchBackend,
    now: nowMs,
    log,
  });

  let openedMailbox: Mailbox | null = null;
  const mailbox = (): Mailbox => {
    if (!openedMailbox) {
      openedMailbox = openMailbox(registry, paths, config.mailbox, now);
    }
    return openedMailbox;
  };

  const healthScorer: HealthScorer =
    options.healthScorer ??
    (() => runAudit({ registry, quick: true, maxContextLines: config.audit.max_context_lines }));

  const timestamp = () => (now ? now() : new Date()).toISOString();
  let lastActive: string | null = null;
  let trimmed = 0;

  const tasks: PeriodicTask[] = [
    {
      name: 'health',
      intervalSeconds: config.daemon.health_check_seconds,
      run: async () => {
        const result = await healthScorer();
        lifecycle.updateStatusData({
          health_score: result.score,
          issues: result.issues,
          last_health_check: timestamp(),
        });
        log(`[health] Score ${result.score} (critical=${result.issues.critical.length}, warning=${result.issues.warning.length})`);
      },
    },
    {
      name: 'cleanup',
      intervalSeconds: config.daemon.cleanup_seconds,
      run: async () => {
        const removed = await mailbox().cleanup({
          retentionDays: config.mailbox.retention_days,
          maxMessages: config.mailbox.max_messages,
        });
        trimmed += removed;
        lifecycle.updateStatusData({ last_cleanup: timestamp(), messages_trimmed: trimmed });
        if (removed > 0) log(`[mailbox] Trimmed ${removed} messages`);
      },
    },
  ];

  const lifecycle: DaemonLifecycle = new DaemonLifecycle({
    paths,
    config: config.daemon,
    detacher: options.detacher,
    command: options.command,
    probe: options.probe,
    now,
    pid: options.pid,
    installSignals: options.installSignals,
    sleep: options.sleep,
    log,
    hooks: {
      onStart: async () => {
        const issues = flushConfigIssues();
        if (issues > 0) log(`[config] ${issues} invalid config values replaced by defaults (see faults.log)`);

        const status = await watcher.start();
        lifecycle.updateStatusData({
          port_mode: portMode,
          ports: { ...registry.ports(portMode) },
          watcher: watcherData(status),
          active_context: null,
        });
      },

      onTick: () => {
        const active = tracker.activeContext();
        if (active !== lastActive) {
          log(`[activity] Active context: ${active ?? 'none'}`);
          lastActive = active;
        }
        lifecycle.updateStatusData({
          active_context: active,
          activity: toActivityRecord(tracker.activitySummary()),
          watcher: watcherData(watcher.status()),
        });
      },

      onStop: async () => {
        await watcher.stop();
        if (openedMailbox) {
          openedMailbox.close();
          openedMailbox = null;
        }
      },

      tasks,
    },
  });

  return { paths, registry, lifecycle, tracker, watcher, mailbox };
}
