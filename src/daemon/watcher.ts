/**
 * File activity watcher for the daemon
 *
 * File monitoring using @parcel/watcher (native C++, reliable on Windows).
 * One recursive subscription per existing watch directory; raw events are
 * filtered, debounced per (context, path) and forwarded to the tracker.
 * Events on directories are not activity and are dropped.
 */

import fs from 'fs';
import path from 'path';
import { performance } from 'perf_hooks';
import watcher from '@parcel/watcher';
import type { AsyncSubscription, Event } from '@parcel/watcher';
import { logDebug, logError, logWarn } from '../lib/fault-logger.js';
import { WatcherSetupError, errorMessage } from '../lib/errors.js';
import { shouldIgnorePath, WATCHER_IGNORE_GLOBS } from '../lib/patterns.js';
import type { ActivityKind, ActivityTracker } from './activity.js';

// ============================================================================
// Types
// ============================================================================

export type WatchCallback = (err: Error | null, events: Event[]) => unknown;

/** The part of @parcel/watcher we use; swapped for a fake in tests. */
export interface WatchBackend {
  subscribe(dir: string, fn: WatchCallback, opts?: { ignore?: string[] }): Promise<AsyncSubscription>;
}

export interface FileActivityWatcherOptions {
  root: string;
  /** Absolute watch directories per context. */
  directories: ReadonlyMap<string, readonly string[]>;
  tracker: Pick<ActivityTracker, 'record'>;
  debounceMs?: number;
  ignore?: readonly string[];
  backend?: WatchBackend;
  /** Debounce clock in ms; monotonic by default. */
  now?: () => number;
  log?: (msg: string) => void;
}

export interface WatcherStatus {
  active: boolean;
  /** "context:dir" for each live subscription */
  directories: string[];
  skipped: string[];
  failed: string[];
  forwarded: number;
  dropped: number;
}

export interface FileActivityWatcher {
  start(): Promise<WatcherStatus>;
  stop(): Promise<void>;
  status(): WatcherStatus;
  /** Feed raw events for one context; what the subscriptions call. */
  handleEvents(context: string, events: readonly Event[]): void;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_DEBOUNCE_MS = 1000;

const KIND_BY_EVENT: Record<Event['type'], ActivityKind> = {
  create: 'created',
  update: 'modified',
  delete: 'deleted',
};

// Prune the debounce map once it grows past this many paths
const DEBOUNCE_PRUNE_THRESHOLD = 1000;

export const parcelBackend: WatchBackend = {
  subscribe: (dir, fn, opts) => watcher.subscribe(dir, fn, opts),
};

// A deleted path can no longer be told apart and is kept
function isDirectory(event: Event): boolean {
  if (event.type === 'delete') return false;
  return fs.statSync(event.path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

// ============================================================================
// Watcher
// ============================================================================

export function createFileActivityWatcher(options: FileActivityWatcherOptions): FileActivityWatcher {
  const backend = options.backend ?? parcelBackend;
  const debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
  const extraIgnore = options.ignore ?? [];
  const now = options.now ?? (() => performance.now());
  const log = options.log ?? (() => {});

  const subscriptions: Array<{ key: string; subscription: AsyncSubscription }> = [];
  const lastForwarded = new Map<string, number>();
  let skipped: string[] = [];
  let failed: string[] = [];
  let active = false;
  let forwarded = 0;
  let dropped = 0;

  function pruneDebounce(at: number): void {
    if (lastForwarded.size < DEBOUNCE_PRUNE_THRESHOLD) return;
    for (const [key, ts] of lastForwarded) {
      if (ts > at || at - ts >= debounceMs) lastForwarded.delete(key);
    }
  }

  function handleEvents(context: string, events: readonly Event[]): void {
    for (const event of events) {
      const relativePath = path.relative(options.root, event.path);
      if (shouldIgnorePath(relativePath, extraIgnore, path.sep) || isDirectory(event)) {
        dropped++;
        continue;
      }

      const at = now();
      const key = `${context}\0${relativePath}`;
      const previous = lastForwarded.get(key);
      // A clock that stepped back opens the window again
      if (previous !== undefined && at >= previous && at - previous < debounceMs) {
        dropped++;
        continue;
      }

      lastForwarded.set(key, at);
      pruneDebounce(at);

      const normalized = relativePath.split(path.sep).join('/');
      if (options.tracker.record(context, normalized, KIND_BY_EVENT[event.type])) {
        forwarded++;
        logDebug('watcher', `${event.type} ${normalized}`, { context });
      } else {
        dropped++;
      }
    }
  }

  function status(): WatcherStatus {
    return {
      active,
      directories: subscriptions.map((s) => s.key),
      skipped: [...skipped],
      failed: [...failed],
      forwarded,
      dropped,
    };
  }

  return {
    handleEvents,
    status,

    async start(): Promise<WatcherStatus> {
      if (active) {
        log('[watch] Already running');
        return status();
      }
      active = true;
      skipped = [];
      failed = [];

      for (const [context, dirs] of options.directories) {
        for (const dir of dirs) {
          const key = `${context}:${path.relative(options.root, dir) || '.'}`;

          if (!fs.existsSync(dir)) {
            skipped.push(key);
            logDebug('watcher', `Skipping missing watch directory ${dir}`, { context });
            continue;
          }

          try {
            const subscription = await backend.subscribe(
              dir,
              (err, events) => {
                if (err) {
                  logWarn('watcher', `Watch error in ${dir}: ${err.message}`, { context });
                  return;
                }
                handleEvents(context, events);
              },
              { ignore: WATCHER_IGNORE_GLOBS }
            );
            subscriptions.push({ key, subscription });
          } catch (err) {
            failed.push(key);
            logError(
              'watcher',
              `Could not watch ${dir}`,
              new WatcherSetupError(errorMessage(err), { context, dir })
            );
            log(`[watch] Could not watch ${key}: ${errorMessage(err)}`);
          }
        }
      }

      log(`[watch] Watching ${subscriptions.length} directories (${skipped.length} missing, ${failed.length} failed)`);
      return status();
    },

    async stop(): Promise<void> {
      if (!active) return;
      active = false;

      const current = subscriptions.splice(0, subscriptions.length);
      const results = await Promise.allSettled(current.map((s) => s.subscription.unsubscribe()));
      results.forEach((result, i) => {
        if (result.status === 'rejected') {
          logWarn('watcher', `Unsubscribe failed for ${current[i].key}: ${errorMessage(result.reason)}`);
        }
      });
      lastForwarded.clear();
      log('[watch] Stopped');
    },
  };
}
