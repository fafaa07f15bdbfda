/**
 * Activity tracking for active-context detection
 *
 * Keeps a bounded buffer of recent file events per context plus a
 * last-seen timestamp. The active context is the one seen most recently
 * inside the activity window; equal timestamps go to the lexically
 * smallest context id.
 */

import { performance } from 'perf_hooks';

// ============================================================================
// Types
// ============================================================================

export type ActivityKind = 'created' | 'modified' | 'deleted';

export interface ActivityEvent {
  context: string;
  path: string;
  kind: ActivityKind;
  timestamp: number;
}

export interface ContextActivity {
  lastActivity: string | null;
  secondsAgo: number | null;
  /** Buffered events inside the window. */
  recentEvents: number;
}

export interface ActivityTracker {
  /** Returns false (and records nothing) for an unknown context. */
  record(context: string, path: string, kind: ActivityKind): boolean;
  activeContext(): string | null;
  activitySummary(): Record<string, ContextActivity>;
  recentEvents(context: string): readonly ActivityEvent[];
  lastSeen(context: string): number | null;
}

export interface ActivityTrackerOptions {
  contexts: readonly string[];
  windowSeconds?: number;
  bufferSize?: number;
  now?: () => number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_WINDOW_SECONDS = 300;
export const DEFAULT_BUFFER_SIZE = 100;

/**
 * Epoch milliseconds that never run backwards: read from the wall clock
 * once, then advanced by the monotonic clock.
 */
export function monotonicClock(): () => number {
  const origin = Date.now() - performance.now();
  return () => Math.floor(origin + performance.now());
}

// ============================================================================
// Tracker Implementation
// ============================================================================

export function createActivityTracker(options: ActivityTrackerOptions): ActivityTracker {
  const windowMs = (options.windowSeconds ?? DEFAULT_WINDOW_SECONDS) * 1000;
  const bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
  const now = options.now ?? monotonicClock();

  const contexts = [...options.contexts].sort();
  const known = new Set(contexts);
  const buffers = new Map<string, ActivityEvent[]>();
  const lastSeenAt = new Map<string, number>();

  function inWindow(timestamp: number, at: number): boolean {
    return at - timestamp < windowMs;
  }

  return {
    record(context: string, path: string, kind: ActivityKind): boolean {
      if (!known.has(context)) return false;

      const timestamp = now();
      const buffer = buffers.get(context) ?? [];
      buffer.push({ context, path, kind, timestamp });
      if (buffer.length > bufferSize) {
        buffer.splice(0, buffer.length - bufferSize);
      }
      buffers.set(context, buffer);
      lastSeenAt.set(context, timestamp);
      return true;
    },

    activeContext(): string | null {
      const at = now();
      let best: string | null = null;
      let bestSeen = -Infinity;

      // contexts is sorted, so a strict comparison keeps the smallest id on ties
      for (const context of contexts) {
        const seen = lastSeenAt.get(context);
        if (seen === undefined || !inWindow(seen, at)) continue;
        if (seen > bestSeen) {
          best = context;
          bestSeen = seen;
        }
      }

      return best;
    },

    activitySummary(): Record<string, ContextActivity> {
      const at = now();
      const summary: Record<string, ContextActivity> = {};

      for (const context of contexts) {
        const seen = lastSeenAt.get(context);
        if (seen === undefined) {
          summary[context] = { lastActivity: null, secondsAgo: null, recentEvents: 0 };
          continue;
        }
        const buffer = buffers.get(context) ?? [];
        summary[context] = {
          lastActivity: new Date(seen).toISOString(),
          secondsAgo: Math.max(0, Math.floor((at - seen) / 1000)),
          recentEvents: buffer.filter((event) => inWindow(event.timestamp, at)).length,
        };
      }

      return summary;
    },

    recentEvents(context: string): readonly ActivityEvent[] {
      return [...(buffers.get(context) ?? [])];
    },

    lastSeen(context: string): number | null {
      return lastSeenAt.get(context) ?? null;
    },
  };
}
