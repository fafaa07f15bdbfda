import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { AsyncSubscription, Event } from '@parcel/watcher';
import { createFileActivityWatcher, type WatchBackend, type WatchCallback } from './watcher.js';
import { createActivityTracker, type ActivityTracker } from './activity.js';

vi.mock('../lib/fault-logger.js', () => ({
  logDebug: vi.fn(),
  logError: vi.fn(),
  logWarn: vi.fn(),
}));

import { logError } from '../lib/fault-logger.js';

interface FakeBackend extends WatchBackend {
  callbacks: Map<string, WatchCallback>;
  unsubscribed: string[];
  failFor: Set<string>;
}

function createFakeBackend(): FakeBackend {
  const callbacks = new Map<string, WatchCallback>();
  const unsubscribed: string[] = [];
  const failFor = new Set<string>();

  return {
    callbacks,
    unsubscribed,
    failFor,
    async subscribe(dir: string, fn: WatchCallback): Promise<AsyncSubscription> {
      if (failFor.has(dir)) {
        throw new Error('inotify limit reached');
      }
      callbacks.set(dir, fn);
      return {
        unsubscribe: async () => {
          unsubscribed.push(dir);
        },
      };
    },
  };
}

describe('FileActivityWatcher', () => {
  let root: string;
  let clock: number;
  let tracker: ActivityTracker;
  let backend: FakeBackend;

  const emit = (dir: string, events: Event[]) => {
    const callback = backend.callbacks.get(dir);
    if (!callback) throw new Error(`no subscription for ${dir}`);
    callback(null, events);
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'switchyard-watch-'));
    fs.mkdirSync(path.join(root, 'app'), { recursive: true });
    fs.mkdirSync(path.join(root, 'web'), { recursive: true });
    clock = 1_000_000;
    tracker = createActivityTracker({ contexts: ['dev', 'dash'], now: () => clock });
    backend = createFakeBackend();
    vi.mocked(logError).mockClear();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function build(directories: Record<string, string[]>) {
    return createFileActivityWatcher({
      root,
      directories: new Map(Object.entries(directories).map(([ctx, dirs]) => [ctx, dirs.map((d) => path.join(root, d))])),
      tracker,
      backend,
      now: () => clock,
    });
  }

  it('should subscribe existing directories and skip missing ones', async () => {
    const watcher = build({ dev: ['app', 'scripts'], dash: ['web'] });

    const status = await watcher.start();

    expect(status.active).toBe(true);
    expect(status.directories).toEqual(['dev:app', 'dash:web']);
    expect(status.skipped).toEqual(['dev:scripts']);
    expect(status.failed).toEqual([]);
  });

  it('should keep going when one subscription fails', async () => {
    backend.failFor.add(path.join(root, 'app'));
    const watcher = build({ dev: ['app'], dash: ['web'] });

    const status = await watcher.start();

    expect(status.failed).toEqual(['dev:app']);
    expect(status.directories).toEqual(['dash:web']);
    expect(logError).toHaveBeenCalledTimes(1);
    const error = vi.mocked(logError).mock.calls[0][2];
    expect(error?.name).toBe('WatcherSetupError');
  });

  it('should forward events to the tracker with mapped kinds', async () => {
    const watcher = build({ dev: ['app'], dash: ['web'] });
    await watcher.start();

    emit(path.join(root, 'app'), [{ type: 'create', path: path.join(root, 'app', 'core', 'engine.py') }]);
    clock += 5000;
    emit(path.join(root, 'web'), [{ type: 'delete', path: path.join(root, 'web', 'old.tsx') }]);

    expect(tracker.recentEvents('dev')).toEqual([
      { context: 'dev', path: 'app/core/engine.py', kind: 'created', timestamp: 1_000_000 },
    ]);
    expect(tracker.recentEvents('dash')[0].kind).toBe('deleted');
    expect(tracker.activeContext()).toBe('dash');
    expect(watcher.status().forwarded).toBe(2);
  });

  it('should drop ignored paths', async () => {
    const watcher = build({ dev: ['app'] });
    await watcher.start();

    emit(path.join(root, 'app'), [
      { type: 'update', path: path.join(root, 'app', '__pycache__', 'engine.pyc') },
      { type: 'update', path: path.join(root, 'app', 'debug.log') },
    ]);

    expect(tracker.recentEvents('dev')).toEqual([]);
    expect(watcher.status().dropped).toBe(2);
  });

  it('should collapse repeated events on the same path within the debounce window', async () => {
    const watcher = build({ dev: ['app'] });
    await watcher.start();
    const file = path.join(root, 'app', 'engine.py');

    emit(path.join(root, 'app'), [{ type: 'update', path: file }]);
    clock += 400;
    emit(path.join(root, 'app'), [{ type: 'update', path: file }]);

    expect(tracker.recentEvents('dev')).toHaveLength(1);

    clock += 2000;
    emit(path.join(root, 'app'), [{ type: 'update', path: file }]);

    expect(tracker.recentEvents('dev')).toHaveLength(2);
  });

  it('should start a new window when the clock steps back', async () => {
    const watcher = build({ dev: ['app'] });
    await watcher.start();
    const file = path.join(root, 'app', 'engine.py');

    emit(path.join(root, 'app'), [{ type: 'update', path: file }]);
    clock -= 60_000;
    emit(path.join(root, 'app'), [{ type: 'update', path: file }]);
    clock += 400;
    emit(path.join(root, 'app'), [{ type: 'update', path: file }]);

    expect(tracker.recentEvents('dev').map((e) => e.timestamp)).toEqual([1_000_000, 940_000]);
    expect(watcher.status()).toMatchObject({ forwarded: 2, dropped: 1 });
  });

  it('should drop events on directories', async () => {
    const watcher = build({ dev: ['app'] });
    await watcher.start();
    fs.mkdirSync(path.join(root, 'app', 'models'));

    emit(path.join(root, 'app'), [
      { type: 'create', path: path.join(root, 'app', 'models') },
      { type: 'create', path: path.join(root, 'app', 'models', 'user.py') },
      { type: 'delete', path: path.join(root, 'app', 'legacy') },
    ]);

    expect(tracker.recentEvents('dev').map((e) => e.path)).toEqual(['app/models/user.py', 'app/legacy']);
    expect(watcher.status().dropped).toBe(1);
  });

  it('should not debounce different paths', async () => {
    const watcher = build({ dev: ['app'] });
    await watcher.start();

    emit(path.join(root, 'app'), [
      { type: 'update', path: path.join(root, 'app', 'a.py') },
      { type: 'update', path: path.join(root, 'app', 'b.py') },
    ]);

    expect(tracker.recentEvents('dev').map((e) => e.path)).toEqual(['app/a.py', 'app/b.py']);
  });

  it('should unsubscribe everything on stop', async () => {
    const watcher = build({ dev: ['app'], dash: ['web'] });
    await watcher.start();

    await watcher.stop();

    expect(backend.unsubscribed).toEqual([path.join(root, 'app'), path.join(root, 'web')]);
    expect(watcher.status()).toMatchObject({ active: false, directories: [] });
  });

  it('should not subscribe twice', async () => {
    const watcher = build({ dev: ['app'] });
    await watcher.start();
    const again = await watcher.start();

    expect(again.directories).toEqual(['dev:app']);
    expect(backend.callbacks.size).toBe(1);
  });
});
