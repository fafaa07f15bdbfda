import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  createFileMailbox,
  selectForRetention,
  type Mailbox,
  type Message,
  type SendRequest,
} from './mailbox.js';
import { createSqliteMailbox } from './mailbox-sqlite.js';
import { createRegistry } from '../lib/registry.js';
import { PolicyViolationError, UnknownContextError, ValidationError } from '../lib/errors.js';

vi.mock('../lib/fault-logger.js', () => ({
  logError: vi.fn(),
  logWarn: vi.fn(),
}));

import { logError } from '../lib/fault-logger.js';

const registry = createRegistry(
  {
    contexts: [
      { id: 'oracle', file: 'ORACLE.md', prefix: 'O', is_coordinator: true },
      { id: 'dev', file: 'DEV.md', prefix: 'D' },
      { id: 'dash', file: 'DASH.md', prefix: 'B' },
    ],
    handoff_rules: {
      dev: { to: ['dash'], types: ['new_feature_available'] },
      dash: { to: ['dev'], types: ['backend_bug'] },
    },
  },
  os.tmpdir()
);

const T0 = Date.parse('2026-03-01T09:00:00.000Z');
const DAY_MS = 24 * 60 * 60 * 1000;

type Factory = (dir: string, now: () => Date) => Mailbox;

const backends: Array<[string, Factory]> = [
  [
    'file',
    (dir, now) =>
      createFileMailbox({
        registry,
        filePath: path.join(dir, 'messages.json'),
        lockPath: path.join(dir, '.tmp', 'mailbox.lock'),
        now,
      }),
  ],
  ['sqlite', (dir, now) => createSqliteMailbox({ registry, dbPath: path.join(dir, 'messages.db'), now })],
];

describe.each(backends)('%s mailbox', (_name, factory) => {
  let dir: string;
  let clock: number;
  let mailbox: Mailbox;

  const send = async (request: SendRequest): Promise<Message> => {
    const result = await mailbox.send(request);
    if (!result.success) throw result.error;
    return result.message;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'switchyard-mailbox-'));
    clock = T0;
    mailbox = factory(dir, () => new Date(clock));
  });

  afterEach(() => {
    mailbox.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('send', () => {
    it('should store an allowed handoff with defaults filled in', async () => {
      const result = await mailbox.send({
        from: 'dev',
        to: 'dash',
        type: 'new_feature_available',
        content: 'Preset endpoint is live',
      });

      expect(result).toEqual({
        success: true,
        message: {
          id: 1,
          from: 'dev',
          to: 'dash',
          type: 'new_feature_available',
          subject: '[new_feature_available] from dev',
          content: 'Preset endpoint is live',
          priority: 'normal',
          created_at: '2026-03-01T09:00:00.000Z',
          read_at: null,
        },
      });
    });

    it('should reject a type the rules do not allow and store nothing', async () => {
      const result = await mailbox.send({ from: 'dev', to: 'dash', type: 'bug_report', content: 'Broken' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(PolicyViolationError);
        expect(result.error.message).toBe('Handoff not allowed: dev -> dash (bug_report)');
      }
      expect(await mailbox.list()).toEqual([]);
    });

    it('should let the coordinator send any type', async () => {
      const message = await send({ from: 'oracle', to: 'dash', type: 'whatever', content: 'Check the build' });
      expect(message.id).toBe(1);
    });

    it('should let a context report to the coordinator without a rule', async () => {
      const message = await send({ from: 'dash', to: 'oracle', type: 'status', content: 'Done' });
      expect(message.to).toBe('oracle');
    });

    it('should reject unknown contexts', async () => {
      const badTarget = await mailbox.send({ from: 'dev', to: 'qa', type: 'x', content: 'y' });
      const badSender = await mailbox.send({ from: 'qa', to: 'dev', type: 'x', content: 'y' });

      expect(badTarget.success).toBe(false);
      expect(badSender.success).toBe(false);
      if (!badTarget.success) expect(badTarget.error).toBeInstanceOf(UnknownContextError);
      if (!badSender.success) expect(badSender.error).toBeInstanceOf(UnknownContextError);
      expect(await mailbox.list()).toEqual([]);
    });

    it('should let the coordinator message itself', async () => {
      const message = await send({ from: 'oracle', to: 'oracle', type: 'note', content: 'Review backlog' });

      expect(message.to).toBe('oracle');
      expect((await mailbox.inbox('oracle')).map((m) => m.id)).toEqual([message.id]);
    });

    it('should reject a self-message from any other context', async () => {
      const result = await mailbox.send({ from: 'dev', to: 'dev', type: 'note', content: 'Reminder' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ValidationError);
        expect(result.error.message).toBe('A context cannot message itself (dev)');
      }
    });

    it('should reject empty content', async () => {
      const result = await mailbox.send({ from: 'oracle', to: 'dev', type: 'note', content: '   ' });

      expect(result.success).toBe(false);
      if (!result.success) expect(result.error).toBeInstanceOf(ValidationError);
    });

    it('should keep a custom subject and priority', async () => {
      const message = await send({
        from: 'dash',
        to: 'dev',
        type: 'backend_bug',
        content: 'Timeout on /api/presets',
        subject: 'Preset API timeout',
        priority: 'urgent',
      });

      expect(message.subject).toBe('Preset API timeout');
      expect(message.priority).toBe('urgent');
    });
  });

  describe('inbox', () => {
    beforeEach(async () => {
      await send({ from: 'oracle', to: 'dash', type: 'note', content: 'one', priority: 'low' });
      clock = T0 + 1000;
      await send({ from: 'dev', to: 'dash', type: 'new_feature_available', content: 'two', priority: 'urgent' });
      clock = T0 + 2000;
      await send({ from: 'oracle', to: 'all', type: 'health_alert', content: 'three', priority: 'high' });
      clock = T0 + 3000;
      await send({ from: 'oracle', to: 'dash', type: 'note', content: 'four', priority: 'urgent' });
    });

    it('should order by priority, then age', async () => {
      const inbox = await mailbox.inbox('dash');
      expect(inbox.map((m) => m.id)).toEqual([2, 4, 3, 1]);
    });

    it('should include broadcasts in every inbox, the sender\'s too', async () => {
      expect((await mailbox.inbox('dev')).map((m) => m.id)).toEqual([3]);
      expect((await mailbox.inbox('oracle')).map((m) => m.id)).toEqual([3]);
    });

    it('should deliver a broadcast from a regular context to itself', async () => {
      clock = T0 + 4000;
      const message = await send({ from: 'dev', to: 'all', type: 'new_feature_available', content: 'five' });

      expect(message.id).toBe(5);
      expect((await mailbox.inbox('dev')).map((m) => m.id)).toEqual([3, 5]);
      expect((await mailbox.inbox('dash')).map((m) => m.id)).toEqual([2, 4, 3, 5, 1]);
    });

    it('should return nothing for an unknown context', async () => {
      expect(await mailbox.inbox('qa')).toEqual([]);
      expect(await mailbox.list({ context: 'qa' })).toEqual([]);
    });

    it('should mark messages read exactly once', async () => {
      clock = T0 + 60_000;

      expect(await mailbox.markRead(2)).toBe(true);
      expect(await mailbox.markRead(2)).toBe(false);
      expect(await mailbox.markRead(99)).toBe(false);

      expect((await mailbox.inbox('dash')).map((m) => m.id)).toEqual([4, 3, 1]);
      const all = await mailbox.inbox('dash', { unreadOnly: false });
      expect(all.map((m) => m.id)).toEqual([2, 4, 3, 1]);
      expect((await mailbox.get(2))?.read_at).toBe('2026-03-01T09:01:00.000Z');
    });

    it('should list chronologically with filters', async () => {
      await mailbox.markRead(1);

      expect((await mailbox.list()).map((m) => m.id)).toEqual([1, 2, 3, 4]);
      expect((await mailbox.list({ context: 'dev' })).map((m) => m.id)).toEqual([3]);
      expect((await mailbox.list({ context: 'dash', unreadOnly: true })).map((m) => m.id)).toEqual([2, 3, 4]);
      expect((await mailbox.list({ limit: 2 })).map((m) => m.id)).toEqual([3, 4]);
    });

    it('should return null for a missing message', async () => {
      expect(await mailbox.get(42)).toBeNull();
    });
  });

  describe('cleanup', () => {
    it('should drop old read messages and keep ids increasing', async () => {
      await send({ from: 'oracle', to: 'dev', type: 'note', content: 'a' });
      await send({ from: 'oracle', to: 'dev', type: 'note', content: 'b' });
      await send({ from: 'oracle', to: 'dev', type: 'note', content: 'c' });
      await mailbox.markRead(1);
      await mailbox.markRead(3);

      clock = T0 + 40 * DAY_MS;
      expect(await mailbox.cleanup({ retentionDays: 30, maxMessages: 500 })).toBe(1);
      expect((await mailbox.list()).map((m) => m.id)).toEqual([2, 3]);

      const next = await send({ from: 'oracle', to: 'dev', type: 'note', content: 'd' });
      expect(next.id).toBe(4);
    });

    it('should cap the log, oldest first', async () => {
      for (const content of ['a', 'b', 'c', 'd']) {
        await send({ from: 'oracle', to: 'dev', type: 'note', content });
      }

      expect(await mailbox.cleanup({ retentionDays: 30, maxMessages: 2 })).toBe(2);
      expect((await mailbox.list()).map((m) => m.id)).toEqual([3, 4]);
    });
  });

  it('should persist across instances', async () => {
    await send({ from: 'dev', to: 'dash', type: 'new_feature_available', content: 'Saved' });
    mailbox.close();

    mailbox = factory(dir, () => new Date(clock));
    const inbox = await mailbox.inbox('dash');
    expect(inbox.map((m) => m.content)).toEqual(['Saved']);
  });
});

describe('file mailbox log', () => {
  let dir: string;
  let filePath: string;
  let mailbox: Mailbox;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'switchyard-mailbox-file-'));
    filePath = path.join(dir, 'messages.json');
    mailbox = createFileMailbox({
      registry,
      filePath,
      lockPath: path.join(dir, '.tmp', 'mailbox.lock'),
      now: () => new Date(T0),
    });
    vi.mocked(logError).mockClear();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should write the log as a JSON array', async () => {
    await mailbox.send({ from: 'oracle', to: 'dev', type: 'note', content: 'hello' });

    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    expect(Array.isArray(raw)).toBe(true);
    expect(raw).toHaveLength(1);
  });

  it('should release the lock after writing', async () => {
    await mailbox.send({ from: 'oracle', to: 'dev', type: 'note', content: 'hello' });
    expect(fs.existsSync(path.join(dir, '.tmp', 'mailbox.lock'))).toBe(false);
  });

  it('should leave the log bytes alone on a mutation that changes nothing', async () => {
    await mailbox.send({ from: 'oracle', to: 'dev', type: 'note', content: 'first' });
    await mailbox.send({ from: 'dev', to: 'dash', type: 'new_feature_available', content: 'second' });
    const before = fs.readFileSync(filePath, 'utf-8');

    expect(await mailbox.markRead(99)).toBe(false);
    expect(await mailbox.cleanup({ retentionDays: 30, maxMessages: 500 })).toBe(0);

    expect(fs.readFileSync(filePath, 'utf-8')).toBe(before);
    const parsed: unknown = JSON.parse(before);
    expect(parsed).toEqual(await mailbox.list());
  });

  it('should rewrite the log exactly as it reads back', async () => {
    await mailbox.send({ from: 'oracle', to: 'dev', type: 'note', content: 'first' });
    await mailbox.send({ from: 'oracle', to: 'all', type: 'note', content: 'second', priority: 'high' });
    expect(await mailbox.markRead(1)).toBe(true);

    expect(fs.readFileSync(filePath, 'utf-8')).toBe(JSON.stringify(await mailbox.list(), null, 2) + '\n');
  });

  it('should treat a corrupt log as empty and preserve it', async () => {
    fs.writeFileSync(filePath, '{ not json');

    expect(await mailbox.inbox('dev')).toEqual([]);
    expect(logError).toHaveBeenCalled();

    const result = await mailbox.send({ from: 'oracle', to: 'dev', type: 'note', content: 'fresh' });
    expect(result.success && result.message.id).toBe(1);
    expect(fs.readFileSync(`${filePath}.corrupt`, 'utf-8')).toBe('{ not json');
  });
});

describe('selectForRetention', () => {
  const message = (id: number, createdAt: number, read: boolean): Message => ({
    id,
    from: 'oracle',
    to: 'dev',
    type: 'note',
    subject: `[note] from oracle`,
    content: `message ${id}`,
    priority: 'normal',
    created_at: new Date(createdAt).toISOString(),
    read_at: read ? new Date(createdAt).toISOString() : null,
  });

  const now = new Date(T0 + 100 * DAY_MS);

  it('should return nothing for an empty log', () => {
    expect(selectForRetention([], { retentionDays: 30, maxMessages: 10 }, now).size).toBe(0);
  });

  it('should keep old unread messages under the cap', () => {
    const messages = [message(1, T0, false), message(2, T0, false)];
    expect([...selectForRetention(messages, { retentionDays: 30, maxMessages: 10 }, now)]).toEqual([]);
  });

  it('should never select the newest message', () => {
    const messages = [message(1, T0, true), message(2, T0, true)];
    expect([...selectForRetention(messages, { retentionDays: 30, maxMessages: 10 }, now)]).toEqual([1]);
  });

  it('should trim read messages before unread ones when over the cap', () => {
    const recent = T0 + 90 * DAY_MS;
    const messages = [
      message(1, recent, false),
      message(2, recent, true),
      message(3, recent, false),
      message(4, recent, true),
      message(5, recent, false),
    ];
    const removed = selectForRetention(messages, { retentionDays: 30, maxMessages: 2 }, now);
    expect([...removed].sort((a, b) => a - b)).toEqual([1, 2, 4]);
  });
});
