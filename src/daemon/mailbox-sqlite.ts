/**
 * SQLite mailbox backend (better-sqlite3).
 *
 * Same semantics as the file backend; SQLite transactions replace the
 * advisory lock file. Selected with `mailbox.backend = "sqlite"`.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { logError } from '../lib/fault-logger.js';
import { CorruptStateError } from '../lib/errors.js';
import type { ContextRegistry } from '../lib/registry.js';
import { BROADCAST } from '../lib/registry.js';
import {
  PRIORITIES,
  buildMessage,
  compareInbox,
  filterMessages,
  selectForRetention,
  validateSend,
  type InboxOptions,
  type ListOptions,
  type Mailbox,
  type Message,
  type RetentionOptions,
  type SendRequest,
  type SendResult,
} from './mailbox.js';

export interface SqliteMailboxOptions {
  registry: ContextRegistry;
  dbPath: string;
  now?: () => Date;
}

const MessageRowSchema = z.object({
  id: z.number().int().positive(),
  from_context: z.string(),
  to_context: z.string(),
  type: z.string(),
  subject: z.string(),
  content: z.string(),
  priority: z.enum(PRIORITIES),
  created_at: z.string(),
  read_at: z.string().nullable(),
});

const NextIdSchema = z.object({ next_id: z.number().int().positive() });

/**
 * Initialize the messages schema
 */
export function initMailboxDb(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY,
      from_context TEXT NOT NULL,
      to_context TEXT NOT NULL,
      type TEXT NOT NULL,
      subject TEXT NOT NULL,
      content TEXT NOT NULL,
      priority TEXT NOT NULL,
      created_at TEXT NOT NULL,
      read_at TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_messages_to ON messages(to_context, read_at);
  `);
}

export function createSqliteMailbox(options: SqliteMailboxOptions): Mailbox {
  const { registry, dbPath } = options;
  const now = options.now ?? (() => new Date());

  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  initMailboxDb(db);

  const insertStmt = db.prepare(`
    INSERT INTO messages (id, from_context, to_context, type, subject, content, priority, created_at, read_at)
    VALUES (@id, @from, @to, @type, @subject, @content, @priority, @created_at, @read_at)
  `);
  const nextIdStmt = db.prepare('SELECT COALESCE(MAX(id), 0) + 1 AS next_id FROM messages');
  const inboxStmt = db.prepare('SELECT * FROM messages WHERE to_context IN (?, ?)');
  const allStmt = db.prepare('SELECT * FROM messages ORDER BY id');
  const getStmt = db.prepare('SELECT * FROM messages WHERE id = ?');
  const markReadStmt = db.prepare('UPDATE messages SET read_at = ? WHERE id = ? AND read_at IS NULL');
  const deleteStmt = db.prepare('DELETE FROM messages WHERE id = ?');

  function toMessages(rows: unknown[]): Message[] {
    const messages: Message[] = [];
    for (const row of rows) {
      const parsed = MessageRowSchema.safeParse(row);
      if (!parsed.success) {
        logError(
          'mailbox',
          'Skipping malformed message row',
          new CorruptStateError(parsed.error.message, { path: dbPath })
        );
        continue;
      }
      const { from_context, to_context, ...rest } = parsed.data;
      messages.push({ ...rest, from: from_context, to: to_context });
    }
    return messages;
  }

  const insertMessage = db.transaction((request: SendRequest): Message => {
    const { next_id } = NextIdSchema.parse(nextIdStmt.get());
    const message = buildMessage(next_id, request, now());
    insertStmt.run(message);
    return message;
  });

  const deleteMessages = db.transaction((ids: number[]): void => {
    for (const id of ids) deleteStmt.run(id);
  });

  return {
    backend: 'sqlite',

    async send(request: SendRequest): Promise<SendResult> {
      const error = validateSend(registry, request);
      if (error) return { success: false, error };
      return { success: true, message: insertMessage(request) };
    },

    async inbox(context: string, opts: InboxOptions = {}): Promise<Message[]> {
      if (!registry.has(context)) return [];
      const unreadOnly = opts.unreadOnly ?? true;
      return toMessages(inboxStmt.all(context, BROADCAST))
        .filter((m) => (unreadOnly ? m.read_at === null : true))
        .sort(compareInbox);
    },

    async markRead(id: number): Promise<boolean> {
      return markReadStmt.run(now().toISOString(), id).changes > 0;
    },

    async get(id: number): Promise<Message | null> {
      const row = getStmt.get(id);
      if (row === undefined) return null;
      return toMessages([row])[0] ?? null;
    },

    async list(opts: ListOptions = {}): Promise<Message[]> {
      if (opts.context !== undefined && !registry.has(opts.context)) return [];
      return filterMessages(toMessages(allStmt.all()), opts);
    },

    async cleanup(retention: RetentionOptions): Promise<number> {
      const remove = selectForRetention(toMessages(allStmt.all()), retention, now());
      if (remove.size > 0) deleteMessages([...remove]);
      return remove.size;
    },

    close(): void {
      db.close();
    },
  };
}
