/**
 * Session log
 *
 * Editor sessions opened per context. Ids are `<prefix><N>`, N counting up
 * from 1 per prefix. Lives beside the mailbox and follows its backend:
 * - file: `sessions.json` rewritten under an advisory lock
 * - sqlite: a `sessions` table in the mailbox database
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { createJsonStore } from '../lib/status-store.js';
import { withLock } from '../lib/lock.js';
import { logError, logWarn } from '../lib/fault-logger.js';
import { CorruptStateError } from '../lib/errors.js';
import type { MailboxBackend, MailboxConfig, StatePaths } from '../lib/config.js';

// ============================================================================
// Types
// ============================================================================

export const SESSION_STATUSES = ['active', 'closed'] as const;
export type SessionStatus = (typeof SESSION_STATUSES)[number];

export const SessionSchema = z.object({
  session_id: z.string(),
  context: z.string(),
  task: z.string().nullable(),
  status: z.enum(SESSION_STATUSES),
  started_at: z.string(),
  last_activity: z.string(),
  closed_at: z.string().nullable(),
});

export type Session = z.infer<typeof SessionSchema>;

export interface RecordSessionRequest {
  context: string;
  prefix: string;
  task?: string | null;
}

export interface SessionListOptions {
  context?: string;
  status?: SessionStatus;
}

export interface SessionLog {
  readonly backend: MailboxBackend;
  /** Assign the next id for the prefix and store the session as active. */
  record(request: RecordSessionRequest): Promise<Session>;
  /** Most recent activity first. */
  list(options?: SessionListOptions): Promise<Session[]>;
  /** True when an active session was closed. */
  closeSession(sessionId: string): Promise<boolean>;
  close(): void;
}

// ============================================================================
// Shared logic
// ============================================================================

/** `<prefix><max N + 1>` over the ids already issued under `prefix`. */
export function nextSessionId(sessions: readonly Session[], prefix: string): string {
  let max = 0;
  for (const session of sessions) {
    if (!session.session_id.startsWith(prefix)) continue;
    const suffix = session.session_id.slice(prefix.length);
    if (!/^\d+$/.test(suffix)) continue;
    max = Math.max(max, Number(suffix));
  }
  return `${prefix}${max + 1}`;
}

export function buildSession(sessionId: string, request: RecordSessionRequest, startedAt: Date): Session {
  const at = startedAt.toISOString();
  return {
    session_id: sessionId,
    context: request.context,
    task: request.task ?? null,
    status: 'active',
    started_at: at,
    last_activity: at,
    closed_at: null,
  };
}

/**
 * Filter and order sessions given oldest first. Ties on activity go to the
 * later session.
 */
export function filterSessions(sessions: readonly Session[], options: SessionListOptions = {}): Session[] {
  return [...sessions]
    .reverse()
    .filter((s) => (options.context === undefined ? true : s.context === options.context))
    .filter((s) => (options.status === undefined ? true : s.status === options.status))
    .sort((a, b) => b.last_activity.localeCompare(a.last_activity));
}

// ============================================================================
// File backend
// ============================================================================

export interface FileSessionLogOptions {
  filePath: string;
  lockPath: string;
  now?: () => Date;
}

const SessionFileSchema = z.array(SessionSchema);

export function createFileSessionLog(options: FileSessionLogOptions): SessionLog {
  const { lockPath } = options;
  const now = options.now ?? (() => new Date());
  const store = createJsonStore(options.filePath, SessionFileSchema, 'sessions');

  function reportCorrupt(reason: string): void {
    logError(
      'sessions',
      `Session log ${store.path} is corrupt, treating as empty`,
      new CorruptStateError(reason, { path: store.path })
    );
  }

  function load(): Session[] {
    const result = store.inspect();
    if (result.status === 'ok') return result.value;
    if (result.status === 'corrupt') reportCorrupt(result.reason);
    return [];
  }

  function mutate<T>(operation: string, fn: (sessions: Session[]) => { next?: Session[]; result: T }): Promise<T> {
    return withLock(lockPath, operation, async () => {
      const current = store.inspect();
      let sessions: Session[] = [];
      if (current.status === 'ok') {
        sessions = current.value;
      } else if (current.status === 'corrupt') {
        reportCorrupt(current.reason);
        const moved = store.quarantine();
        if (moved) logWarn('sessions', `Corrupt session log preserved as ${moved}`);
      }

      const { next, result } = fn(sessions);
      if (next) store.write(next);
      return result;
    });
  }

  return {
    backend: 'file',

    record(request: RecordSessionRequest): Promise<Session> {
      return mutate('sessions-record', (sessions) => {
        const session = buildSession(nextSessionId(sessions, request.prefix), request, now());
        return { next: [...sessions, session], result: session };
      });
    },

    async list(opts: SessionListOptions = {}): Promise<Session[]> {
      return filterSessions(load(), opts);
    },

    closeSession(sessionId: string): Promise<boolean> {
      return mutate('sessions-close', (sessions) => {
        const index = sessions.findIndex((s) => s.session_id === sessionId);
        if (index === -1 || sessions[index].status === 'closed') {
          return { result: false };
        }
        const at = now().toISOString();
        const next = [...sessions];
        next[index] = { ...sessions[index], status: 'closed', closed_at: at, last_activity: at };
        return { next, result: true };
      });
    },

    close(): void {
      // Nothing held open between calls
    },
  };
}

// ============================================================================
// SQLite backend
// ============================================================================

export interface SqliteSessionLogOptions {
  dbPath: string;
  now?: () => Date;
}

/**
 * Initialize the sessions schema
 */
export function initSessionsDb(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      session_id TEXT PRIMARY KEY,
      context TEXT NOT NULL,
      task TEXT,
      status TEXT NOT NULL,
      started_at TEXT NOT NULL,
      last_activity TEXT NOT NULL,
      closed_at TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_sessions_context ON sessions(context, status);
  `);
}

export function createSqliteSessionLog(options: SqliteSessionLogOptions): SessionLog {
  const { dbPath } = options;
  const now = options.now ?? (() => new Date());

  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  initSessionsDb(db);

  const insertStmt = db.prepare(`
    INSERT INTO sessions (session_id, context, task, status, started_at, last_activity, closed_at)
    VALUES (@session_id, @context, @task, @status, @started_at, @last_activity, @closed_at)
  `);
  const allStmt = db.prepare('SELECT * FROM sessions ORDER BY rowid');
  const closeStmt = db.prepare(
    "UPDATE sessions SET status = 'closed', closed_at = @at, last_activity = @at WHERE session_id = @id AND status = 'active'"
  );

  function toSessions(rows: unknown[]): Session[] {
    const sessions: Session[] = [];
    for (const row of rows) {
      const parsed = SessionSchema.safeParse(row);
      if (!parsed.success) {
        logError(
          'sessions',
          'Skipping malformed session row',
          new CorruptStateError(parsed.error.message, { path: dbPath })
        );
        continue;
      }
      sessions.push(parsed.data);
    }
    return sessions;
  }

  const insertSession = db.transaction((request: RecordSessionRequest): Session => {
    const session = buildSession(nextSessionId(toSessions(allStmt.all()), request.prefix), request, now());
    insertStmt.run(session);
    return session;
  });

  return {
    backend: 'sqlite',

    async record(request: RecordSessionRequest): Promise<Session> {
      return insertSession(request);
    },

    async list(opts: SessionListOptions = {}): Promise<Session[]> {
      return filterSessions(toSessions(allStmt.all()), opts);
    },

    async closeSession(sessionId: string): Promise<boolean> {
      return closeStmt.run({ at: now().toISOString(), id: sessionId }).changes > 0;
    },

    close(): void {
      db.close();
    },
  };
}

/** Open the session log in the backend the mailbox uses. */
export function openSessionLog(paths: StatePaths, config: MailboxConfig, now?: () => Date): SessionLog {
  if (config.backend === 'sqlite') {
    return createSqliteSessionLog({ dbPath: paths.messagesDb, now });
  }
  return createFileSessionLog({ filePath: paths.sessionsFile, lockPath: paths.sessionsLock, now });
}
