/**
 * Inter-context mailbox
 *
 * Durable, priority-ordered messages between contexts, gated by the
 * handoff rules. Two backends share the logic in this module:
 * - file: a JSON array rewritten under an advisory lock (default)
 * - sqlite: better-sqlite3 table (mailbox-sqlite.ts)
 */

import { z } from 'zod';
import { createJsonStore } from '../lib/status-store.js';
import { withLock } from '../lib/lock.js';
import { logError, logWarn } from '../lib/fault-logger.js';
import {
  CorruptStateError,
  PolicyViolationError,
  UnknownContextError,
  ValidationError,
} from '../lib/errors.js';
import { BROADCAST, type ContextRegistry } from '../lib/registry.js';
import type { MailboxBackend } from '../lib/config.js';
import { checkHandoff } from './handoff.js';

// ============================================================================
// Types
// ============================================================================

export const PRIORITIES = ['low', 'normal', 'high', 'urgent'] as const;
export type MessagePriority = (typeof PRIORITIES)[number];

/** Lower rank sorts first. */
export const PRIORITY_RANK: Record<MessagePriority, number> = {
  urgent: 0,
  high: 1,
  normal: 2,
  low: 3,
};

export const MessageSchema = z.object({
  id: z.number().int().positive(),
  from: z.string(),
  to: z.string(),
  type: z.string(),
  subject: z.string(),
  content: z.string(),
  priority: z.enum(PRIORITIES),
  created_at: z.string(),
  read_at: z.string().nullable(),
});

export type Message = z.infer<typeof MessageSchema>;

export interface SendRequest {
  from: string;
  to: string;
  type: string;
  content: string;
  priority?: MessagePriority;
  subject?: string;
}

export type SendError = UnknownContextError | PolicyViolationError | ValidationError;

export type SendResult = { success: true; message: Message } | { success: false; error: SendError };

export interface InboxOptions {
  /** Default true */
  unreadOnly?: boolean;
}

export interface ListOptions {
  /** Messages addressed to this context (directly or via "all"). */
  context?: string;
  unreadOnly?: boolean;
  /** Keep only the newest N. */
  limit?: number;
}

export interface RetentionOptions {
  retentionDays: number;
  maxMessages: number;
}

export interface Mailbox {
  readonly backend: MailboxBackend;
  send(request: SendRequest): Promise<SendResult>;
  /** Messages for a context, most urgent first; empty for an unknown context. */
  inbox(context: string, options?: InboxOptions): Promise<Message[]>;
  /** True when the message changed from unread to read. */
  markRead(id: number): Promise<boolean>;
  get(id: number): Promise<Message | null>;
  /** Chronological (oldest first). */
  list(options?: ListOptions): Promise<Message[]>;
  /** Apply retention; returns the number of messages removed. */
  cleanup(options: RetentionOptions): Promise<number>;
  close(): void;
}

// ============================================================================
// Shared logic
// ============================================================================

export function isPriority(value: string): value is MessagePriority {
  return PRIORITIES.some((p) => p === value);
}

export function defaultSubject(type: string, from: string): string {
  return `[${type}] from ${from}`;
}

/**
 * Check a send request against the registry and handoff rules.
 */
export function validateSend(registry: ContextRegistry, request: SendRequest): SendError | null {
  if (!registry.has(request.from)) {
    return new UnknownContextError(request.from, registry.ids());
  }
  if (request.to !== BROADCAST && !registry.has(request.to)) {
    return new UnknownContextError(request.to, registry.ids());
  }
  if (request.to === request.from && !registry.isCoordinator(request.from)) {
    return new ValidationError(`A context cannot message itself (${request.from})`);
  }
  if (request.type.trim() === '') {
    return new ValidationError('Message type must not be empty');
  }
  if (request.content.trim() === '') {
    return new ValidationError('Message content must not be empty');
  }

  const decision = checkHandoff(registry, request.from, request.to, request.type);
  if (!decision.allowed) {
    return new PolicyViolationError(request.from, request.to, request.type, decision.allowedTypes);
  }
  return null;
}

export function buildMessage(id: number, request: SendRequest, createdAt: Date): Message {
  return {
    id,
    from: request.from,
    to: request.to,
    type: request.type,
    subject: request.subject ?? defaultSubject(request.type, request.from),
    content: request.content,
    priority: request.priority ?? 'normal',
    created_at: createdAt.toISOString(),
    read_at: null,
  };
}

/** Addressed to `context` directly, or to everyone. */
export function isAddressedTo(message: Message, context: string): boolean {
  return message.to === context || message.to === BROADCAST;
}

export function compareInbox(a: Message, b: Message): number {
  return (
    PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
    a.created_at.localeCompare(b.created_at) ||
    a.id - b.id
  );
}

export function filterMessages(messages: readonly Message[], options: ListOptions = {}): Message[] {
  const { context, unreadOnly = false, limit } = options;
  const matching = messages
    .filter((m) => (context === undefined ? true : isAddressedTo(m, context)))
    .filter((m) => (unreadOnly ? m.read_at === null : true))
    .sort((a, b) => a.id - b.id);
  return limit !== undefined && limit >= 0 ? matching.slice(Math.max(0, matching.length - limit)) : matching;
}

/**
 * Ids to delete under a retention policy. Read messages past the age limit
 * go first; if the log is still over the cap, the oldest read and then the
 * oldest unread messages follow. The newest message always stays, so ids
 * keep increasing.
 */
export function selectForRetention(
  messages: readonly Message[],
  options: RetentionOptions,
  now: Date
): Set<number> {
  const remove = new Set<number>();
  if (messages.length === 0) return remove;

  const newestId = Math.max(...messages.map((m) => m.id));
  const cutoff = now.getTime() - options.retentionDays * 24 * 60 * 60 * 1000;

  for (const message of messages) {
    if (message.id === newestId || message.read_at === null) continue;
    if (Date.parse(message.created_at) < cutoff) remove.add(message.id);
  }

  const remaining = messages.filter((m) => !remove.has(m.id)).sort((a, b) => a.id - b.id);
  let excess = remaining.length - options.maxMessages;
  if (excess <= 0) return remove;

  const candidates = [
    ...remaining.filter((m) => m.read_at !== null),
    ...remaining.filter((m) => m.read_at === null),
  ].filter((m) => m.id !== newestId);

  for (const message of candidates) {
    if (excess <= 0) break;
    remove.add(message.id);
    excess--;
  }

  return remove;
}

// ============================================================================
// File backend
// ============================================================================

export interface FileMailboxOptions {
  registry: ContextRegistry;
  filePath: string;
  lockPath: string;
  now?: () => Date;
}

const MessageLogSchema = z.array(MessageSchema);

export function createFileMailbox(options: FileMailboxOptions): Mailbox {
  const { registry, lockPath } = options;
  const now = options.now ?? (() => new Date());
  const store = createJsonStore(options.filePath, MessageLogSchema, 'mailbox');

  function reportCorrupt(reason: string): void {
    logError(
      'mailbox',
      `Message log ${store.path} is corrupt, treating as empty`,
      new CorruptStateError(reason, { path: store.path })
    );
  }

  function load(): Message[] {
    const result = store.inspect();
    if (result.status === 'ok') return result.value;
    if (result.status === 'corrupt') reportCorrupt(result.reason);
    return [];
  }

  /** Locked read-modify-write; `next` is written when returned. */
  function mutate<T>(
    operation: string,
    fn: (messages: Message[]) => { next?: Message[]; result: T }
  ): Promise<T> {
    return withLock(lockPath, operation, async () => {
      const current = store.inspect();
      let messages: Message[] = [];
      if (current.status === 'ok') {
        messages = current.value;
      } else if (current.status === 'corrupt') {
        reportCorrupt(current.reason);
        const moved = store.quarantine();
        if (moved) logWarn('mailbox', `Corrupt message log preserved as ${moved}`);
      }

      const { next, result } = fn(messages);
      if (next) store.write(next);
      return result;
    });
  }

  return {
    backend: 'file',

    async send(request: SendRequest): Promise<SendResult> {
      const error = validateSend(registry, request);
      if (error) return { success: false, error };

      const message = await mutate('mailbox-send', (messages) => {
        const id = messages.reduce((max, m) => Math.max(max, m.id), 0) + 1;
        const created = buildMessage(id, request, now());
        return { next: [...messages, created], result: created };
      });
      return { success: true, message };
    },

    async inbox(context: string, opts: InboxOptions = {}): Promise<Message[]> {
      if (!registry.has(context)) return [];
      const unreadOnly = opts.unreadOnly ?? true;
      return load()
        .filter((m) => isAddressedTo(m, context))
        .filter((m) => (unreadOnly ? m.read_at === null : true))
        .sort(compareInbox);
    },

    markRead(id: number): Promise<boolean> {
      return mutate('mailbox-mark-read', (messages) => {
        const index = messages.findIndex((m) => m.id === id);
        if (index === -1 || messages[index].read_at !== null) {
          return { result: false };
        }
        const next = [...messages];
        next[index] = { ...messages[index], read_at: now().toISOString() };
        return { next, result: true };
      });
    },

    async get(id: number): Promise<Message | null> {
      return load().find((m) => m.id === id) ?? null;
    },

    async list(opts: ListOptions = {}): Promise<Message[]> {
      if (opts.context !== undefined && !registry.has(opts.context)) return [];
      return filterMessages(load(), opts);
    },

    cleanup(retention: RetentionOptions): Promise<number> {
      return mutate('mailbox-cleanup', (messages) => {
        const remove = selectForRetention(messages, retention, now());
        if (remove.size === 0) return { result: 0 };
        return { next: messages.filter((m) => !remove.has(m.id)), result: remove.size };
      });
    },

    close(): void {
      // Nothing held open between calls
    },
  };
}
