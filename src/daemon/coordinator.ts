/**
 * Session coordinator
 *
 * Stateless orchestration over the registry, the mailbox, the session log
 * and an activity source. Inside the daemon the source is the live tracker;
 * CLI invocations read the daemon's status file instead.
 */

import fs from 'fs';
import path from 'path';
import type { ContextRegistry } from '../lib/registry.js';
import { BROADCAST } from '../lib/registry.js';
import type { PortMode, SpawnConfig, StatePaths } from '../lib/config.js';
import { NotFoundError, StorageError, SwitchyardError, UnknownContextError, errorMessage } from '../lib/errors.js';
import { logError } from '../lib/fault-logger.js';
import { updateContextFile, type ContextFileUpdate } from '../lib/context-file.js';
import type { ProcessProbe } from '../lib/lock.js';
import type { ActivityTracker, ContextActivity } from './activity.js';
import type { InboxOptions, Mailbox, Message, MessagePriority, SendResult } from './mailbox.js';
import type { Detacher } from './detach.js';
import type { Session, SessionListOptions, SessionLog } from './session-log.js';
import { getDaemonStatus } from './control.js';

// ============================================================================
// Types
// ============================================================================

export type ActivitySource = Pick<ActivityTracker, 'activeContext' | 'activitySummary'>;

export interface HandoffOptions {
  priority?: MessagePriority;
  subject?: string;
}

export interface PromptOptions {
  task?: string;
}

export interface SpawnOptions extends PromptOptions {
  /** Launch the editor (default true). */
  open?: boolean;
}

export interface SpawnRecord {
  success: true;
  sessionId: string;
  context: string;
  task: string | null;
  contextFile: string;
  promptFile: string;
  /** Editor command line, or null when not opened. */
  command: string | null;
  pid: number | null;
  spawnedAt: string;
}

export type SpawnResult = SpawnRecord | { success: false; error: SwitchyardError };

export type InboxResult = { success: true; messages: Message[] } | { success: false; error: UnknownContextError };

export type ContextUpdateResult = ContextFileUpdate | { success: false; error: UnknownContextError };

export interface SessionCoordinator {
  handoff(from: string, to: string, type: string, content: string, options?: HandoffOptions): Promise<SendResult>;
  activeContext(): string | null;
  activitySummary(): Record<string, ContextActivity>;
  pendingCount(context: string): Promise<number>;
  inbox(context: string, options?: InboxOptions): Promise<InboxResult>;
  markRead(id: number): Promise<boolean>;
  listSessions(options?: SessionListOptions): Promise<Session[]>;
  closeSession(sessionId: string): Promise<boolean>;
  /** Rewrite one `## ` section of a context's file. */
  updateContext(context: string, section: string, content: string): ContextUpdateResult;
  resumePrompt(context: string, options?: PromptOptions): Promise<string>;
  /** Write the resume prompt to `prompts/<context>.md`; returns the path. */
  writePromptFile(context: string, options?: PromptOptions): Promise<string>;
  spawn(context: string, options?: SpawnOptions): Promise<SpawnResult>;
}

export interface SessionCoordinatorOptions {
  registry: ContextRegistry;
  mailbox: Mailbox;
  sessions: SessionLog;
  activity: ActivitySource;
  portMode: PortMode;
  promptsDir: string;
  spawnConfig: SpawnConfig;
  detacher: Detacher;
  /** Context file line limit (default 500). */
  maxContextLines?: number;
  now?: () => Date;
}

// ============================================================================
// Activity from the status file
// ============================================================================

/**
 * Activity as last recorded by a running daemon. Nothing is active when no
 * daemon is running.
 */
export function statusActivitySource(
  registry: ContextRegistry,
  paths: StatePaths,
  probe?: ProcessProbe
): ActivitySource {
  const read = () => {
    const status = getDaemonStatus(paths, { probe });
    return status.running ? status.data : {};
  };

  return {
    activeContext(): string | null {
      const active = read().active_context;
      return active && registry.has(active) ? active : null;
    },

    activitySummary(): Record<string, ContextActivity> {
      const recorded = read().activity ?? {};
      const summary: Record<string, ContextActivity> = {};
      for (const id of registry.ids()) {
        const entry = recorded[id];
        summary[id] = entry
          ? { lastActivity: entry.last_activity, secondsAgo: entry.seconds_ago, recentEvents: entry.recent_events }
          : { lastActivity: null, secondsAgo: null, recentEvents: 0 };
      }
      return summary;
    },
  };
}

// ============================================================================
// Coordinator
// ============================================================================

function formatPorts(ports: Readonly<Record<string, number>>): string | null {
  const entries = Object.entries(ports);
  if (entries.length === 0) return null;
  return entries.map(([name, port]) => `${name} ${port}`).join(', ');
}

export function createSessionCoordinator(options: SessionCoordinatorOptions): SessionCoordinator {
  const { registry, mailbox, sessions, activity, portMode, promptsDir, spawnConfig, detacher } = options;
  const { maxContextLines = 500 } = options;
  const now = options.now ?? (() => new Date());

  async function resumePrompt(context: string, opts: PromptOptions = {}): Promise<string> {
    const def = registry.assertKnown(context);

    let prompt = def.resumePrompt ?? `Read @${registry.contextPath}${def.file} first.`;
    if (!def.resumePrompt && def.description) {
      prompt += `\n\nRole: ${def.description}`;
    }
    if (opts.task) {
      prompt += `\n\nCurrent task: ${opts.task}`;
    }

    const pending = (await mailbox.inbox(context)).length;
    const active = activity.activeContext();
    const activeLine = active === null ? 'none' : active === context ? `${active} (this context)` : active;

    const live = ['---', 'Live status:', `- Pending messages: ${pending}`, `- Active context: ${activeLine}`];
    const ports = formatPorts(registry.ports(portMode));
    if (ports) live.push(`- Ports (${portMode}): ${ports}`);

    return `${prompt}\n\n${live.join('\n')}\n`;
  }

  async function writePromptFile(context: string, opts: PromptOptions = {}): Promise<string> {
    const prompt = await resumePrompt(context, opts);
    const file = path.join(promptsDir, `${context}.md`);
    fs.mkdirSync(promptsDir, { recursive: true });
    fs.writeFileSync(file, prompt);
    return file;
  }

  return {
    async handoff(from, to, type, content, opts = {}): Promise<SendResult> {
      if (!registry.has(from)) {
        return { success: false, error: new UnknownContextError(from, registry.ids()) };
      }
      if (to !== BROADCAST && !registry.has(to)) {
        return { success: false, error: new UnknownContextError(to, registry.ids()) };
      }
      return mailbox.send({ from, to, type, content, priority: opts.priority, subject: opts.subject });
    },

    activeContext() {
      return activity.activeContext();
    },

    activitySummary() {
      return activity.activitySummary();
    },

    async pendingCount(context: string): Promise<number> {
      return (await mailbox.inbox(context)).length;
    },

    async inbox(context: string, opts?: InboxOptions): Promise<InboxResult> {
      if (!registry.has(context)) {
        return { success: false, error: new UnknownContextError(context, registry.ids()) };
      }
      return { success: true, messages: await mailbox.inbox(context, opts) };
    },

    markRead(id: number) {
      return mailbox.markRead(id);
    },

    listSessions(opts?: SessionListOptions) {
      return sessions.list(opts);
    },

    closeSession(id: string) {
      return sessions.closeSession(id);
    },

    updateContext(context: string, section: string, content: string): ContextUpdateResult {
      if (!registry.has(context)) {
        return { success: false, error: new UnknownContextError(context, registry.ids()) };
      }
      return updateContextFile(registry.contextFilePath(context), section, content, {
        maxLines: maxContextLines,
        now: now(),
      });
    },

    resumePrompt,

    writePromptFile,

    async spawn(context: string, opts: SpawnOptions = {}): Promise<SpawnResult> {
      const def = registry.get(context);
      if (!def) {
        return { success: false, error: new UnknownContextError(context, registry.ids()) };
      }

      const contextFile = registry.contextFilePath(context);
      if (!fs.existsSync(contextFile)) {
        return { success: false, error: new NotFoundError(`Context file not found: ${contextFile}`, { contextFile }) };
      }

      const promptFile = await writePromptFile(context, opts);
      const task = opts.task ?? null;

      let command: string | null = null;
      let pid: number | null = null;
      if (opts.open !== false) {
        const args = [...spawnConfig.args, registry.root, contextFile];
        command = [spawnConfig.command, ...args].join(' ');
        try {
          pid = detacher.detach({ command: spawnConfig.command, args, cwd: registry.root }).pid;
        } catch (err) {
          logError('coordinator', `Failed to spawn ${context} session`, err instanceof Error ? err : undefined, { command });
          return { success: false, error: new StorageError(`Could not launch ${spawnConfig.command}: ${errorMessage(err)}`) };
        }
        if (pid === null) {
          return { success: false, error: new StorageError(`Could not launch ${spawnConfig.command}`, { command }) };
        }
      }

      // Failed launches are not recorded
      const session = await sessions.record({ context, prefix: def.prefix, task });
      return {
        success: true,
        sessionId: session.session_id,
        context,
        task,
        contextFile,
        promptFile,
        command,
        pid,
        spawnedAt: session.started_at,
      };
    },
  };
}
