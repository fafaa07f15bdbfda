/**
 * Context CLI Commands
 *
 * - switchyard rules                        - expanded handoff rules
 * - switchyard context [--json]             - active context and activity
 * - switchyard prompt <context> [--task]    - write the resume prompt
 * - switchyard spawn <context> [--no-open]  - prompt + editor session
 * - switchyard sessions [--context]         - session log
 * - switchyard close <session-id>           - close a session
 * - switchyard update <context> <section>   - rewrite a context file section
 */

import { getPortMode } from '../lib/config.js';
import type { ContextRegistry } from '../lib/registry.js';
import { ValidationError } from '../lib/errors.js';
import type { ContextActivity } from '../daemon/activity.js';
import type { Session } from '../daemon/session-log.js';
import { loadCliContext, printJson, reportError, withCoordinator } from './shared.js';

export interface ContextCommandOptions {
  json?: boolean;
}

export interface PromptCommandOptions {
  task?: string;
}

export interface SpawnCommandOptions extends PromptCommandOptions {
  open?: boolean;
}

export interface SessionsCommandOptions {
  context?: string;
  active?: boolean;
  json?: boolean;
}

interface ContextRow extends ContextActivity {
  id: string;
  file: string;
  pending: number;
}

/**
 * Rules grouped per context, both directions. Contexts with no rules
 * either way are left out.
 */
export function formatRules(registry: ContextRegistry): string[] {
  const lines = ['=== Handoff Rules ===', ''];
  const rules = registry.rules();
  if (rules.length === 0) {
    lines.push('No explicit rules', '');
  }

  for (const id of registry.ids()) {
    const sends = rules.filter((rule) => rule.from === id);
    const receives = rules.filter((rule) => rule.to === id);
    if (sends.length === 0 && receives.length === 0) continue;

    lines.push(`${id}:`);
    if (sends.length > 0) {
      lines.push('  Sends to:');
      for (const rule of sends) lines.push(`    -> ${rule.to}: ${rule.types.join(', ')}`);
    }
    if (receives.length > 0) {
      lines.push('  Receives from:');
      for (const rule of receives) lines.push(`    <- ${rule.from}: ${rule.types.join(', ')}`);
    }
    lines.push('');
  }

  const coordinator = registry.coordinator();
  if (coordinator) {
    lines.push(`${coordinator} (coordinator) may send any type to any context, and receive any type.`);
  }
  return lines;
}

export function formatSessionLine(session: Session): string {
  const task = session.task ? `  ${session.task}` : '';
  return `${session.session_id.padEnd(8)} ${session.context.padEnd(12)} ${session.status.padEnd(7)} ${session.last_activity}${task}`;
}

export async function showRules(): Promise<void> {
  try {
    const { registry } = loadCliContext();
    for (const line of formatRules(registry)) console.log(line);
  } catch (err) {
    reportError(err, 'context-cmd');
  }
}

export async function showContext(options: ContextCommandOptions = {}): Promise<void> {
  try {
    const ctx = loadCliContext();
    const report = await withCoordinator(ctx, async (coordinator) => {
      const activity = coordinator.activitySummary();
      const contexts: ContextRow[] = [];
      for (const id of ctx.registry.ids()) {
        contexts.push({
          id,
          file: ctx.registry.contextFilePath(id),
          pending: await coordinator.pendingCount(id),
          ...(activity[id] ?? { lastActivity: null, secondsAgo: null, recentEvents: 0 }),
        });
      }
      return {
        active: coordinator.activeContext(),
        portMode: getPortMode(),
        ports: ctx.registry.ports(getPortMode()),
        contexts,
      };
    });

    if (options.json) {
      printJson(report);
      return;
    }

    console.log('=== Contexts ===\n');
    console.log(`Active: ${report.active ?? 'none'}\n`);
    for (const entry of report.contexts) {
      const marker = entry.id === report.active ? '>' : ' ';
      const seen = entry.secondsAgo === null ? 'no recent activity' : `${entry.secondsAgo}s ago (${entry.recentEvents} events)`;
      console.log(`${marker} ${entry.id.padEnd(12)} ${String(entry.pending).padStart(3)} pending  ${seen}`);
    }
  } catch (err) {
    reportError(err, 'context-cmd');
  }
}

export async function writePrompt(context: string, options: PromptCommandOptions = {}): Promise<void> {
  try {
    const ctx = loadCliContext();
    const file = await withCoordinator(ctx, (coordinator) => coordinator.writePromptFile(context, { task: options.task }));
    console.log(`Resume prompt written to ${file}`);
  } catch (err) {
    reportError(err, 'context-cmd');
  }
}

export async function spawnSession(context: string, options: SpawnCommandOptions = {}): Promise<void> {
  try {
    const ctx = loadCliContext();
    const result = await withCoordinator(ctx, (coordinator) =>
      coordinator.spawn(context, { task: options.task, open: options.open })
    );

    if (!result.success) {
      reportError(result.error, 'context-cmd');
      return;
    }

    console.log(`Session ${result.sessionId} (${result.context})`);
    console.log(`  Prompt:  ${result.promptFile}`);
    console.log(`  Context: ${result.contextFile}`);
    if (result.command) {
      console.log(`  Opened:  ${result.command} (pid=${result.pid})`);
    }
  } catch (err) {
    reportError(err, 'context-cmd');
  }
}

export async function listSessions(options: SessionsCommandOptions = {}): Promise<void> {
  try {
    const ctx = loadCliContext();
    if (options.context !== undefined) ctx.registry.assertKnown(options.context);

    const sessions = await withCoordinator(ctx, (coordinator) =>
      coordinator.listSessions({ context: options.context, status: options.active ? 'active' : undefined })
    );

    if (options.json) {
      printJson(sessions);
      return;
    }
    if (sessions.length === 0) {
      console.log('No sessions');
      return;
    }

    console.log(`=== ${sessions.length} session(s) ===\n`);
    for (const session of sessions) console.log(formatSessionLine(session));
  } catch (err) {
    reportError(err, 'context-cmd');
  }
}

export async function closeSession(sessionId: string): Promise<void> {
  try {
    const ctx = loadCliContext();
    const closed = await withCoordinator(ctx, (coordinator) => coordinator.closeSession(sessionId));
    if (!closed) {
      throw new ValidationError(`No active session ${sessionId}`, { sessionId });
    }
    console.log(`Closed session ${sessionId}`);
  } catch (err) {
    reportError(err, 'context-cmd');
  }
}

export async function updateContext(context: string, section: string, content: string): Promise<void> {
  try {
    const ctx = loadCliContext();
    const result = await withCoordinator(ctx, async (coordinator) => coordinator.updateContext(context, section, content));

    if (!result.success) {
      reportError(result.error, 'context-cmd');
      return;
    }
    console.log(`Updated ${section} in ${result.file} (${result.lines} lines)`);
    if (result.overLimit) {
      console.log(`Warning: over the ${ctx.config.audit.max_context_lines}-line limit`);
    }
  } catch (err) {
    reportError(err, 'context-cmd');
  }
}
