/**
 * Helpers shared by the CLI commands.
 */

import { getConfig, getPortMode, getProjectRoot, getStatePaths, type StatePaths, type SwitchyardConfig } from '../lib/config.js';
import { flushConfigIssues, logError } from '../lib/fault-logger.js';
import { loadRegistry, type ContextRegistry } from '../lib/registry.js';
import { isSwitchyardError, errorMessage } from '../lib/errors.js';
import { openMailbox } from '../daemon/mailbox-backend.js';
import type { Mailbox } from '../daemon/mailbox.js';
import { openSessionLog } from '../daemon/session-log.js';
import { createSessionCoordinator, statusActivitySource, type SessionCoordinator } from '../daemon/coordinator.js';
import { nodeDetacher } from '../daemon/detach.js';

export interface CliContext {
  root: string;
  paths: StatePaths;
  config: SwitchyardConfig;
  registry: ContextRegistry;
}

export function loadCliContext(): CliContext {
  const root = getProjectRoot();
  const config = getConfig();
  flushConfigIssues();
  return { root, paths: getStatePaths(root), config, registry: loadRegistry(root) };
}

/**
 * Run `fn` with a coordinator over the project's mailbox and session log;
 * both are closed afterwards.
 */
export async function withCoordinator<T>(
  ctx: CliContext,
  fn: (coordinator: SessionCoordinator, mailbox: Mailbox) => Promise<T>
): Promise<T> {
  const mailbox = openMailbox(ctx.registry, ctx.paths, ctx.config.mailbox);
  const sessions = openSessionLog(ctx.paths, ctx.config.mailbox);
  try {
    const coordinator = createSessionCoordinator({
      registry: ctx.registry,
      mailbox,
      sessions,
      activity: statusActivitySource(ctx.registry, ctx.paths),
      portMode: getPortMode(),
      promptsDir: ctx.paths.promptsDir,
      spawnConfig: ctx.config.spawn,
      detacher: nodeDetacher,
      maxContextLines: ctx.config.audit.max_context_lines,
    });
    return await fn(coordinator, mailbox);
  } finally {
    sessions.close();
    mailbox.close();
  }
}

/**
 * Print `Error: <message>` (plus structured detail for our own errors) and
 * mark the process as failed.
 */
export function reportError(error: unknown, component: string = 'cli'): void {
  console.error(`Error: ${errorMessage(error)}`);
  if (isSwitchyardError(error)) {
    if (error.context && Object.keys(error.context).length > 0) {
      console.error(`  ${JSON.stringify({ code: error.code, ...error.context })}`);
    }
  } else {
    logError(component, 'Unexpected command failure', error instanceof Error ? error : undefined);
  }
  process.exitCode = 1;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
