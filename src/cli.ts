#!/usr/bin/env node

import path from 'path';
import { Command } from 'commander';
import { ENV_PORT_MODE, ENV_PROJECT_ROOT } from './lib/config.js';
import { daemonLogs, daemonRestart, daemonStart, daemonStatus, daemonStop } from './commands/daemon.js';
import { listMessages, readMessage, sendMessage } from './commands/messages.js';
import {
  closeSession,
  listSessions,
  showContext,
  showRules,
  spawnSession,
  updateContext,
  writePrompt,
} from './commands/context.js';
import { audit } from './commands/audit.js';

const VERSION = '0.4.0';

const program = new Command();

program
  .name('switchyard')
  .description('Context coordination daemon: activity tracking, handoff mailbox and session prompts')
  .version(VERSION)
  .option('--project-root <path>', 'Project root (default: nearest .git or .switchyard)')
  .option('--fallback', 'Use the fallback port set')
  .hook('preAction', () => {
    const opts = program.opts<{ projectRoot?: string; fallback?: boolean }>();
    if (opts.projectRoot) {
      process.env[ENV_PROJECT_ROOT] = path.resolve(opts.projectRoot);
    }
    if (opts.fallback) {
      process.env[ENV_PORT_MODE] = 'fallback';
    }
  });

// ============================================================================
// Daemon
// ============================================================================

program
  .command('start')
  .description('Start the daemon (foreground unless --background)')
  .option('-b, --background', 'Detach and return once the daemon holds its lock')
  .option('--foreground', 'Run in this process (default)')
  .action(daemonStart);

program
  .command('stop')
  .description('Stop the running daemon')
  .action(daemonStop);

program
  .command('restart')
  .description('Stop the daemon and start it again in the background')
  .action(daemonRestart);

program
  .command('status')
  .description('Show daemon status')
  .option('--json', 'Output as JSON')
  .action(daemonStatus);

program
  .command('logs')
  .description('Show recent daemon log lines')
  .option('-n, --lines <number>', 'Number of lines', '50')
  .action(daemonLogs);

// ============================================================================
// Mailbox
// ============================================================================

program
  .command('send <from> <to> <content>')
  .description('Send a handoff message ("all" broadcasts)')
  .option('-t, --type <type>', 'Message type', 'info')
  .option('-p, --priority <priority>', 'low, normal, high or urgent')
  .option('-s, --subject <subject>', 'Subject line')
  .action(sendMessage);

program
  .command('messages')
  .description('List unread messages')
  .option('-c, --context <id>', 'Only messages addressed to this context')
  .option('-a, --all', 'Include read messages')
  .option('--json', 'Output as JSON')
  .action(listMessages);

program
  .command('read <id>')
  .description('Show a message and mark it read')
  .action(readMessage);

// ============================================================================
// Contexts
// ============================================================================

program
  .command('rules')
  .description('Show handoff rules')
  .action(showRules);

program
  .command('context')
  .description('Show the active context and per-context activity')
  .option('--json', 'Output as JSON')
  .action(showContext);

program
  .command('prompt <context>')
  .description('Write the resume prompt for a context')
  .option('--task <task>', 'Current task to include')
  .action(writePrompt);

program
  .command('spawn <context>')
  .description('Write the resume prompt and open a new editor session')
  .option('--task <task>', 'Current task to include')
  .option('--no-open', 'Write the prompt only')
  .action(spawnSession);

program
  .command('sessions')
  .description('List recorded sessions, most recent first')
  .option('-c, --context <id>', 'Only sessions of this context')
  .option('--active', 'Only sessions still open')
  .option('--json', 'Output as JSON')
  .action(listSessions);

program
  .command('close <session-id>')
  .description('Mark a session closed')
  .action(closeSession);

program
  .command('update <context> <section> <content>')
  .description('Replace one "## " section of a context file')
  .action(updateContext);

program
  .command('audit')
  .description('Check context files and watch directories')
  .option('-q, --quick', 'Skip file counts and message log')
  .option('--json', 'Output as JSON')
  .action(audit);

await program.parseAsync();
