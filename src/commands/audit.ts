/**
 * Audit CLI Command
 *
 * Same checks the daemon runs for its health score; full mode also counts
 * watched files and reports the message log.
 */

import ora from 'ora';
import { openMailbox } from '../daemon/mailbox-backend.js';
import { runAudit, type AuditReport } from '../lib/audit.js';
import { loadCliContext, printJson, reportError } from './shared.js';

export interface AuditCommandOptions {
  quick?: boolean;
  json?: boolean;
}

function printReport(report: AuditReport): void {
  console.log(`=== switchyard Audit${report.quick ? ' (quick)' : ''} ===\n`);

  for (const entry of report.contexts) {
    const lines = entry.lines === null ? 'missing' : `${entry.lines} lines`;
    console.log(`${entry.id.padEnd(12)} ${entry.file} (${lines})`);
    for (const dir of entry.watch) {
      const detail = !dir.exists ? 'missing' : dir.files === null ? 'ok' : `${dir.files} files`;
      console.log(`  watch ${dir.dir}: ${detail}`);
    }
  }

  if (report.mailbox) {
    console.log(`\nMessages: ${report.mailbox.total} (${report.mailbox.unread} unread)`);
  }

  for (const [severity, issues] of Object.entries(report.issues)) {
    if (issues.length === 0) continue;
    console.log(`\n${severity}:`);
    for (const issue of issues) console.log(`  - ${issue}`);
  }

  console.log(`\n${report.summary}`);
}

export async function audit(options: AuditCommandOptions = {}): Promise<void> {
  const spinner = options.json ? null : ora('Auditing contexts...').start();

  try {
    const { registry, paths, config } = loadCliContext();
    const mailbox = options.quick ? undefined : openMailbox(registry, paths, config.mailbox);
    let report: AuditReport;
    try {
      report = await runAudit({
        registry,
        quick: options.quick,
        maxContextLines: config.audit.max_context_lines,
        mailbox,
      });
    } finally {
      mailbox?.close();
    }

    spinner?.stop();
    if (options.json) {
      printJson(report);
    } else {
      printReport(report);
    }
    if (report.issues.critical.length > 0) {
      process.exitCode = 1;
    }
  } catch (err) {
    spinner?.fail('Audit failed');
    reportError(err, 'audit-cmd');
  }
}
