/**
 * Daemon CLI Commands
 *
 * - switchyard start [--background]  - run the daemon (foreground by default)
 * - switchyard stop                  - SIGTERM the daemon and wait for it
 * - switchyard restart               - stop, pause, start in background
 * - switchyard status [--json]       - lock + recorded status
 * - switchyard logs [--lines N]      - tail daemon.log
 */

import ora from 'ora';
import { getConfig, getPortMode, getProjectRoot, getStatePaths, type StatePaths } from '../lib/config.js';
import { loadRegistry } from '../lib/registry.js';
import { DaemonLifecycle, type StartResult } from '../daemon/lifecycle.js';
import { getDaemonStatus, restartDaemon, stopDaemon } from '../daemon/control.js';
import { createDaemonRuntime } from '../daemon/service.js';
import { createDaemonLog, tailLog } from '../daemon/log.js';
import { printJson, reportError } from './shared.js';

export interface StartCommandOptions {
  background?: boolean;
  foreground?: boolean;
}

export interface StatusCommandOptions {
  json?: boolean;
}

export interface LogsCommandOptions {
  lines?: string;
}

function backgroundStart(paths: StatePaths): Promise<StartResult> {
  const lifecycle = new DaemonLifecycle({
    paths,
    config: getConfig().daemon,
    log: createDaemonLog(paths.daemonLog, { echo: false }),
  });
  return lifecycle.start({ foreground: false });
}

/**
 * Start the daemon. In the foreground this resolves when the daemon stops.
 */
export async function daemonStart(options: StartCommandOptions = {}): Promise<void> {
  const root = getProjectRoot();
  const paths = getStatePaths(root);

  try {
    if (options.background && !options.foreground) {
      // Fail here, not in the detached child, on a broken registry
      loadRegistry(root);

      const spinner = ora('Starting daemon...').start();
      const result = await backgroundStart(paths);
      if (!result.ok) {
        spinner.fail('Daemon did not start');
        reportError(result.error, 'daemon-cmd');
        return;
      }
      spinner.succeed(`Daemon started in background (pid=${result.pid})`);
      return;
    }

    const runtime = createDaemonRuntime({ root });
    const result = await runtime.lifecycle.start();
    if (!result.ok) {
      reportError(result.error, 'daemon-cmd');
      return;
    }

    console.log(`Daemon running (pid=${result.pid}, mode=${getPortMode()}); Ctrl+C to stop`);
    await runtime.lifecycle.wait();
  } catch (err) {
    reportError(err, 'daemon-cmd');
  }
}

export async function daemonStop(): Promise<void> {
  const paths = getStatePaths();
  const spinner = ora('Stopping daemon...').start();

  try {
    const result = await stopDaemon(paths, getConfig().daemon.stop_timeout_ms);
    switch (result.outcome) {
      case 'stopped':
        spinner.succeed(`Daemon stopped (pid=${result.pid})`);
        break;
      case 'stale':
        spinner.info(`Daemon was not running; removed stale PID lock (pid=${result.pid ?? 'unreadable'})`);
        break;
      case 'not-running':
        spinner.fail('Daemon is not running');
        process.exitCode = 1;
        break;
      case 'timeout':
        spinner.fail(`Daemon (pid=${result.pid}) did not stop in time`);
        process.exitCode = 1;
        break;
    }
  } catch (err) {
    spinner.stop();
    reportError(err, 'daemon-cmd');
  }
}

export async function daemonRestart(): Promise<void> {
  const paths = getStatePaths();
  const spinner = ora('Restarting daemon...').start();

  try {
    const { signalled, start } = await restartDaemon(paths, getConfig().daemon.restart_wait_ms, () =>
      backgroundStart(paths)
    );
    if (!start.ok) {
      spinner.fail('Daemon did not start');
      reportError(start.error, 'daemon-cmd');
      return;
    }
    const previous = signalled === null ? '' : ` (replaced pid=${signalled})`;
    spinner.succeed(`Daemon started in background (pid=${start.pid})${previous}`);
  } catch (err) {
    spinner.stop();
    reportError(err, 'daemon-cmd');
  }
}

export async function daemonStatus(options: StatusCommandOptions = {}): Promise<void> {
  const status = getDaemonStatus(getStatePaths());

  if (options.json) {
    printJson(status);
    return;
  }

  console.log('=== switchyard Daemon Status ===\n');

  if (!status.running) {
    console.log('Status:   Not running');
    if (status.stale) {
      console.log(`PID file names ${status.pid ?? 'nothing readable'} but no such process (stale lock; next start reclaims it)`);
    }
    return;
  }

  const { data } = status;
  console.log(`Status:   Running (${status.state})`);
  console.log(`PID:      ${status.pid}`);
  console.log(`Uptime:   ${status.uptimeMs === null ? 'unknown' : formatUptime(status.uptimeMs)}`);
  console.log(`Active:   ${data.active_context ?? 'none'}`);
  if (data.health_score !== undefined) {
    console.log(`Health:   ${data.health_score}`);
  }
  if (data.ports) {
    const ports = Object.entries(data.ports).map(([name, port]) => `${name} ${port}`).join(', ');
    console.log(`Ports:    ${ports} (${data.port_mode ?? 'normal'})`);
  }
  if (data.watcher) {
    console.log(`Watching: ${data.watcher.directories} directories (${data.watcher.failed} failed)`);
  }
  if (data.error) {
    console.log(`Error:    ${data.error}`);
  }
  console.log(`Updated:  ${status.lastUpdate ?? 'never'}`);
}

export async function daemonLogs(options: LogsCommandOptions = {}): Promise<void> {
  const paths = getStatePaths();
  const lines = options.lines ? parseInt(options.lines, 10) : 50;
  if (Number.isNaN(lines) || lines < 0) {
    reportError(new Error(`Invalid --lines value: ${options.lines}`));
    return;
  }

  const lastLines = tailLog(paths.daemonLog, lines);
  if (lastLines === null) {
    console.log('No daemon logs found');
    return;
  }

  console.log(`=== Last ${lastLines.length} lines from daemon.log ===\n`);
  console.log(lastLines.join('\n'));
}

// ============================================================================
// Helpers
// ============================================================================

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days}d ${hours % 24}h`;
  }
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}
