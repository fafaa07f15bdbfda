import fs from 'fs';
import path from 'path';
import { logWarn } from '../lib/fault-logger.js';

export type DaemonLog = (message: string) => void;

export interface DaemonLogOptions {
  /** Copy lines to stderr. Defaults to true only when stderr is a terminal. */
  echo?: boolean;
  stream?: NodeJS.WritableStream & { isTTY?: boolean };
}

/**
 * Daemon log: `[timestamp] message` lines appended to `file`, and echoed to
 * stderr in a foreground terminal. A detached daemon's stderr is
 * `daemon.err.log`, which keeps only what the process itself prints.
 * Callers prefix the component, e.g. `[watcher] ...`.
 */
export function createDaemonLog(file: string, options: DaemonLogOptions = {}): DaemonLog {
  const stream = options.stream ?? process.stderr;
  const echo = options.echo ?? stream.isTTY === true;

  return (message: string) => {
    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] ${message}\n`;

    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.appendFileSync(file, line);
    } catch (err) {
      logWarn('daemon', 'Failed to write daemon log', { error: err instanceof Error ? err.message : String(err) });
    }

    if (echo) {
      stream.write(line);
    }
  };
}

/** Last `lines` lines of a log file, or null if it does not exist. */
export function tailLog(file: string, lines: number): string[] | null {
  if (!fs.existsSync(file)) return null;
  const content = fs.readFileSync(file, 'utf-8').split('\n');
  if (content[content.length - 1] === '') content.pop();
  return lines > 0 ? content.slice(-lines) : [];
}
