/**
 * Detached process launcher
 *
 * Starts a child in its own session (process group on Windows) that
 * survives the parent's terminal. Used for background daemon starts and
 * for opening an editor on `spawn`.
 */

import fs from 'fs';
import spawn from 'cross-spawn';
import { logError } from '../lib/fault-logger.js';
import { ValidationError } from '../lib/errors.js';
import type { StatePaths } from '../lib/config.js';

export interface DetachRequest {
  command: string;
  args: string[];
  cwd: string;
  /** Append child stdout here; discarded when omitted. */
  stdoutPath?: string;
  stderrPath?: string;
  env?: NodeJS.ProcessEnv;
}

export interface Detacher {
  detach(request: DetachRequest): { pid: number | null };
}

function openOutput(file: string | undefined): number | 'ignore' {
  return file ? fs.openSync(file, 'a') : 'ignore';
}

export const nodeDetacher: Detacher = {
  detach(request: DetachRequest) {
    const stdout = openOutput(request.stdoutPath);
    const stderr = openOutput(request.stderrPath);

    try {
      const child = spawn(request.command, request.args, {
        cwd: request.cwd,
        detached: true,
        stdio: ['ignore', stdout, stderr],
        windowsHide: true,
        env: request.env ?? process.env,
      });

      child.on('error', (err) => {
        logError('detach', `Failed to launch ${request.command}`, err, { args: request.args });
      });
      child.unref();

      return { pid: child.pid ?? null };
    } finally {
      // The child holds its own copies
      if (typeof stdout === 'number') fs.closeSync(stdout);
      if (typeof stderr === 'number') fs.closeSync(stderr);
    }
  },
};

/**
 * Command line that re-runs this CLI as a foreground daemon for `paths.root`.
 */
export function daemonCommand(paths: StatePaths): DetachRequest {
  const cliPath = process.argv[1];
  if (!cliPath) {
    throw new ValidationError('Cannot determine the CLI entry point for a background start');
  }

  return {
    command: process.execPath,
    args: [...process.execArgv, cliPath, '--project-root', paths.root, 'start', '--foreground'],
    cwd: paths.root,
    stdoutPath: paths.daemonOut,
    stderrPath: paths.daemonErr,
  };
}
