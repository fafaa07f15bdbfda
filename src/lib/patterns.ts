/**
 * Ignore rules for file activity.
 *
 * Based on:
 * - GitHub gitignore templates (https://github.com/github/gitignore)
 */

import { STATE_DIR_NAME } from './config-defaults.js';

/**
 * Directory names whose contents never count as activity.
 */
export const IGNORE_DIRS = new Set([
  // Version control
  '.git',
  '.svn',
  '.hg',

  // Dependencies
  'node_modules',
  'bower_components',
  'vendor',
  '.venv',
  'venv',

  // Caches and build output
  '__pycache__',
  '.pytest_cache',
  '.mypy_cache',
  '.ruff_cache',
  '.cache',
  '.parcel-cache',
  '.turbo',
  '.next',
  'coverage',
  '.nyc_output',

  // Editors
  '.idea',
  '.vscode',

  // Our own state
  STATE_DIR_NAME,
]);

/**
 * Exact file names to ignore.
 */
export const IGNORE_FILES = new Set(['.DS_Store', 'Thumbs.db', 'desktop.ini']);

/**
 * File name suffixes to ignore: compiled artifacts, logs, editor temp files.
 */
export const IGNORE_SUFFIXES = ['.pyc', '.pyo', '.log', '.swp', '.swo', '.swx', '.tmp', '~'];

/**
 * Glob patterns handed to the native watcher so ignored trees are not even
 * reported.
 */
export const WATCHER_IGNORE_GLOBS = [...IGNORE_DIRS].map((dir) => `**/${dir}/**`);

/**
 * Check if a path should be ignored.
 *
 * `extra` entries are directory/file names, or `*.ext` suffix patterns.
 */
export function shouldIgnorePath(
  relativePath: string,
  extra: readonly string[] = [],
  sep: string = '/'
): boolean {
  const parts = relativePath.split(sep).filter((part) => part.length > 0);
  if (parts.length === 0) return false;

  const extraNames = new Set<string>();
  const extraSuffixes: string[] = [];
  for (const entry of extra) {
    if (entry.startsWith('*.')) {
      extraSuffixes.push(entry.slice(1));
    } else {
      extraNames.add(entry);
    }
  }

  // Directory components
  for (let i = 0; i < parts.length - 1; i++) {
    if (IGNORE_DIRS.has(parts[i]) || extraNames.has(parts[i])) {
      return true;
    }
  }

  // File name
  const filename = parts[parts.length - 1];
  if (IGNORE_FILES.has(filename) || IGNORE_DIRS.has(filename) || extraNames.has(filename)) {
    return true;
  }
  // Vim swap and emacs lock files
  if (filename.startsWith('.#') || (filename.startsWith('#') && filename.endsWith('#'))) {
    return true;
  }
  for (const suffix of [...IGNORE_SUFFIXES, ...extraSuffixes]) {
    if (filename.endsWith(suffix)) {
      return true;
    }
  }

  return false;
}
