/**
 * Context file edits
 *
 * Rewrites one `## ` section of a context file in place and stamps its
 * `**Last Updated:**` line. The line limit is advisory: an oversized file
 * is still written, with a warning.
 */

import fs from 'fs';
import path from 'path';
import { NotFoundError } from './errors.js';
import { logWarn } from './fault-logger.js';
import { countLines } from './audit.js';
import { writeFileAtomic } from './status-store.js';

export const LAST_UPDATED_MARKER = '**Last Updated:**';

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

/** `March 07, 2026` in local time. */
export function formatLongDate(at: Date): string {
  return `${MONTHS[at.getMonth()]} ${String(at.getDate()).padStart(2, '0')}, ${at.getFullYear()}`;
}

/**
 * Replace the body of the first section whose heading line starts with
 * `section`. The body runs to the next `## ` heading or the end of the file.
 * Returns null when no heading matches.
 */
export function replaceSection(text: string, section: string, content: string, updatedOn: Date): string | null {
  const lines = text.split('\n');
  const start = lines.findIndex((line) => line.trim().startsWith(section));
  if (start === -1) return null;

  let end = lines.length;
  for (let i = start + 1; i < lines.length; i++) {
    if (lines[i].startsWith('## ')) {
      end = i;
      break;
    }
  }

  const body = content.replace(/\s+$/, '').split('\n');
  const stamp = `${LAST_UPDATED_MARKER} ${formatLongDate(updatedOn)}`;

  return [...lines.slice(0, start + 1), '', ...body, '', ...lines.slice(end)]
    .map((line) => (line.trim().startsWith(LAST_UPDATED_MARKER) ? stamp : line))
    .join('\n');
}

export interface UpdateContextFileOptions {
  maxLines?: number;
  now?: Date;
}

export type ContextFileUpdate =
  | { success: true; file: string; lines: number; overLimit: boolean }
  | { success: false; error: NotFoundError };

export function updateContextFile(
  filePath: string,
  section: string,
  content: string,
  options: UpdateContextFileOptions = {}
): ContextFileUpdate {
  const { maxLines = 500 } = options;

  if (!fs.existsSync(filePath)) {
    return { success: false, error: new NotFoundError(`Context file not found: ${filePath}`, { file: filePath }) };
  }

  const updated = replaceSection(fs.readFileSync(filePath, 'utf-8'), section, content, options.now ?? new Date());
  if (updated === null) {
    return {
      success: false,
      error: new NotFoundError(`Section "${section}" not found in ${path.basename(filePath)}`, { file: filePath, section }),
    };
  }

  const lines = countLines(updated);
  const overLimit = lines > maxLines;
  if (overLimit) {
    logWarn('context', `${path.basename(filePath)} has ${lines} lines (limit ${maxLines})`, { file: filePath });
  }

  writeFileAtomic(filePath, updated);
  return { success: true, file: filePath, lines, overLimit };
}
