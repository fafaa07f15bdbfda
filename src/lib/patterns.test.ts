import { describe, it, expect } from 'vitest';
import { shouldIgnorePath, WATCHER_IGNORE_GLOBS } from './patterns.js';

describe('shouldIgnorePath', () => {
  it('should keep ordinary source files', () => {
    expect(shouldIgnorePath('app/core/engine.py')).toBe(false);
    expect(shouldIgnorePath('README.md')).toBe(false);
  });

  it('should ignore files under ignored directories', () => {
    expect(shouldIgnorePath('.git/HEAD')).toBe(true);
    expect(shouldIgnorePath('app/__pycache__/engine.cpython-312.pyc')).toBe(true);
    expect(shouldIgnorePath('web/node_modules/react/index.js')).toBe(true);
    expect(shouldIgnorePath('.switchyard/messages.json')).toBe(true);
  });

  it('should ignore compiled, log and editor temp files', () => {
    expect(shouldIgnorePath('app/engine.pyc')).toBe(true);
    expect(shouldIgnorePath('server.log')).toBe(true);
    expect(shouldIgnorePath('docs/.notes.md.swp')).toBe(true);
    expect(shouldIgnorePath('docs/notes.md~')).toBe(true);
    expect(shouldIgnorePath('docs/.#notes.md')).toBe(true);
    expect(shouldIgnorePath('docs/#notes.md#')).toBe(true);
    expect(shouldIgnorePath('mac/.DS_Store')).toBe(true);
  });

  it('should apply extra names and suffix patterns', () => {
    expect(shouldIgnorePath('content/drafts/a.md', ['drafts'])).toBe(true);
    expect(shouldIgnorePath('content/out.csv', ['*.csv'])).toBe(true);
    expect(shouldIgnorePath('content/out.json', ['*.csv'])).toBe(false);
  });

  it('should honour a custom separator', () => {
    expect(shouldIgnorePath('app\\node_modules\\x.js', [], '\\')).toBe(true);
  });

  it('should treat an empty path as not ignored', () => {
    expect(shouldIgnorePath('')).toBe(false);
  });
});

describe('WATCHER_IGNORE_GLOBS', () => {
  it('should cover every ignored directory recursively', () => {
    expect(WATCHER_IGNORE_GLOBS).toContain('**/.git/**');
    expect(WATCHER_IGNORE_GLOBS).toContain('**/.switchyard/**');
  });
});
