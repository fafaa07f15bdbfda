import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import {
  DEFAULT_CONFIG,
  ENV_DEBUG,
  ENV_LOG_PATH,
  ENV_PORT_MODE,
  ENV_PROJECT_ROOT,
  getConfig,
  getPortMode,
  getProjectRoot,
  getStatePaths,
  invalidateConfigCache,
  isDebugEnabled,
  takeConfigIssues,
} from './config.js';
import { deepMerge, resolveConfig } from './config-validation.js';

const ENV_KEYS = [ENV_DEBUG, ENV_LOG_PATH, ENV_PORT_MODE, ENV_PROJECT_ROOT];

describe('Config Module', () => {
  let tempDir: string;
  let projectDir: string;
  let homeDir: string;
  let savedEnv: Record<string, string | undefined>;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'switchyard-config-'));
    projectDir = path.join(tempDir, 'project');
    homeDir = path.join(tempDir, 'home');
    fs.mkdirSync(path.join(projectDir, '.switchyard'), { recursive: true });
    fs.mkdirSync(path.join(homeDir, '.switchyard'), { recursive: true });

    savedEnv = Object.fromEntries(ENV_KEYS.map((key) => [key, process.env[key]]));
    for (const key of ENV_KEYS) delete process.env[key];
    process.env[ENV_PROJECT_ROOT] = projectDir;

    vi.spyOn(os, 'homedir').mockReturnValue(homeDir);
    invalidateConfigCache();
    takeConfigIssues();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    invalidateConfigCache();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(dir: string, value: unknown): string {
    const file = path.join(dir, '.switchyard', 'config.json');
    fs.writeFileSync(file, JSON.stringify(value));
    return file;
  }

  describe('resolveConfig', () => {
    it('should fill every section with defaults', () => {
      const { config, issues } = resolveConfig({});
      expect(config).toEqual(DEFAULT_CONFIG);
      expect(issues).toEqual([]);
    });

    it('should keep defaults for keys a section omits', () => {
      const { config } = resolveConfig({ daemon: { tick_seconds: 5 } });
      expect(config.daemon.tick_seconds).toBe(5);
      expect(config.daemon.health_check_seconds).toBe(300);
    });

    it('should replace an invalid section with its defaults and report it', () => {
      const { config, issues } = resolveConfig({
        mailbox: { backend: 'redis', max_messages: 10 },
        spawn: { command: 'vim' },
      });

      expect(config.mailbox).toEqual(DEFAULT_CONFIG.mailbox);
      expect(config.spawn).toEqual({ command: 'vim', args: ['-n'] });
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^Invalid config value at "mailbox\.backend": /);
    });

    it('should drop unknown keys', () => {
      const { config } = resolveConfig({ audit: { max_context_lines: 80, colour: 'red' } });
      expect(config.audit).toEqual({ max_context_lines: 80 });
    });
  });

  describe('deepMerge', () => {
    it('should merge nested objects and let arrays override', () => {
      const merged = deepMerge(
        { daemon: { tick_seconds: 10, cleanup_seconds: 60 }, activity: { ignore: ['a'] } },
        { daemon: { tick_seconds: 15 }, activity: { ignore: ['b'] }, extra: undefined }
      );
      expect(merged).toEqual({
        daemon: { tick_seconds: 15, cleanup_seconds: 60 },
        activity: { ignore: ['b'] },
      });
    });
  });

  describe('getConfig', () => {
    it('should return defaults when no config files exist', () => {
      expect(getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should deep-merge the project config over the global one', () => {
      writeConfig(homeDir, { daemon: { tick_seconds: 10 }, spawn: { command: 'vim' } });
      writeConfig(projectDir, { daemon: { tick_seconds: 15 } });

      const config = getConfig();
      expect(config.daemon.tick_seconds).toBe(15);
      expect(config.spawn.command).toBe('vim');
    });

    it('should reload when a config file changes', () => {
      const file = writeConfig(projectDir, { mailbox: { max_messages: 100 } });
      fs.utimesSync(file, new Date(2026, 0, 1), new Date(2026, 0, 1));
      expect(getConfig().mailbox.max_messages).toBe(100);

      fs.writeFileSync(file, JSON.stringify({ mailbox: { max_messages: 200 } }));
      fs.utimesSync(file, new Date(2026, 0, 2), new Date(2026, 0, 2));
      expect(getConfig().mailbox.max_messages).toBe(200);
    });

    it('should fall back to defaults for an unparsable file and record the issue', () => {
      const file = path.join(projectDir, '.switchyard', 'config.json');
      fs.writeFileSync(file, '{ not json');

      expect(getConfig()).toEqual(DEFAULT_CONFIG);
      const issues = takeConfigIssues();
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^Could not parse /);
      expect(takeConfigIssues()).toEqual([]);
    });

    it('should ignore a config file that is not an object', () => {
      writeConfig(projectDir, [1, 2]);

      expect(getConfig()).toEqual(DEFAULT_CONFIG);
      expect(takeConfigIssues()).toEqual([`Ignoring ${path.join(projectDir, '.switchyard', 'config.json')}: expected a JSON object`]);
    });
  });

  describe('getProjectRoot', () => {
    it('should honour SWITCHYARD_PROJECT_ROOT', () => {
      expect(getProjectRoot()).toBe(path.resolve(projectDir));
    });
  });

  describe('getStatePaths', () => {
    it('should place state under .switchyard', () => {
      const paths = getStatePaths(projectDir);
      expect(paths.pidFile).toBe(path.join(projectDir, '.switchyard', '.tmp', 'daemon.pid'));
      expect(paths.statusFile).toBe(path.join(projectDir, '.switchyard', 'daemon-status.json'));
      expect(paths.messagesFile).toBe(path.join(projectDir, '.switchyard', 'messages.json'));
      expect(paths.daemonLog).toBe(path.join(projectDir, '.switchyard', 'daemon.log'));
      expect(paths.configFile).toBe(path.join(projectDir, '.switchyard', 'config.json'));
      expect(paths.registryFile).toBe(path.join(projectDir, '.switchyard', 'registry.json'));
      expect(paths.faultLog).toBe(path.join(projectDir, '.switchyard', 'faults.log'));
      expect(paths.sessionsFile).toBe(path.join(projectDir, '.switchyard', 'sessions.json'));
      expect(paths.sessionsLock).toBe(path.join(projectDir, '.switchyard', '.tmp', 'sessions.lock'));
    });

    it('should read the project config from its configFile', () => {
      fs.writeFileSync(getStatePaths(projectDir).configFile, JSON.stringify({ daemon: { tick_seconds: 12 } }));
      expect(getConfig().daemon.tick_seconds).toBe(12);
    });

    it('should redirect the daemon log with SWITCHYARD_LOG_PATH', () => {
      const logFile = path.join(tempDir, 'elsewhere.log');
      process.env[ENV_LOG_PATH] = logFile;
      expect(getStatePaths(projectDir).daemonLog).toBe(logFile);
    });
  });

  describe('environment flags', () => {
    it('should select the fallback port set only when asked', () => {
      expect(getPortMode()).toBe('normal');
      process.env[ENV_PORT_MODE] = 'fallback';
      expect(getPortMode()).toBe('fallback');
    });

    it('should read SWITCHYARD_DEBUG as a boolean', () => {
      expect(isDebugEnabled()).toBe(false);
      process.env[ENV_DEBUG] = 'Yes';
      expect(isDebugEnabled()).toBe(true);
      process.env[ENV_DEBUG] = '0';
      expect(isDebugEnabled()).toBe(false);
    });
  });
});
