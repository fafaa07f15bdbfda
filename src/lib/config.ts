/**
 * Configuration system for switchyard
 *
 * Core configuration loading and project-root discovery.
 * Type definitions are in config-types.ts
 * Default values are in config-defaults.ts
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { deepMerge, isPlainObject, resolveConfig } from './config-validation.js';
import { STATE_DIR_NAME } from './config-defaults.js';
import type { SwitchyardConfig, ErrorReportingConfig, StatePaths, PortMode } from './config-types.js';

export type {
  SwitchyardConfig,
  DaemonConfig,
  ActivityConfig,
  MailboxConfig,
  MailboxBackend,
  SpawnConfig,
  AuditConfig,
  ErrorReportingConfig,
  FaultLevel,
  StatePaths,
  PortMode,
} from './config-types.js';

export { DEFAULT_CONFIG, STATE_DIR_NAME } from './config-defaults.js';

// ============================================================================
// Environment
// ============================================================================

export const ENV_DEBUG = 'SWITCHYARD_DEBUG';
export const ENV_LOG_PATH = 'SWITCHYARD_LOG_PATH';
export const ENV_PROJECT_ROOT = 'SWITCHYARD_PROJECT_ROOT';
export const ENV_PORT_MODE = 'SWITCHYARD_PORT_MODE';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

/** Verbose tracing requested through SWITCHYARD_DEBUG. */
export function isDebugEnabled(): boolean {
  const value = process.env[ENV_DEBUG];
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

/** Port set selected for this process (`--fallback` sets SWITCHYARD_PORT_MODE). */
export function getPortMode(): PortMode {
  return process.env[ENV_PORT_MODE] === 'fallback' ? 'fallback' : 'normal';
}

// ============================================================================
// Core Configuration Functions
// ============================================================================

// Config cache: avoids re-reading files on every getConfig() call
let configCache: {
  config: SwitchyardConfig;
  globalMtime: number;
  projectMtime: number;
  projectPath: string;
} | null = null;

/** Problems from the last load, drained by whoever logs them. */
let pendingIssues: string[] = [];

/** Invalidate config cache (for tests or after config changes) */
export function invalidateConfigCache(): void {
  configCache = null;
}

function getFileMtime(filePath: string): number {
  if (!fs.existsSync(filePath)) return 0;
  return fs.statSync(filePath).mtimeMs;
}

function readJsonObject(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    pendingIssues.push(`Could not parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }
  if (!isPlainObject(parsed)) {
    pendingIssues.push(`Ignoring ${filePath}: expected a JSON object`);
    return {};
  }
  return parsed;
}

export function getGlobalConfigPath(): string {
  return path.join(os.homedir(), STATE_DIR_NAME, 'config.json');
}

export function getConfig(): SwitchyardConfig {
  const globalConfigPath = getGlobalConfigPath();
  const projectConfigPath = getStatePaths().configFile;

  // Check if cache is still valid (stat is cheaper than read+parse)
  if (configCache) {
    if (
      getFileMtime(globalConfigPath) === configCache.globalMtime &&
      getFileMtime(projectConfigPath) === configCache.projectMtime &&
      projectConfigPath === configCache.projectPath
    ) {
      return configCache.config;
    }
  }

  // Project config is deep-merged over the global one
  const merged = deepMerge(readJsonObject(globalConfigPath), readJsonObject(projectConfigPath));
  const { config, issues } = resolveConfig(merged);
  pendingIssues.push(...issues);

  configCache = {
    config,
    globalMtime: getFileMtime(globalConfigPath),
    projectMtime: getFileMtime(projectConfigPath),
    projectPath: projectConfigPath,
  };

  return config;
}

/**
 * Return and clear config problems found since the last call.
 * Kept out of getConfig() itself: the fault logger reads config.
 */
export function takeConfigIssues(): string[] {
  const issues = pendingIssues;
  pendingIssues = [];
  return issues;
}

/** Error reporting config, forced to debug level under SWITCHYARD_DEBUG. */
export function getErrorReportingConfig(): ErrorReportingConfig {
  const config = getConfig().error_reporting;
  return isDebugEnabled() ? { ...config, level: 'debug' } : config;
}

export function getProjectRoot(): string {
  // 1. Explicit override (also set by the CLI's --project-root)
  const envRoot = process.env[ENV_PROJECT_ROOT];
  if (envRoot && fs.existsSync(envRoot)) {
    return path.resolve(envRoot);
  }

  // 2. Walk up to find a real project root
  // .git = definite project. .switchyard alone = project only if not $HOME
  // (bare ~/.switchyard is the global config dir, not a project)
  const homeDir = path.resolve(os.homedir());
  let dir = process.cwd();
  while (dir !== path.dirname(dir)) {
    const hasGit = fs.existsSync(path.join(dir, '.git'));
    const hasState = fs.existsSync(path.join(dir, STATE_DIR_NAME));
    if (hasGit || (hasState && path.resolve(dir) !== homeDir)) {
      return dir;
    }
    dir = path.dirname(dir);
  }

  return process.cwd();
}

export function getStateDir(root: string = getProjectRoot()): string {
  return path.join(root, STATE_DIR_NAME);
}

/**
 * All state file locations for a project. Directories are not created here.
 */
export function getStatePaths(root: string = getProjectRoot()): StatePaths {
  const stateDir = getStateDir(root);
  const tmpDir = path.join(stateDir, '.tmp');
  const logOverride = process.env[ENV_LOG_PATH];

  return {
    root,
    stateDir,
    tmpDir,
    configFile: path.join(stateDir, 'config.json'),
    registryFile: path.join(stateDir, 'registry.json'),
    pidFile: path.join(tmpDir, 'daemon.pid'),
    statusFile: path.join(stateDir, 'daemon-status.json'),
    messagesFile: path.join(stateDir, 'messages.json'),
    messagesDb: path.join(stateDir, 'messages.db'),
    mailboxLock: path.join(tmpDir, 'mailbox.lock'),
    sessionsFile: path.join(stateDir, 'sessions.json'),
    sessionsLock: path.join(tmpDir, 'sessions.lock'),
    daemonLog: logOverride ? path.resolve(logOverride) : path.join(stateDir, 'daemon.log'),
    daemonOut: path.join(stateDir, 'daemon.out.log'),
    daemonErr: path.join(stateDir, 'daemon.err.log'),
    faultLog: path.join(stateDir, 'faults.log'),
    promptsDir: path.join(stateDir, 'prompts'),
  };
}

/** Create the state and tmp directories if missing. */
export function ensureStateDirs(paths: StatePaths): void {
  fs.mkdirSync(paths.tmpDir, { recursive: true });
}
