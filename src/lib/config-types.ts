/**
 * Type definitions for switchyard configuration
 */

export type FaultLevel = 'error' | 'warn' | 'info' | 'debug';

export type MailboxBackend = 'file' | 'sqlite';

export type PortMode = 'normal' | 'fallback';

export interface DaemonConfig {
  tick_seconds: number; // Main loop period (default: 30)
  health_check_seconds: number; // Minimum spacing between health checks (default: 300)
  cleanup_seconds: number; // Minimum spacing between mailbox cleanups (default: 1800)
  sleep_slice_ms: number; // Granularity at which a stop request is observed (default: 1000)
  restart_wait_ms: number; // Pause between SIGTERM and start on restart (default: 2000)
  stop_timeout_ms: number; // How long `stop` waits for the PID lock to clear (default: 10000)
  start_timeout_ms: number; // How long a background start waits for the child's lock (default: 5000)
}

export interface ActivityConfig {
  window_seconds: number; // Hysteresis window for the active context (default: 300)
  buffer_size: number; // Events kept per context (default: 100)
  debounce_ms: number; // Same-path collapse window (default: 1000)
  ignore: string[]; // Extra ignore entries: directory names or *.ext
}

export interface MailboxConfig {
  backend: MailboxBackend;
  retention_days: number; // Read messages older than this are trimmed (default: 30)
  max_messages: number; // Hard cap on stored messages (default: 500)
}

export interface SpawnConfig {
  command: string; // Editor launched by `spawn` (default: code)
  args: string[]; // Arguments before the project root (default: ['-n'])
}

export interface AuditConfig {
  max_context_lines: number; // Context file size limit (default: 500)
}

export interface ErrorReportingConfig {
  enabled: boolean;
  level: FaultLevel;
  max_file_size_mb: number;
}

export interface SwitchyardConfig {
  daemon: DaemonConfig;
  activity: ActivityConfig;
  mailbox: MailboxConfig;
  spawn: SpawnConfig;
  audit: AuditConfig;
  error_reporting: ErrorReportingConfig;
}

/** Resolved locations of everything switchyard keeps under `.switchyard/`. */
export interface StatePaths {
  root: string;
  stateDir: string;
  tmpDir: string;
  configFile: string;
  registryFile: string;
  pidFile: string;
  statusFile: string;
  messagesFile: string;
  messagesDb: string;
  mailboxLock: string;
  sessionsFile: string;
  sessionsLock: string;
  daemonLog: string;
  daemonOut: string;
  daemonErr: string;
  faultLog: string;
  promptsDir: string;
}
