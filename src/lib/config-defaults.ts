/**
 * Default configuration values for switchyard
 */

import type {
  SwitchyardConfig,
  DaemonConfig,
  ActivityConfig,
  MailboxConfig,
  SpawnConfig,
  AuditConfig,
  ErrorReportingConfig,
} from './config-types.js';

export const STATE_DIR_NAME = '.switchyard';

export const DEFAULT_DAEMON_CONFIG: DaemonConfig = {
  tick_seconds: 30,
  health_check_seconds: 300,
  cleanup_seconds: 1800,
  sleep_slice_ms: 1000,
  restart_wait_ms: 2000,
  stop_timeout_ms: 10000,
  start_timeout_ms: 5000,
};

export const DEFAULT_ACTIVITY_CONFIG: ActivityConfig = {
  window_seconds: 300,
  buffer_size: 100,
  debounce_ms: 1000,
  ignore: [],
};

export const DEFAULT_MAILBOX_CONFIG: MailboxConfig = {
  backend: 'file',
  retention_days: 30,
  max_messages: 500,
};

export const DEFAULT_SPAWN_CONFIG: SpawnConfig = {
  command: 'code',
  args: ['-n'],
};

export const DEFAULT_AUDIT_CONFIG: AuditConfig = {
  max_context_lines: 500,
};

export const DEFAULT_ERROR_REPORTING_CONFIG: ErrorReportingConfig = {
  enabled: true,
  level: 'warn',
  max_file_size_mb: 5,
};

export const DEFAULT_CONFIG: SwitchyardConfig = {
  daemon: DEFAULT_DAEMON_CONFIG,
  activity: DEFAULT_ACTIVITY_CONFIG,
  mailbox: DEFAULT_MAILBOX_CONFIG,
  spawn: DEFAULT_SPAWN_CONFIG,
  audit: DEFAULT_AUDIT_CONFIG,
  error_reporting: DEFAULT_ERROR_REPORTING_CONFIG,
};
