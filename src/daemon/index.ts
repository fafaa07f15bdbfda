/**
 * Daemon Module Exports
 *
 * Library surface for embedding switchyard:
 * - Context registry and handoff policy
 * - Mailbox and session log (file or SQLite backend)
 * - Activity tracking and the file watcher
 * - Daemon lifecycle, runtime and control
 */

export { createRegistry, loadRegistry, BROADCAST, WILDCARD, type ContextRegistry, type ContextDefinition, type HandoffRule } from '../lib/registry.js';
export { checkHandoff } from './handoff.js';
export {
  createFileMailbox,
  PRIORITIES,
  type Mailbox,
  type Message,
  type MessagePriority,
  type SendRequest,
  type SendResult,
} from './mailbox.js';
export { createSqliteMailbox } from './mailbox-sqlite.js';
export { openMailbox } from './mailbox-backend.js';
export {
  createFileSessionLog,
  createSqliteSessionLog,
  openSessionLog,
  type Session,
  type SessionLog,
  type SessionStatus,
} from './session-log.js';
export { updateContextFile, replaceSection, type ContextFileUpdate } from '../lib/context-file.js';
export { createActivityTracker, type ActivityTracker, type ActivityEvent, type ContextActivity } from './activity.js';
export { createFileActivityWatcher, type FileActivityWatcher, type WatchBackend } from './watcher.js';
export { DaemonLifecycle, type LifecycleHooks, type PeriodicTask, type StartResult } from './lifecycle.js';
export { createDaemonRuntime, type DaemonRuntime, type DaemonRuntimeOptions } from './service.js';
export { getDaemonStatus, stopDaemon, restartDaemon, type DaemonStatusReport, type StopOutcome } from './control.js';
export {
  createSessionCoordinator,
  statusActivitySource,
  type SessionCoordinator,
  type SpawnResult,
  type InboxResult,
} from './coordinator.js';
export { runAudit, type AuditReport, type HealthScorer } from '../lib/audit.js';
export * from '../lib/errors.js';
