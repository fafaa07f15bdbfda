import type { ContextRegistry } from '../lib/registry.js';
import type { MailboxConfig, StatePaths } from '../lib/config.js';
import { createFileMailbox, type Mailbox } from './mailbox.js';
import { createSqliteMailbox } from './mailbox-sqlite.js';

/** Open the mailbox backend named in config. */
export function openMailbox(
  registry: ContextRegistry,
  paths: StatePaths,
  config: MailboxConfig,
  now?: () => Date
): Mailbox {
  if (config.backend === 'sqlite') {
    return createSqliteMailbox({ registry, dbPath: paths.messagesDb, now });
  }
  return createFileMailbox({
    registry,
    filePath: paths.messagesFile,
    lockPath: paths.mailboxLock,
    now,
  });
}
