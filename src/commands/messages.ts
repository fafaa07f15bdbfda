/**
 * Mailbox CLI Commands
 *
 * - switchyard send <from> <to> <content>  - handoff through the policy check
 * - switchyard messages                    - list (unread by default)
 * - switchyard read <id>                   - print a message and mark it read
 */

import { NotFoundError, ValidationError } from '../lib/errors.js';
import { PRIORITIES, isPriority, type Message, type MessagePriority } from '../daemon/mailbox.js';
import { loadCliContext, printJson, reportError, withCoordinator } from './shared.js';

export interface SendCommandOptions {
  type?: string;
  priority?: string;
  subject?: string;
}

export interface MessagesCommandOptions {
  context?: string;
  all?: boolean;
  json?: boolean;
}

export const DEFAULT_MESSAGE_TYPE = 'info';

export function formatMessageLine(message: Message): string {
  const status = message.read_at === null ? '*' : ' ';
  return `${status} #${message.id} [${message.priority}] ${message.from} -> ${message.to} (${message.type}) ${message.subject}`;
}

export async function sendMessage(
  from: string,
  to: string,
  content: string,
  options: SendCommandOptions = {}
): Promise<void> {
  try {
    let priority: MessagePriority | undefined;
    if (options.priority !== undefined) {
      if (!isPriority(options.priority)) {
        throw new ValidationError(`Invalid priority "${options.priority}" (expected ${PRIORITIES.join(', ')})`, {
          priority: options.priority,
        });
      }
      priority = options.priority;
    }

    const ctx = loadCliContext();
    const result = await withCoordinator(ctx, (coordinator) =>
      coordinator.handoff(from, to, options.type ?? DEFAULT_MESSAGE_TYPE, content, {
        priority,
        subject: options.subject,
      })
    );

    if (!result.success) {
      reportError(result.error, 'messages-cmd');
      return;
    }
    console.log(`Sent message #${result.message.id}: ${from} -> ${to} (${result.message.type})`);
  } catch (err) {
    reportError(err, 'messages-cmd');
  }
}

export async function listMessages(options: MessagesCommandOptions = {}): Promise<void> {
  try {
    const ctx = loadCliContext();
    const unreadOnly = !options.all;

    const messages = await withCoordinator(ctx, async (coordinator, mailbox) => {
      if (options.context === undefined) return mailbox.list({ unreadOnly });
      const inbox = await coordinator.inbox(options.context, { unreadOnly });
      if (!inbox.success) throw inbox.error;
      return inbox.messages;
    });

    if (options.json) {
      printJson(messages);
      return;
    }

    if (messages.length === 0) {
      console.log(unreadOnly ? 'No unread messages' : 'No messages');
      return;
    }

    const scope = options.context ? ` for ${options.context}` : '';
    console.log(`=== ${messages.length} ${unreadOnly ? 'unread ' : ''}message(s)${scope} ===\n`);
    for (const message of messages) {
      console.log(formatMessageLine(message));
    }
  } catch (err) {
    reportError(err, 'messages-cmd');
  }
}

export async function readMessage(idArg: string): Promise<void> {
  try {
    const id = /^\d+$/.test(idArg) ? parseInt(idArg, 10) : NaN;
    if (Number.isNaN(id)) {
      throw new ValidationError(`Invalid message id "${idArg}"`, { id: idArg });
    }

    const ctx = loadCliContext();
    await withCoordinator(ctx, async (coordinator, mailbox) => {
      const message = await mailbox.get(id);
      if (!message) {
        throw new NotFoundError(`Message #${id} not found`, { id });
      }

      console.log(`#${message.id} [${message.priority}] ${message.from} -> ${message.to} (${message.type})`);
      console.log(`Subject: ${message.subject}`);
      console.log(`Sent:    ${message.created_at}`);
      console.log('');
      console.log(message.content);

      await coordinator.markRead(id);
    });
  } catch (err) {
    reportError(err, 'messages-cmd');
  }
}
