import type { Logger } from 'pino';
import type { HandlerResult } from '../../application/action-registry.js';
import type { ActionsConfig } from './config.js';

export interface NotificationMessage {
  workflow_id: string;
  run_id: string;
  recipient?: string | undefined;
  subject?: string | undefined;
  message: string;
}

/**
 * Stub email channel: no SMTP integration, writes a structured log line.
 *
 * The action's recipient wins over the configured recipient list.
 */
export async function sendEmailNotification(
  config: ActionsConfig['email'],
  log: Logger,
  message: NotificationMessage,
): Promise<HandlerResult> {
  if (!config.enabled) {
    log.debug({ workflow_id: message.workflow_id }, 'Email notification skipped (disabled)');
    return { status: 'failure', error: 'Email channel is disabled' };
  }

  const recipients = message.recipient !== undefined && message.recipient !== ''
    ? [message.recipient]
    : config.recipients;

  if (recipients.length === 0) {
    return { status: 'failure', error: 'Email notification has no recipient' };
  }

  log.info(
    {
      recipients,
      smtp_host: config.smtp_host,
      subject: message.subject,
      message: message.message,
      workflow_id: message.workflow_id,
      run_id: message.run_id,
    },
    'Email notification (stub), SMTP not implemented',
  );

  return { status: 'success', output: { channel: 'email', recipients } };
}
