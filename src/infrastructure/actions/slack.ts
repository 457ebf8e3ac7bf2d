import type { Logger } from 'pino';
import type { HandlerResult } from '../../application/action-registry.js';
import type { ActionsConfig } from './config.js';
import type { NotificationMessage } from './email.js';

/**
 * Posts a notification to the configured Slack webhook.
 *
 * A disabled channel, a missing webhook URL, a non-OK response or a
 * network error all come back as a failure result.
 */
export async function sendSlackNotification(
  config: ActionsConfig['slack'],
  log: Logger,
  message: NotificationMessage,
  signal?: AbortSignal,
): Promise<HandlerResult> {
  if (!config.enabled) {
    log.debug({ workflow_id: message.workflow_id }, 'Slack notification skipped (disabled)');
    return { status: 'failure', error: 'Slack channel is disabled' };
  }

  if (!config.webhook_url) {
    log.warn('Slack enabled but webhook_url is empty, skipping');
    return { status: 'failure', error: 'Slack webhook_url is not configured' };
  }

  const text = message.subject !== undefined
    ? `*${message.subject}*\n${message.message}`
    : message.message;

  try {
    const response = await fetch(config.webhook_url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text }),
      signal,
    });

    if (!response.ok) {
      log.warn({ status: response.status, workflow_id: message.workflow_id }, 'Slack webhook returned non-OK status');
      return { status: 'failure', error: `Slack webhook returned ${response.status}` };
    }

    log.info({ workflow_id: message.workflow_id, run_id: message.run_id }, 'Slack notification sent');
    return { status: 'success', output: { channel: 'slack', status: response.status } };
  } catch (err: unknown) {
    log.warn({ err, workflow_id: message.workflow_id }, 'Failed to send Slack notification');
    return {
      status: 'failure',
      error: `Slack request failed: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}
