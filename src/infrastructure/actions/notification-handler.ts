import type { ResolvedActionSpec, ResolvedData } from '../../domain/index.js';
import type { ActionHandler, HandlerContext, HandlerResult } from '../../application/action-registry.js';
import type { ActionsConfig } from './config.js';
import type { NotificationMessage } from './email.js';
import { sendEmailNotification } from './email.js';
import { sendSlackNotification } from './slack.js';

function asText(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * `notification` action type.
 *
 * - channel: `spec.channel` (`log` when absent)
 * - recipient: `spec.target`
 * - body: `data.message` (required)
 * - subject: `data.subject`, else `spec.template`
 */
export class NotificationHandler implements ActionHandler {
  private readonly config: ActionsConfig;

  constructor(config: ActionsConfig) {
    this.config = config;
  }

  async handle(spec: ResolvedActionSpec, data: ResolvedData, ctx: HandlerContext): Promise<HandlerResult> {
    const text = asText(data['message']);
    if (text === undefined) {
      return { status: 'failure', error: 'Notification requires data.message' };
    }

    const message: NotificationMessage = {
      workflow_id: ctx.workflow_id,
      run_id: ctx.run_id,
      recipient: spec.target,
      subject: asText(data['subject']) ?? spec.template,
      message: text,
    };

    const channel = spec.channel === undefined || spec.channel === '' ? 'log' : spec.channel;

    switch (channel) {
      case 'log':
        ctx.log.info(
          { recipient: message.recipient, subject: message.subject, message: message.message },
          'Notification',
        );
        return { status: 'success', output: { channel: 'log', delivered: true } };
      case 'email':
        return sendEmailNotification(this.config.email, ctx.log, message);
      case 'slack':
        return sendSlackNotification(this.config.slack, ctx.log, message, ctx.signal);
      default:
        return { status: 'failure', error: `Unsupported notification channel "${channel}"` };
    }
  }
}
