import { describe, it, expect, vi, afterEach } from 'vitest';
import { NotificationHandler } from '../../src/infrastructure/actions/notification-handler.js';
import type { ActionsConfig } from '../../src/infrastructure/actions/config.js';
import type { HandlerContext } from '../../src/application/action-registry.js';
import type { ResolvedActionSpec } from '../../src/domain/index.js';
import { fakeLogger, makeEvent } from '../helpers.js';

const WEBHOOK = 'https://hooks.example.test/services/test';

function config(overrides: Partial<ActionsConfig> = {}): ActionsConfig {
  return {
    slack: { enabled: true, webhook_url: WEBHOOK },
    email: { enabled: true, smtp_host: 'localhost', recipients: ['ops@example.com'] },
    services: {},
    ...overrides,
  };
}

function context(): HandlerContext {
  return {
    workflow_id: 'wf',
    run_id: 'run-1',
    event: makeEvent(),
    signal: new AbortController().signal,
    log: fakeLogger(),
  };
}

function spec(overrides: Partial<ResolvedActionSpec> = {}): ResolvedActionSpec {
  return { id: 'notify', type: 'notification', ...overrides };
}

describe('NotificationHandler', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requires a message', async () => {
    const result = await new NotificationHandler(config()).handle(spec(), {}, context());
    expect(result).toEqual({ status: 'failure', error: 'Notification requires data.message' });
  });

  it('logs to the log channel by default', async () => {
    const ctx = context();
    const result = await new NotificationHandler(config()).handle(
      spec({ target: 'admin', template: 'fallback_subject' }),
      { message: 'hello' },
      ctx,
    );

    expect(result).toEqual({ status: 'success', output: { channel: 'log', delivered: true } });
    expect(ctx.log.info).toHaveBeenCalledWith(
      { recipient: 'admin', subject: 'fallback_subject', message: 'hello' },
      'Notification',
    );
  });

  it('serializes non-string messages', async () => {
    const ctx = context();
    await new NotificationHandler(config()).handle(spec(), { message: { amount: 5 } }, ctx);

    expect(ctx.log.info).toHaveBeenCalledWith(
      { recipient: undefined, subject: undefined, message: '{"amount":5}' },
      'Notification',
    );
  });

  it('sends email to the action target over the configured list', async () => {
    const result = await new NotificationHandler(config()).handle(
      spec({ channel: 'email', target: 'admin@example.com' }),
      { message: 'hi', subject: 'Subject' },
      context(),
    );

    expect(result).toEqual({ status: 'success', output: { channel: 'email', recipients: ['admin@example.com'] } });
  });

  it('falls back to configured email recipients', async () => {
    const result = await new NotificationHandler(config()).handle(
      spec({ channel: 'email' }),
      { message: 'hi' },
      context(),
    );

    expect(result).toEqual({ status: 'success', output: { channel: 'email', recipients: ['ops@example.com'] } });
  });

  it('fails email when disabled or without recipients', async () => {
    const disabled = new NotificationHandler(config({
      email: { enabled: false, smtp_host: '', recipients: [] },
    }));
    const empty = new NotificationHandler(config({
      email: { enabled: true, smtp_host: '', recipients: [] },
    }));

    expect(await disabled.handle(spec({ channel: 'email' }), { message: 'x' }, context()))
      .toEqual({ status: 'failure', error: 'Email channel is disabled' });
    expect(await empty.handle(spec({ channel: 'email' }), { message: 'x' }, context()))
      .toEqual({ status: 'failure', error: 'Email notification has no recipient' });
  });

  it('posts to the Slack webhook', async () => {
    const fetchMock = vi.fn().mockResolvedValue({ ok: true, status: 200 });
    vi.stubGlobal('fetch', fetchMock);

    const result = await new NotificationHandler(config()).handle(
      spec({ channel: 'slack' }),
      { message: 'Transfer done', subject: 'Funds' },
      context(),
    );

    expect(result).toEqual({ status: 'success', output: { channel: 'slack', status: 200 } });
    expect(fetchMock).toHaveBeenCalledWith(WEBHOOK, expect.objectContaining({
      method: 'POST',
      body: JSON.stringify({ text: '*Funds*\nTransfer done' }),
    }));
  });

  it('reports a non-OK Slack response', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: false, status: 500 }));

    const result = await new NotificationHandler(config()).handle(spec({ channel: 'slack' }), { message: 'x' }, context());
    expect(result).toEqual({ status: 'failure', error: 'Slack webhook returned 500' });
  });

  it('reports a Slack network error', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('ECONNREFUSED')));

    const result = await new NotificationHandler(config()).handle(spec({ channel: 'slack' }), { message: 'x' }, context());
    expect(result).toEqual({ status: 'failure', error: 'Slack request failed: ECONNREFUSED' });
  });

  it('skips Slack without a webhook URL', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const handler = new NotificationHandler(config({ slack: { enabled: true, webhook_url: '' } }));

    const result = await handler.handle(spec({ channel: 'slack' }), { message: 'x' }, context());

    expect(result).toEqual({ status: 'failure', error: 'Slack webhook_url is not configured' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects an unknown channel', async () => {
    const result = await new NotificationHandler(config()).handle(spec({ channel: 'pager' }), { message: 'x' }, context());
    expect(result).toEqual({ status: 'failure', error: 'Unsupported notification channel "pager"' });
  });
});
