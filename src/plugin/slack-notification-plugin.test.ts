import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SlackNotificationPlugin, type IPluginLogger } from './slack-notification-plugin.js';
import { SLACK_NOTIFICATION_DESCRIPTOR } from './plugin-descriptor.js';
import { NotificationPluginError } from '../types/notification-error.js';
import type { IWebhookTransport, WebhookRequest } from '../infrastructure/webhook/webhook-transport.js';
import type { SlackPayload } from '../domain/message-renderer.js';

/**
 * In-process webhook endpoint that answers every POST with a fixed body
 */
class FakeWebhook implements IWebhookTransport {
  readonly requests: WebhookRequest[] = [];
  closed = 0;

  constructor(private readonly responseBody: string) {}

  async open(request: WebhookRequest) {
    this.requests.push(request);
    return {
      readBody: async () => this.responseBody,
      close: () => {
        this.closed += 1;
      },
    };
  }

  postedPayload(index = 0): SlackPayload {
    const form = new URLSearchParams(this.requests[index].body);
    const payload: SlackPayload = JSON.parse(form.get('payload') ?? '');
    return payload;
  }
}

describe('SlackNotificationPlugin', () => {
  const originalEnv = process.env;
  let logger: IPluginLogger;

  const executionData = {
    id: 42,
    href: 'http://host/exec/42',
    project: 'infra',
    job: { name: 'Deploy', href: 'http://host/job/1' },
  };

  const config = {
    webhook_base_url: 'https://hooks.slack.com/services',
    webhook_token: 'T0/B0/X0',
  };

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.SLACK_WEBHOOK_BASE_URL;
    delete process.env.SLACK_WEBHOOK_TOKEN;
    logger = {
      logNotificationStart: vi.fn(),
      logNotificationSuccess: vi.fn(),
      logNotificationError: vi.fn(),
      debug: vi.fn(),
    };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should post a start notification to the webhook', async () => {
    const webhook = new FakeWebhook('ok');
    const plugin = new SlackNotificationPlugin({ transport: webhook, logger });

    const delivered = await plugin.postNotification('start', executionData, config);

    expect(delivered).toBe(true);
    expect(webhook.requests).toHaveLength(1);
    expect(webhook.requests[0].url).toBe('https://hooks.slack.com/services/T0/B0/X0');
    expect(webhook.requests[0].headers).toEqual({
      'Content-Type': 'application/x-www-form-urlencoded; charset=utf-8',
    });
    const attachment = webhook.postedPayload().attachments[0];
    expect(attachment.color).toBe('warning');
    expect(attachment.fields.find((field) => field.title === 'Status')?.value).toBe('Started');
    expect(webhook.closed).toBe(1);
  });

  it('should report failed nodes on a failure notification', async () => {
    const webhook = new FakeWebhook('ok');
    const plugin = new SlackNotificationPlugin({ transport: webhook, logger });

    const delivered = await plugin.postNotification(
      'failure',
      { ...executionData, failedNodeListString: 'node-a, node-b' },
      config
    );

    expect(delivered).toBe(true);
    const attachment = webhook.postedPayload().attachments[0];
    expect(attachment.color).toBe('danger');
    expect(attachment.fields[4]).toEqual({
      title: 'Failed Nodes',
      value: 'node-a, node-b',
      short: false,
    });
  });

  it('should throw with the response body and payload when Slack does not answer ok', async () => {
    const webhook = new FakeWebhook('invalid_token');
    const plugin = new SlackNotificationPlugin({ transport: webhook, logger });

    const error = await plugin.postNotification('success', executionData, config).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotificationPluginError);
    if (error instanceof NotificationPluginError) {
      expect(error.type).toBe('UNEXPECTED_RESPONSE');
      expect(error.message).toBe(
        `Unknown status returned from Slack API: [invalid_token].\n${webhook.requests[0].body}`
      );
    }
    expect(webhook.closed).toBe(1);
  });

  it('should throw for an unknown trigger without posting', async () => {
    const webhook = new FakeWebhook('ok');
    const plugin = new SlackNotificationPlugin({ transport: webhook, logger });

    await expect(plugin.postNotification('avgduration', executionData, config)).rejects.toThrow(
      'Unknown trigger type: [avgduration].'
    );
    expect(webhook.requests).toHaveLength(0);
  });

  it('should throw when the webhook token is not configured', async () => {
    const webhook = new FakeWebhook('ok');
    const plugin = new SlackNotificationPlugin({ transport: webhook, logger });

    const error = await plugin
      .postNotification('start', executionData, { webhook_base_url: 'https://hooks.slack.com/services' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotificationPluginError);
    if (error instanceof NotificationPluginError) {
      expect(error.error).toEqual({
        type: 'INVALID_CONFIG',
        missingFields: ['webhook_token'],
        message: 'Slack notification plugin is missing required configuration: [webhook_token].',
      });
    }
    expect(logger.logNotificationError).toHaveBeenCalledTimes(1);
    expect(webhook.requests).toHaveLength(0);
  });

  it('should log the resolved config with the token masked', async () => {
    const webhook = new FakeWebhook('ok');
    const plugin = new SlackNotificationPlugin({ transport: webhook, logger });

    await plugin.postNotification('success', executionData, config);

    expect(logger.debug).toHaveBeenCalledWith('Resolved Slack notification config', {
      config: {
        webhookBaseUrl: 'https://hooks.slack.com/services',
        webhookToken: 'T0***',
        channel: undefined,
        username: undefined,
        iconEmoji: undefined,
      },
    });
  });

  it('should describe every property it resolves', () => {
    expect(SlackNotificationPlugin.descriptor).toBe(SLACK_NOTIFICATION_DESCRIPTOR);
    expect(SLACK_NOTIFICATION_DESCRIPTOR.properties.map((property) => property.name)).toEqual([
      'webhook_base_url',
      'webhook_token',
      'channel',
      'username',
      'icon_emoji',
    ]);
    const token = SLACK_NOTIFICATION_DESCRIPTOR.properties.find((property) => property.name === 'webhook_token');
    expect(token?.required).toBe(true);
    expect(token?.secret).toBe(true);
  });
});
