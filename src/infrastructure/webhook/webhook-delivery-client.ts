import { Result, ok, err } from '../../types/result.js';
import { describeCause, type NotificationError } from '../../types/notification-error.js';
import type { PluginConfig } from '../config/config-manager.js';
import type { RenderedMessage } from '../../domain/message-renderer.js';
import {
  AxiosWebhookTransport,
  type IWebhookTransport,
  type WebhookConnection,
} from './webhook-transport.js';

export const SLACK_SUCCESS_RESPONSE = 'ok';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded; charset=utf-8';

/**
 * Encode the rendered message as the `payload` form field
 */
export function encodeFormBody(message: RenderedMessage): string {
  return new URLSearchParams({ payload: message }).toString();
}

/**
 * Build the webhook URL from `<base>/<token>`
 */
export function buildWebhookUrl(config: PluginConfig): Result<URL, NotificationError> {
  const raw = `${config.webhookBaseUrl}/${config.webhookToken}`;
  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    return err({
      type: 'MALFORMED_URL',
      message: `Slack API URL is malformed: [${describeCause(error)}].`,
    });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return err({
      type: 'MALFORMED_URL',
      message: `Slack API URL is malformed: [unsupported protocol ${url.protocol}].`,
    });
  }

  return ok(url);
}

/**
 * Decide the outcome from the remote response body alone.
 * Only the literal `ok` counts as delivered; the HTTP status is ignored.
 */
export function interpretResponse(responseBody: string, formBody: string): Result<true, NotificationError> {
  if (responseBody === SLACK_SUCCESS_RESPONSE) {
    return ok(true);
  }
  return err({
    type: 'UNEXPECTED_RESPONSE',
    responseBody,
    payload: formBody,
    message: `Unknown status returned from Slack API: [${responseBody}].\n${formBody}`,
  });
}

/**
 * Posts rendered messages to a Slack incoming webhook
 */
export class WebhookDeliveryClient {
  constructor(private readonly transport: IWebhookTransport = new AxiosWebhookTransport()) {}

  /**
   * Deliver one message. The response connection is closed on every path
   * once it has been opened.
   */
  async deliver(config: PluginConfig, message: RenderedMessage): Promise<Result<true, NotificationError>> {
    const urlResult = buildWebhookUrl(config);
    if (!urlResult.success) {
      return urlResult;
    }

    const formBody = encodeFormBody(message);

    let connection: WebhookConnection;
    try {
      connection = await this.transport.open({
        url: urlResult.value.toString(),
        body: formBody,
        headers: { 'Content-Type': FORM_CONTENT_TYPE },
      });
    } catch (error) {
      return err({
        type: 'CONNECTION_ERROR',
        message: `Error putting data to Slack URL: [${describeCause(error)}].`,
      });
    }

    try {
      const responseBody = await connection.readBody();
      return interpretResponse(responseBody, formBody);
    } catch (error) {
      return err({
        type: 'RESPONSE_READ_ERROR',
        message: `Error reading Slack API response: [${describeCause(error)}].`,
      });
    } finally {
      connection.close();
    }
  }
}
