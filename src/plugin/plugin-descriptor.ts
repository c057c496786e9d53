import { DEFAULT_WEBHOOK_BASE_URL, PROPERTY_KEYS } from '../infrastructure/config/config-manager.js';

/**
 * Configuration property shown by the host
 */
export interface PluginPropertyDescriptor {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly required: boolean;
  readonly defaultValue?: string;
  /** Rendered as a password input and never echoed back */
  readonly secret?: boolean;
}

/**
 * Registration metadata the host reads to list and configure the plugin
 */
export interface PluginDescriptor {
  readonly service: 'Notification';
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly properties: readonly PluginPropertyDescriptor[];
}

export const SLACK_NOTIFICATION_DESCRIPTOR: PluginDescriptor = {
  service: 'Notification',
  name: 'SlackNotification',
  title: 'Slack Incoming WebHook',
  description: 'Sends job notifications to Slack',
  properties: [
    {
      name: PROPERTY_KEYS.webhookBaseUrl,
      title: 'WebHook Base URL',
      description: 'Slack Incoming WebHook Base URL',
      required: true,
      defaultValue: DEFAULT_WEBHOOK_BASE_URL,
    },
    {
      name: PROPERTY_KEYS.webhookToken,
      title: 'WebHook Token',
      description: 'WebHook Token, like T00000000/B00000000/XXXXXXXXXXXXXXXXXXXXXXXX',
      required: true,
      secret: true,
    },
    {
      name: PROPERTY_KEYS.channel,
      title: 'Channel',
      description: 'Overrides the channel the webhook posts to, like #deployments',
      required: false,
    },
    {
      name: PROPERTY_KEYS.username,
      title: 'Username',
      description: 'Overrides the name the message is posted as',
      required: false,
    },
    {
      name: PROPERTY_KEYS.iconEmoji,
      title: 'Icon Emoji',
      description: 'Overrides the message icon, like :rocket:',
      required: false,
    },
  ],
};
