export {
  SlackNotificationPlugin,
  type SlackNotificationPluginOptions,
  type IPluginLogger,
} from './plugin/slack-notification-plugin.js';
export {
  SLACK_NOTIFICATION_DESCRIPTOR,
  type PluginDescriptor,
  type PluginPropertyDescriptor,
} from './plugin/plugin-descriptor.js';
export {
  JobNotifier,
  type NotificationRequest,
  type IDeliveryClient,
  type INotificationLoggerForNotifier,
} from './application/job-notifier.js';
export {
  TRIGGERS,
  isTrigger,
  resolvePresentation,
  type Trigger,
  type AttachmentColor,
  type PresentationEntry,
  type ResolvedPresentation,
} from './domain/trigger.js';
export { parseExecutionData, type ExecutionData, type JobInfo } from './domain/execution-data.js';
export {
  renderMessage,
  DEFAULT_TEMPLATES,
  FAILED_NODES_PLACEHOLDER,
  type MessageTemplate,
  type RenderContext,
  type RenderedMessage,
  type SlackPayload,
  type SlackAttachment,
  type SlackField,
} from './domain/message-renderer.js';
export {
  WebhookDeliveryClient,
  buildWebhookUrl,
  encodeFormBody,
  interpretResponse,
} from './infrastructure/webhook/webhook-delivery-client.js';
export {
  AxiosWebhookTransport,
  type IWebhookTransport,
  type WebhookConnection,
  type WebhookRequest,
} from './infrastructure/webhook/webhook-transport.js';
export {
  ConfigManager,
  DEFAULT_WEBHOOK_BASE_URL,
  type PluginConfig,
  type ConfigError,
} from './infrastructure/config/config-manager.js';
export { NotificationLogger, type LogLevel } from './infrastructure/logger/notification-logger.js';
export { NotificationPluginError, type NotificationError } from './types/notification-error.js';
export type { Result } from './types/result.js';
