import { mapErr } from '../types/result.js';
import { NotificationPluginError, type NotificationError } from '../types/notification-error.js';
import { JobNotifier, type INotificationLoggerForNotifier } from '../application/job-notifier.js';
import { ConfigManager, type ConfigError } from '../infrastructure/config/config-manager.js';
import { WebhookDeliveryClient } from '../infrastructure/webhook/webhook-delivery-client.js';
import { AxiosWebhookTransport, type IWebhookTransport } from '../infrastructure/webhook/webhook-transport.js';
import { NotificationLogger, type LogLevel } from '../infrastructure/logger/notification-logger.js';
import { SLACK_NOTIFICATION_DESCRIPTOR, type PluginDescriptor } from './plugin-descriptor.js';

/**
 * Logger interface used by the plugin
 */
export interface IPluginLogger extends INotificationLoggerForNotifier {
  debug(message: string, details?: Record<string, unknown>): void;
}

/**
 * Plugin construction options. Everything is optional; the defaults post
 * through axios and log to stdout.
 */
export interface SlackNotificationPluginOptions {
  readonly transport?: IWebhookTransport;
  /** Request timeout in ms for the default axios transport */
  readonly timeout?: number;
  readonly logger?: IPluginLogger;
  readonly logLevel?: LogLevel;
  readonly logFilePath?: string;
  readonly configManager?: ConfigManager;
}

function toNotificationError(error: ConfigError): NotificationError {
  return {
    type: 'INVALID_CONFIG',
    missingFields: error.missingFields,
    message: `Slack notification plugin is missing required configuration: [${error.missingFields.join(', ')}].`,
  };
}

/**
 * Host-facing notification plugin.
 *
 * Resolves its configuration from the host's property map and reports
 * every failure by throwing, since the host only logs exception messages.
 */
export class SlackNotificationPlugin {
  static readonly descriptor: PluginDescriptor = SLACK_NOTIFICATION_DESCRIPTOR;

  private readonly notifier: JobNotifier;
  private readonly logger: IPluginLogger;
  private readonly configManager: ConfigManager;

  constructor(options: SlackNotificationPluginOptions = {}) {
    this.logger =
      options.logger ??
      new NotificationLogger({
        logLevel: options.logLevel ?? 'info',
        logFilePath: options.logFilePath,
      });
    this.configManager = options.configManager ?? new ConfigManager();

    const transport = options.transport ?? new AxiosWebhookTransport({ timeout: options.timeout });
    this.notifier = new JobNotifier(new WebhookDeliveryClient(transport), this.logger);
  }

  /**
   * Send one job notification.
   *
   * @param trigger - start, success or failure
   * @param executionData - host execution attributes
   * @param config - host plugin properties
   * @returns true once the webhook confirmed delivery
   * @throws NotificationPluginError on any failure
   */
  async postNotification(
    trigger: string,
    executionData: Readonly<Record<string, unknown>>,
    config: Readonly<Record<string, unknown>>
  ): Promise<boolean> {
    const configResult = mapErr(this.configManager.resolve(config), toNotificationError);
    if (!configResult.success) {
      this.logger.logNotificationError({
        trigger,
        duration: 0,
        error: { type: configResult.error.type, message: configResult.error.message },
      });
      throw new NotificationPluginError(configResult.error);
    }

    this.logger.debug('Resolved Slack notification config', {
      config: this.configManager.maskSensitiveData(configResult.value),
    });

    const result = await this.notifier.notify({
      trigger,
      executionData,
      config: configResult.value,
    });
    if (!result.success) {
      throw new NotificationPluginError(result.error);
    }
    return result.value;
  }
}
