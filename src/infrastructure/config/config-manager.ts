import { config as dotenvConfig } from 'dotenv';
import { Result, ok, err } from '../../types/result.js';

export const DEFAULT_WEBHOOK_BASE_URL = 'https://hooks.slack.com/services';

/**
 * Configuration error type
 */
export interface ConfigError {
  readonly type: 'MISSING_REQUIRED';
  readonly missingFields: readonly string[];
}

/**
 * Slack webhook configuration for one notification
 */
export interface PluginConfig {
  readonly webhookBaseUrl: string;
  readonly webhookToken: string;
  readonly channel?: string;
  readonly username?: string;
  readonly iconEmoji?: string;
}

/**
 * Partial configuration for validation
 */
export type PartialPluginConfig = Partial<PluginConfig>;

/**
 * Host property names, as registered in the plugin descriptor
 */
export const PROPERTY_KEYS = {
  webhookBaseUrl: 'webhook_base_url',
  webhookToken: 'webhook_token',
  channel: 'channel',
  username: 'username',
  iconEmoji: 'icon_emoji',
} as const;

/**
 * Configuration Manager
 * Builds PluginConfig from host properties, falling back to the environment
 * for the webhook fields and to defaults after that
 */
export class ConfigManager {
  private readonly envVars = {
    webhookBaseUrl: 'SLACK_WEBHOOK_BASE_URL',
    webhookToken: 'SLACK_WEBHOOK_TOKEN',
  } as const;

  constructor() {
    // Load .env file
    dotenvConfig();
  }

  /**
   * Resolve configuration from host properties, then .env/process.env
   */
  resolve(properties: Readonly<Record<string, unknown>>): Result<PluginConfig, ConfigError> {
    return this.validate({
      webhookBaseUrl:
        this.readProperty(properties, PROPERTY_KEYS.webhookBaseUrl) ||
        process.env[this.envVars.webhookBaseUrl],
      webhookToken:
        this.readProperty(properties, PROPERTY_KEYS.webhookToken) ||
        process.env[this.envVars.webhookToken],
      channel: this.readProperty(properties, PROPERTY_KEYS.channel),
      username: this.readProperty(properties, PROPERTY_KEYS.username),
      iconEmoji: this.readProperty(properties, PROPERTY_KEYS.iconEmoji),
    });
  }

  /**
   * Validate a partial configuration
   */
  validate(partialConfig: PartialPluginConfig): Result<PluginConfig, ConfigError> {
    const webhookToken = partialConfig.webhookToken?.trim();
    if (!webhookToken) {
      return err({
        type: 'MISSING_REQUIRED',
        missingFields: [PROPERTY_KEYS.webhookToken],
      });
    }

    return ok({
      webhookBaseUrl: partialConfig.webhookBaseUrl?.trim() || DEFAULT_WEBHOOK_BASE_URL,
      webhookToken,
      channel: partialConfig.channel || undefined,
      username: partialConfig.username || undefined,
      iconEmoji: partialConfig.iconEmoji || undefined,
    });
  }

  /**
   * Mask sensitive data in config for safe logging
   */
  maskSensitiveData(config: PluginConfig): PluginConfig {
    return {
      ...config,
      webhookToken: this.maskToken(config.webhookToken),
    };
  }

  private maskToken(token: string): string {
    if (token.length <= 6) {
      return '***';
    }
    // Keep the team segment (T...) visible, it identifies the workspace
    const teamSegment = token.split('/')[0];
    const prefixLength = teamSegment.length < token.length ? Math.min(teamSegment.length, 12) : 3;
    return token.substring(0, prefixLength) + '***';
  }

  private readProperty(properties: Readonly<Record<string, unknown>>, key: string): string | undefined {
    const value = properties[key];
    if (typeof value !== 'string') {
      return undefined;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
}
