import { Result, ok, err } from '../types/result.js';
import { describeCause, type NotificationError } from '../types/notification-error.js';
import type { PluginConfig } from '../infrastructure/config/config-manager.js';
import type { ExecutionData } from './execution-data.js';
import {
  SLACK_INCOMING_MESSAGE_TEMPLATE,
  type AttachmentColor,
  type PresentationEntry,
  type Trigger,
} from './trigger.js';

export const FAILED_NODES_PLACEHOLDER = '- (Job itself failed)';

/**
 * Slack attachment field
 */
export interface SlackField {
  readonly title: string;
  readonly value: string;
  readonly short: boolean;
}

/**
 * Slack legacy message attachment
 */
export interface SlackAttachment {
  readonly fallback: string;
  readonly pretext: string;
  readonly color: AttachmentColor;
  readonly fields: readonly SlackField[];
}

/**
 * Incoming webhook payload
 */
export interface SlackPayload {
  readonly channel?: string;
  readonly username?: string;
  readonly icon_emoji?: string;
  readonly attachments: readonly SlackAttachment[];
}

/**
 * Everything a template sees when it renders
 */
export interface RenderContext {
  readonly trigger: Trigger;
  readonly presentation: PresentationEntry;
  readonly executionData: ExecutionData;
  readonly config: PluginConfig;
}

/**
 * Serialized payload text posted to the webhook
 */
export type RenderedMessage = string;

export type MessageTemplate = (context: RenderContext) => SlackPayload;

const STATE_LABELS: Readonly<Record<Trigger, string>> = {
  start: 'Started',
  success: 'Succeeded',
  failure: 'Failed',
};

function slackLink(href: string, text: string): string {
  return `<${href}|${text}>`;
}

function failedNodesValue(data: ExecutionData): string {
  if (data.failedNodeListString !== undefined) {
    return data.failedNodeListString;
  }
  if (data.failedNodeList && data.failedNodeList.length > 0) {
    return data.failedNodeList.join(', ');
  }
  return FAILED_NODES_PLACEHOLDER;
}

function buildIncomingMessage(context: RenderContext): SlackPayload {
  const { trigger, presentation, executionData, config } = context;
  const state = STATE_LABELS[trigger];
  const executionLink = slackLink(executionData.href, `#${executionData.id}`);
  const jobLink = slackLink(executionData.job.href, executionData.job.name);
  const summary = `${state}: ${executionLink} of job ${jobLink}`;

  const fields: SlackField[] = [
    { title: 'Job Name', value: jobLink, short: true },
    { title: 'Project', value: executionData.project, short: true },
    { title: 'Status', value: state, short: true },
    { title: 'Execution ID', value: executionLink, short: true },
  ];
  if (trigger === 'failure') {
    fields.push({ title: 'Failed Nodes', value: failedNodesValue(executionData), short: false });
  }

  return {
    // Overrides are only emitted when configured so the webhook defaults apply
    ...(config.channel ? { channel: config.channel } : {}),
    ...(config.username ? { username: config.username } : {}),
    ...(config.iconEmoji ? { icon_emoji: config.iconEmoji } : {}),
    attachments: [
      {
        fallback: summary,
        pretext: summary,
        color: presentation.color,
        fields,
      },
    ],
  };
}

export const DEFAULT_TEMPLATES: ReadonlyMap<string, MessageTemplate> = new Map([
  [SLACK_INCOMING_MESSAGE_TEMPLATE, buildIncomingMessage],
]);

/**
 * Render the webhook payload for one notification.
 *
 * A missing template or a template that throws fails the whole render;
 * no partial message is returned.
 */
export function renderMessage(
  context: RenderContext,
  templates: ReadonlyMap<string, MessageTemplate> = DEFAULT_TEMPLATES
): Result<RenderedMessage, NotificationError> {
  const template = templates.get(context.presentation.templateId);
  if (!template) {
    return err({
      type: 'RENDER_ERROR',
      message: `Error loading Slack notification message template: [template not found: ${context.presentation.templateId}].`,
    });
  }

  try {
    return ok(JSON.stringify(template(context)));
  } catch (error) {
    return err({
      type: 'RENDER_ERROR',
      message: `Error merging Slack notification message template: [${describeCause(error)}].`,
    });
  }
}
