import { Result, ok, err } from '../types/result.js';
import type { NotificationError } from '../types/notification-error.js';

export const TRIGGERS = ['start', 'success', 'failure'] as const;

/**
 * Job lifecycle event that raised the notification
 */
export type Trigger = (typeof TRIGGERS)[number];

/**
 * Slack attachment color names
 */
export type AttachmentColor = 'good' | 'warning' | 'danger';

export const SLACK_INCOMING_MESSAGE_TEMPLATE = 'slack-incoming-message';

/**
 * Template and color used to present one trigger
 */
export interface PresentationEntry {
  readonly templateId: string;
  readonly color: AttachmentColor;
}

export interface ResolvedPresentation {
  readonly trigger: Trigger;
  readonly entry: PresentationEntry;
}

const PRESENTATION: ReadonlyMap<string, PresentationEntry> = new Map<string, PresentationEntry>([
  ['start', Object.freeze({ templateId: SLACK_INCOMING_MESSAGE_TEMPLATE, color: 'warning' })],
  ['success', Object.freeze({ templateId: SLACK_INCOMING_MESSAGE_TEMPLATE, color: 'good' })],
  ['failure', Object.freeze({ templateId: SLACK_INCOMING_MESSAGE_TEMPLATE, color: 'danger' })],
]);

export function isTrigger(value: string): value is Trigger {
  return TRIGGERS.some((trigger) => trigger === value);
}

/**
 * Resolve the presentation for a trigger name. Matching is case-exact and
 * there is no fallback entry.
 */
export function resolvePresentation(trigger: string): Result<ResolvedPresentation, NotificationError> {
  const entry = PRESENTATION.get(trigger);
  if (!isTrigger(trigger) || !entry) {
    return err({
      type: 'UNKNOWN_TRIGGER',
      trigger,
      message: `Unknown trigger type: [${trigger}].`,
    });
  }
  return ok({ trigger, entry });
}
