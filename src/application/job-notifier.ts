import { Result, andThen } from '../types/result.js';
import type { NotificationError } from '../types/notification-error.js';
import { resolvePresentation } from '../domain/trigger.js';
import { parseExecutionData, type ExecutionData } from '../domain/execution-data.js';
import { renderMessage, type RenderedMessage } from '../domain/message-renderer.js';
import type { PluginConfig } from '../infrastructure/config/config-manager.js';
import type {
  NotificationLogContext,
  NotificationSuccessResult,
  NotificationErrorResult,
} from '../infrastructure/logger/notification-logger.js';

// --- Interfaces for dependency injection ---

/**
 * Logger interface used by JobNotifier
 */
export interface INotificationLoggerForNotifier {
  logNotificationStart(context: NotificationLogContext): void;
  logNotificationSuccess(result: NotificationSuccessResult): void;
  logNotificationError(result: NotificationErrorResult): void;
}

/**
 * Delivery client interface used by JobNotifier
 */
export interface IDeliveryClient {
  deliver(config: PluginConfig, message: RenderedMessage): Promise<Result<true, NotificationError>>;
}

/**
 * One job lifecycle notification
 */
export interface NotificationRequest {
  readonly trigger: string;
  readonly executionData: Readonly<Record<string, unknown>>;
  readonly config: PluginConfig;
}

/**
 * JobNotifier - renders and delivers one job lifecycle notification
 *
 * Steps run in order and the first failure ends the notification:
 * 1. Resolve the trigger's presentation (color, template)
 * 2. Render the payload from the execution data
 * 3. POST it to the webhook
 * 4. Interpret the response body
 *
 * No state is kept between calls.
 */
export class JobNotifier {
  constructor(
    private readonly deliveryClient: IDeliveryClient,
    private readonly logger: INotificationLoggerForNotifier
  ) {}

  async notify(request: NotificationRequest): Promise<Result<true, NotificationError>> {
    const startTime = Date.now();

    const presentation = resolvePresentation(request.trigger);
    const executionData = parseExecutionData(request.executionData);
    const context = this.buildLogContext(
      request.trigger,
      executionData.success ? executionData.value : undefined
    );

    this.logger.logNotificationStart(context);

    const rendered = andThen(presentation, ({ trigger, entry }) =>
      andThen(executionData, (data) =>
        renderMessage({
          trigger,
          presentation: entry,
          executionData: data,
          config: request.config,
        })
      )
    );

    const result = rendered.success
      ? await this.deliveryClient.deliver(request.config, rendered.value)
      : rendered;

    const duration = Date.now() - startTime;
    if (result.success) {
      this.logger.logNotificationSuccess({ ...context, duration });
    } else {
      this.logger.logNotificationError({
        ...context,
        duration,
        error: { type: result.error.type, message: result.error.message },
      });
    }

    return result;
  }

  private buildLogContext(trigger: string, data: ExecutionData | undefined): NotificationLogContext {
    return {
      trigger,
      executionId: data?.id,
      project: data?.project,
      jobName: data?.job.name,
    };
  }
}
