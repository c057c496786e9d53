import pino, { type Logger } from 'pino';
import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Notification being logged
 */
export interface NotificationLogContext {
  readonly trigger: string;
  readonly executionId?: string;
  readonly project?: string;
  readonly jobName?: string;
}

/**
 * Delivered notification
 */
export interface NotificationSuccessResult extends NotificationLogContext {
  readonly duration: number;
}

/**
 * Failed notification
 */
export interface NotificationErrorResult extends NotificationLogContext {
  readonly duration: number;
  readonly error: {
    readonly type: string;
    readonly message: string;
  };
}

/**
 * Logger configuration options. Logs go to stdout unless a file is given.
 */
export interface NotificationLoggerOptions {
  readonly logFilePath?: string;
  readonly logLevel: LogLevel;
}

/**
 * Notification logger implementation using pino
 */
export class NotificationLogger {
  private readonly logger: Logger;

  // Patterns to mask in log output
  private readonly sensitivePatterns: RegExp[] = [
    /hooks\.slack\.com\/services\/[A-Za-z0-9/]+/g, // Full incoming webhook URL
    /T[A-Z0-9]+\/B[A-Z0-9]+\/[A-Za-z0-9]+/g, // Incoming webhook token
    /xox[abpr]-[A-Za-z0-9-]{10,}/g, // Slack API token
  ];

  constructor(options: NotificationLoggerOptions) {
    if (options.logFilePath) {
      const logDir = path.dirname(options.logFilePath);
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
    }

    this.logger = pino(
      {
        level: options.logLevel,
        formatters: {
          level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({
        dest: options.logFilePath ?? 1,
        sync: true,
      })
    );
  }

  /**
   * Log notification start
   */
  logNotificationStart(context: NotificationLogContext): void {
    this.logger.info({
      event: 'start',
      ...this.contextFields(context),
    });
  }

  /**
   * Log delivered notification
   */
  logNotificationSuccess(result: NotificationSuccessResult): void {
    this.logger.info({
      event: 'success',
      ...this.contextFields(result),
      duration: result.duration,
    });
  }

  /**
   * Log failed notification
   */
  logNotificationError(result: NotificationErrorResult): void {
    this.logger.error({
      event: 'error',
      ...this.contextFields(result),
      duration: result.duration,
      errorType: result.error.type,
      errorMessage: this.maskSensitiveData(result.error.message),
    });
  }

  /**
   * Log debug message
   */
  debug(message: string, details?: Record<string, unknown>): void {
    this.logger.debug({ ...details }, this.maskSensitiveData(message));
  }

  private contextFields(context: NotificationLogContext): Record<string, string | undefined> {
    return {
      trigger: context.trigger,
      executionId: context.executionId,
      project: context.project,
      jobName: context.jobName,
    };
  }

  /**
   * Mask sensitive data in strings
   */
  private maskSensitiveData(text: string): string {
    let masked = text;
    for (const pattern of this.sensitivePatterns) {
      masked = masked.replace(pattern, (match) => {
        if (match.length <= 8) {
          return '***';
        }
        return match.substring(0, 4) + '***';
      });
    }
    return masked;
  }
}
