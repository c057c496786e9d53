/**
 * Notification error types
 *
 * One variant per step of the notification pipeline. `message` is the
 * operator-facing diagnostic; the remaining fields carry the raw details.
 */
export type NotificationError =
  | { readonly type: 'UNKNOWN_TRIGGER'; readonly trigger: string; readonly message: string }
  | { readonly type: 'INVALID_CONFIG'; readonly missingFields: readonly string[]; readonly message: string }
  | { readonly type: 'RENDER_ERROR'; readonly message: string }
  | { readonly type: 'MALFORMED_URL'; readonly message: string }
  | { readonly type: 'CONNECTION_ERROR'; readonly message: string }
  | { readonly type: 'RESPONSE_READ_ERROR'; readonly message: string }
  | {
      readonly type: 'UNEXPECTED_RESPONSE';
      readonly responseBody: string;
      readonly payload: string;
      readonly message: string;
    };

export type NotificationErrorType = NotificationError['type'];

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

/**
 * Thrown at the host boundary. Hosts without a logger handle for plugins log
 * the exception message, so it carries the full diagnostic.
 */
export class NotificationPluginError extends Error {
  readonly type: NotificationErrorType;

  constructor(readonly error: NotificationError) {
    super(error.message);
    this.name = 'NotificationPluginError';
    this.type = error.type;
  }
}
