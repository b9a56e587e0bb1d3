/**
 * Notification Types
 *
 * @module notify/types
 */

/**
 * New rows appended per city, in run order.
 */
export type CityCounts = Readonly<Record<string, number>>;

export interface Notifier {
  send(recipients: readonly string[], counts: CityCounts, link: string): Promise<void>;
}

export interface EmailMessage {
  subject: string;
  bodyText: string;
  fromName?: string;
}

export class NotificationError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = 'NotificationError';
  }
}

export function isNotificationError(error: unknown): error is NotificationError {
  return error instanceof NotificationError;
}
