/**
 * SendGrid Notifier
 *
 * Sends the weekly summary through the SendGrid v3 `mail/send` endpoint. All
 * recipients share one personalization (one `to` list).
 *
 * @module notify/sendgrid
 */

import type { Logger } from '../pipeline/types.js';
import { buildSummaryMessage, type Templates } from './templates.js';
import { NotificationError, type CityCounts, type EmailMessage, type Notifier } from './types.js';

export interface SendGridNotifierOptions {
  apiKey: string;
  fromEmail: string;
  templates: Templates;
  /** Override the API endpoint */
  endpoint?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

const DEFAULTS = {
  endpoint: 'https://api.sendgrid.com/v3/mail/send',
  timeoutMs: 30000,
} as const;

/** Statuses SendGrid uses for an accepted message */
const ACCEPTED_STATUSES = new Set([200, 202]);

export class SendGridNotifier implements Notifier {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: SendGridNotifierOptions) {
    this.endpoint = options.endpoint ?? DEFAULTS.endpoint;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(recipients: readonly string[], counts: CityCounts, link: string): Promise<void> {
    const message = buildSummaryMessage(counts, link, this.options.templates, this.options.logger);
    await this.sendMessage(recipients, message);
    this.options.logger?.info(`[Email] Sent summary to ${recipients.length} recipient(s)`);
  }

  /**
   * Send a plain-text message.
   *
   * @throws NotificationError on missing settings or a rejected request
   */
  async sendMessage(recipients: readonly string[], message: EmailMessage): Promise<void> {
    if (!this.options.apiKey) {
      throw new NotificationError('SENDGRID_API_KEY is required');
    }
    if (!this.options.fromEmail) {
      throw new NotificationError('FROM_EMAIL is required');
    }
    if (recipients.length === 0) {
      throw new NotificationError('At least one recipient is required');
    }

    const from: { email: string; name?: string } = { email: this.options.fromEmail };
    if (message.fromName) {
      from.name = message.fromName;
    }

    const body = {
      personalizations: [
        {
          to: recipients.map((email) => ({ email })),
          subject: message.subject,
        },
      ],
      from,
      content: [{ type: 'text/plain', value: message.bodyText }],
    };

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new NotificationError(`[Email] SendGrid request failed: ${reason}`);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!ACCEPTED_STATUSES.has(response.status)) {
      const text = await response.text();
      let detail: unknown;
      try {
        detail = JSON.parse(text);
      } catch {
        detail = { non_json: text };
      }
      throw new NotificationError(
        `[Email] SendGrid error ${response.status}: ${JSON.stringify(detail)}`,
        response.status,
        detail
      );
    }
  }
}
