/**
 * Notification
 *
 * @module notify
 */

export {
  NotificationError,
  isNotificationError,
  type Notifier,
  type CityCounts,
  type EmailMessage,
} from './types.js';

export {
  loadTemplates,
  renderTemplate,
  formatCityLines,
  buildSummaryMessage,
  TemplatesSchema,
  DEFAULT_TEMPLATES_PATH,
  type Templates,
} from './templates.js';

export { SendGridNotifier, type SendGridNotifierOptions } from './sendgrid.js';
