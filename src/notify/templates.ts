/**
 * Email Templates
 *
 * Templates live in `templates/email.json` at the project root. Placeholders use
 * `{name}` syntax; the summary template knows `city_lines`, `total_new` and
 * `sheet_link`.
 *
 * @module notify/templates
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { Logger } from '../pipeline/types.js';
import type { CityCounts, EmailMessage } from './types.js';

export const DEFAULT_TEMPLATES_PATH = path.resolve(__dirname, '..', '..', 'templates', 'email.json');

const DEFAULT_BODY =
  "Hey team,\n\nHere's how many new businesses we've found in each city:\n\n{city_lines}\n\n" +
  'Check out the details in this sheet: {sheet_link}\n';

export const TemplatesSchema = z.object({
  email: z
    .object({
      subject: z.string().default('New suspended businesses this week'),
      from_name: z.string().optional(),
      body_text: z.string().default(DEFAULT_BODY),
    })
    .default({}),
});

export type Templates = z.infer<typeof TemplatesSchema>;

/**
 * Read templates from disk. Unreadable or invalid files fall back to the
 * built-in template with a warning.
 */
export async function loadTemplates(
  filePath: string = DEFAULT_TEMPLATES_PATH,
  logger?: Logger
): Promise<Templates> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return TemplatesSchema.parse(JSON.parse(content));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger?.warn(`[Email][Templates] Failed to load ${filePath}: ${message}`);
    return TemplatesSchema.parse({});
  }
}

/**
 * Substitute `{name}` placeholders. If the template names a placeholder that
 * has no value, it is returned unrendered.
 *
 * @example
 * ```typescript
 * renderTemplate('{a} and {b}', { a: '1', b: '2' }); // '1 and 2'
 * renderTemplate('{a} and {c}', { a: '1' }); // '{a} and {c}'
 * ```
 */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
  logger?: Logger
): string {
  const placeholder = /\{(\w+)\}/g;

  for (const match of template.matchAll(placeholder)) {
    if (!Object.prototype.hasOwnProperty.call(values, match[1])) {
      logger?.warn(`[Email][Templates] Missing placeholder: ${match[1]}`);
      return template;
    }
  }

  return template.replace(placeholder, (_whole, name: string) => values[name]);
}

/**
 * One `- N in City` line per city, in the given order.
 */
export function formatCityLines(counts: CityCounts): string {
  return Object.entries(counts)
    .map(([city, count]) => `- ${count} in ${city}`)
    .join('\n');
}

export function buildSummaryMessage(
  counts: CityCounts,
  sheetLink: string,
  templates: Templates,
  logger?: Logger
): EmailMessage {
  const totalNew = Object.values(counts).reduce((sum, count) => sum + count, 0);
  const bodyText = renderTemplate(
    templates.email.body_text,
    {
      city_lines: formatCityLines(counts),
      total_new: String(totalNew),
      sheet_link: sheetLink,
    },
    logger
  );

  return {
    subject: templates.email.subject,
    bodyText,
    fromName: templates.email.from_name,
  };
}
