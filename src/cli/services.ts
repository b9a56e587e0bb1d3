/**
 * Service Wiring
 *
 * Builds the real remote clients for a command from the environment and the
 * validated controls. Every credential is checked here, so a missing setting
 * fails the command before the first remote call.
 *
 * @module cli/services
 */

import type { ScanControls } from '../config/controls.js';
import { requireServiceAccount, requireSetting, type Config } from '../config/index.js';
import {
  INSIGHTS_SCOPES,
  SHEETS_SCOPES,
  ServiceAccountTokenProvider,
} from '../auth/service-account.js';
import { AreaInsightsClient } from '../insights/client.js';
import { PlaceDetailsClient } from '../places/client.js';
import { SheetsLedger } from '../ledger/sheets.js';
import { DEFAULT_TEMPLATES_PATH, loadTemplates } from '../notify/templates.js';
import { SendGridNotifier } from '../notify/sendgrid.js';
import type { Logger, ScanServices } from '../pipeline/types.js';
import { getSnapshotsDir } from '../storage/paths.js';
import { CsvSnapshotWriter } from '../storage/snapshot.js';

export interface ServiceContext {
  config: Config;
  controls: Readonly<ScanControls>;
  /** Resolved data directory (snapshots live beneath it) */
  dataDir: string;
  logger: Logger;
}

export function createInsightsClient(context: ServiceContext): AreaInsightsClient {
  const tokens = new ServiceAccountTokenProvider(requireServiceAccount(context.config), INSIGHTS_SCOPES);
  return new AreaInsightsClient(tokens, { log: context.controls.log, logger: context.logger });
}

export function createLedger(config: Config, logger: Logger): SheetsLedger {
  const tokens = new ServiceAccountTokenProvider(requireServiceAccount(config), SHEETS_SCOPES);
  return new SheetsLedger(requireSetting('spreadsheetId', config), tokens, { logger });
}

export async function createNotifier(config: Config, logger: Logger): Promise<SendGridNotifier> {
  const apiKey = requireSetting('sendgridApiKey', config);
  const fromEmail = requireSetting('fromEmail', config);
  const templates = await loadTemplates(DEFAULT_TEMPLATES_PATH, logger);
  return new SendGridNotifier({ apiKey, fromEmail, templates, logger });
}

/**
 * Services for a places-mode scan. The ledger is only built when writes are
 * enabled; the notifier only when notification is enabled.
 */
export async function createScanServices(context: ServiceContext): Promise<ScanServices> {
  const { config, controls, logger } = context;

  return {
    insights: createInsightsClient(context),
    details: new PlaceDetailsClient(requireSetting('placesApiKey', config), { logger }),
    ledger: controls.writeEnabled ? createLedger(config, logger) : undefined,
    snapshots: new CsvSnapshotWriter({ directory: getSnapshotsDir(context.dataDir) }),
    notifier: controls.notify.enabled ? await createNotifier(config, logger) : undefined,
    logger,
  };
}
