/**
 * Configuration Module
 *
 * Loads and validates environment variables for the closure scan.
 * Uses Zod for runtime validation. Nothing here is required at load time;
 * each consumer asks for the settings it needs via `requireSetting` or
 * `requireServiceAccount`, so a missing credential surfaces as a
 * `ConfigurationError` before the first remote call.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { resolveDataDir } from '../storage/paths.js';
import { ConfigurationError } from './errors.js';

// Environment schema: everything optional, blanks treated as unset
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

const envSchema = z.object({
  // Service account (shared by Sheets and Area Insights)
  TYPE: optionalString,
  PROJECT_ID: optionalString,
  PRIVATE_KEY_ID: optionalString,
  PRIVATE_KEY: optionalString,
  CLIENT_EMAIL: optionalString,
  CLIENT_ID: optionalString,
  AUTH_URI: optionalString,
  TOKEN_URI: optionalString,
  AUTH_PROVIDER_X509_CERT_URL: optionalString,
  CLIENT_X509_CERT_URL: optionalString,
  UNIVERSE_DOMAIN: optionalString,

  // Places API (details lookups)
  PLACES_API_KEY: optionalString,

  // Ledger
  SPREADSHEET_ID: optionalString,
  RAW_TAB: optionalString,

  // Notification
  SENDGRID_API_KEY: optionalString,
  FROM_EMAIL: optionalString,
  EMAIL_RECIPIENTS: optionalString,
  SHEET_LINK: optionalString,

  // Data directory
  CLOSURE_SCAN_DATA_DIR: optionalString,

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Service account fields, in the shape Google issues them.
 */
export interface ServiceAccountInfo {
  type: string;
  project_id?: string;
  private_key_id?: string;
  private_key?: string;
  client_email?: string;
  client_id?: string;
  auth_uri?: string;
  token_uri?: string;
  auth_provider_x509_cert_url?: string;
  client_x509_cert_url?: string;
  universe_domain: string;
}

/** Fields that must be present before a token can be requested */
export const REQUIRED_SERVICE_ACCOUNT_FIELDS = [
  'project_id',
  'private_key_id',
  'private_key',
  'client_email',
  'client_id',
  'auth_uri',
  'token_uri',
  'auth_provider_x509_cert_url',
  'client_x509_cert_url',
] as const;

/**
 * Split a comma-separated recipient list.
 */
export function parseRecipients(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Build the application configuration from an environment map.
 *
 * @param source - Environment variables (defaults to `process.env`)
 * @throws ConfigurationError if a variable has an invalid value
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env) {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment variables: ${issues}`);
  }

  const env: Env = parseResult.data;

  return {
    // Environment
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',

    serviceAccount: {
      type: env.TYPE ?? 'service_account',
      project_id: env.PROJECT_ID,
      private_key_id: env.PRIVATE_KEY_ID,
      // .env files carry the PEM with literal "\n" sequences
      private_key: env.PRIVATE_KEY?.replace(/\\n/g, '\n'),
      client_email: env.CLIENT_EMAIL,
      client_id: env.CLIENT_ID,
      auth_uri: env.AUTH_URI,
      token_uri: env.TOKEN_URI,
      auth_provider_x509_cert_url: env.AUTH_PROVIDER_X509_CERT_URL,
      client_x509_cert_url: env.CLIENT_X509_CERT_URL,
      universe_domain: env.UNIVERSE_DOMAIN ?? 'googleapis.com',
    } satisfies ServiceAccountInfo,

    settings: {
      placesApiKey: env.PLACES_API_KEY,
      spreadsheetId: env.SPREADSHEET_ID,
      rawTab: env.RAW_TAB?.trim(),
      sendgridApiKey: env.SENDGRID_API_KEY,
      fromEmail: env.FROM_EMAIL,
      sheetLink: env.SHEET_LINK,
    },

    emailRecipients: parseRecipients(env.EMAIL_RECIPIENTS),

    // Data directory
    dataDir: resolveDataDir(env.CLOSURE_SCAN_DATA_DIR),
  } as const;
}

export type Config = ReturnType<typeof loadEnv>;
export type SettingName = keyof Config['settings'];

let cached: Config | undefined;

/**
 * Application configuration, loaded once from `process.env`.
 */
export function getConfig(): Config {
  if (!cached) {
    cached = loadEnv(process.env);
  }
  return cached;
}

/**
 * Drop the memoised configuration (tests, or after changing `process.env`).
 */
export function resetConfig(): void {
  cached = undefined;
}

const SETTING_ENV_NAMES: Record<SettingName, string> = {
  placesApiKey: 'PLACES_API_KEY',
  spreadsheetId: 'SPREADSHEET_ID',
  rawTab: 'RAW_TAB',
  sendgridApiKey: 'SENDGRID_API_KEY',
  fromEmail: 'FROM_EMAIL',
  sheetLink: 'SHEET_LINK',
};

/**
 * Get a setting or throw if not configured
 */
export function requireSetting(name: SettingName, config: Config = getConfig()): string {
  const value = config.settings[name];
  if (!value) {
    throw new ConfigurationError(
      `Missing required setting: ${SETTING_ENV_NAMES[name]}. Please set it in your .env file.`
    );
  }
  return value;
}

/**
 * A service account with every required field present.
 */
export type CompleteServiceAccount = ServiceAccountInfo &
  Record<(typeof REQUIRED_SERVICE_ACCOUNT_FIELDS)[number], string>;

/**
 * Return the service account or throw listing every missing field.
 */
export function requireServiceAccount(config: Config = getConfig()): CompleteServiceAccount {
  const info = config.serviceAccount;
  const missing = REQUIRED_SERVICE_ACCOUNT_FIELDS.filter((field) => !info[field]);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required fields in .env: ${missing.join(', ')}`);
  }

  const {
    project_id,
    private_key_id,
    private_key,
    client_email,
    client_id,
    auth_uri,
    token_uri,
    auth_provider_x509_cert_url,
    client_x509_cert_url,
  } = info;

  if (
    !project_id ||
    !private_key_id ||
    !private_key ||
    !client_email ||
    !client_id ||
    !auth_uri ||
    !token_uri ||
    !auth_provider_x509_cert_url ||
    !client_x509_cert_url
  ) {
    throw new ConfigurationError('Service account is incomplete');
  }

  return {
    ...info,
    project_id,
    private_key_id,
    private_key,
    client_email,
    client_id,
    auth_uri,
    token_uri,
    auth_provider_x509_cert_url,
    client_x509_cert_url,
  };
}

// Re-export errors
export * from './errors.js';
