/**
 * Google service-account authentication
 *
 * @module auth
 */

export {
  ServiceAccountTokenProvider,
  AuthError,
  isAuthError,
  SCOPES,
  SHEETS_SCOPES,
  INSIGHTS_SCOPES,
  type ServiceAccountCredentials,
  type ServiceAccountTokenProviderOptions,
} from './service-account.js';
