/**
 * Configuration Errors
 *
 * Raised before any remote call is made. The CLI treats every subclass as
 * fatal and exits with `EXIT_CODES.CONFIG_ERROR`.
 *
 * @module config/errors
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The requested city has no preset.
 */
export class UnknownCityError extends ConfigurationError {
  constructor(
    public readonly city: string,
    public readonly knownCities: readonly string[]
  ) {
    super(`Unknown city '${city}'. Expected one of: ${knownCities.join(', ')}`);
    this.name = 'UnknownCityError';
  }
}

/**
 * The configured location mode is recognised but not implemented.
 */
export class UnsupportedRegionError extends ConfigurationError {
  constructor(public readonly mode: string) {
    super(`Unsupported location mode '${mode}'. Only 'circle' is supported.`);
    this.name = 'UnsupportedRegionError';
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
