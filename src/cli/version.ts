/**
 * CLI Version Information
 *
 * @module cli/version
 */

/**
 * Current CLI version.
 * Should match package.json version.
 */
export const VERSION = '1.0.0';

/**
 * Get version information for display.
 */
export function getVersionInfo(): string {
  return `Closure Scan v${VERSION}`;
}
