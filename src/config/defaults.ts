/**
 * Default configuration values
 * @module s3-upload-signer/config/defaults
 */

/**
 * Default service name in the credential scope.
 */
export const DEFAULT_SERVICE = 's3';

/**
 * Default request timeout in milliseconds (5 minutes).
 */
export const DEFAULT_TIMEOUT = 300000;

/**
 * Default number of concurrent uploads in a batch.
 */
export const DEFAULT_CONCURRENCY = 4;

/**
 * Upper bound for batch concurrency.
 */
export const MAX_CONCURRENCY = 100;

/**
 * Default endpoint for a region.
 */
export function defaultEndpoint(region: string): string {
  return `https://s3.${region}.amazonaws.com`;
}
