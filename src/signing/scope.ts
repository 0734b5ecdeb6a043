/**
 * Credential scope construction
 */

import { UnsupportedRegionOrServiceError } from '../errors/index.js';
import { formatDateStamp } from './format.js';
import type { Scope } from './types.js';

export const SCOPE_TERMINATOR = 'aws4_request';

/**
 * Throws UnsupportedRegionOrServiceError for blank region or service names
 */
export function validateRegionAndService(region: string, service: string): void {
  if (!region || region.trim() === '') {
    throw UnsupportedRegionOrServiceError.emptyRegion();
  }
  if (!service || service.trim() === '') {
    throw UnsupportedRegionOrServiceError.emptyService();
  }
}

/**
 * Build the scope for a request timestamp
 *
 * The scope date is taken from the same instant as `x-amz-date`, so the two
 * can never fall on different UTC days.
 */
export function createScope(timestamp: Date, region: string, service: string): Scope {
  validateRegionAndService(region, service);
  return {
    date: formatDateStamp(timestamp),
    region,
    service,
    terminator: SCOPE_TERMINATOR,
  };
}

/**
 * `date/region/service/aws4_request`
 */
export function formatScope(scope: Scope): string {
  return `${scope.date}/${scope.region}/${scope.service}/${scope.terminator}`;
}
