/**
 * String-to-sign construction for Signature V4
 */

import { sha256Hex } from './crypto.js';
import { formatScope } from './scope.js';
import type { Scope } from './types.js';

export const SIGNING_ALGORITHM = 'AWS4-HMAC-SHA256';

/**
 * AWS4-HMAC-SHA256\n<amzDate>\n<scope>\n<hex sha256 of canonical request>
 */
export function createStringToSign(
  amzDate: string,
  scope: Scope,
  canonicalRequest: string
): string {
  return [SIGNING_ALGORITHM, amzDate, formatScope(scope), sha256Hex(canonicalRequest)].join(
    '\n'
  );
}
