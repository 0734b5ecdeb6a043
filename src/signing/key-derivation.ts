/**
 * Signing key derivation for Signature V4
 */

import type { Credentials } from '../auth/types.js';
import { hmacSha256, sha256Hex } from './crypto.js';
import { SCOPE_TERMINATOR } from './scope.js';
import type { Scope } from './types.js';

const encoder = new TextEncoder();

/**
 * Derive signing key using HMAC-SHA256 chaining
 * kSecret = "AWS4" + secretAccessKey
 * kDate = HMAC-SHA256(kSecret, dateStamp)
 * kRegion = HMAC-SHA256(kDate, region)
 * kService = HMAC-SHA256(kRegion, service)
 * kSigning = HMAC-SHA256(kService, "aws4_request")
 *
 * Every step keys on the raw bytes of the one before.
 */
export function deriveSigningKey(
  secretAccessKey: string,
  dateStamp: string,
  region: string,
  service: string
): Uint8Array {
  const kSecret = encoder.encode('AWS4' + secretAccessKey);
  const kDate = hmacSha256(kSecret, dateStamp);
  const kRegion = hmacSha256(kDate, region);
  const kService = hmacSha256(kRegion, service);
  return hmacSha256(kService, SCOPE_TERMINATOR);
}

interface CacheEntry {
  key: Uint8Array;
  date: string;
}

/**
 * Cache of signing keys for same-day requests
 *
 * A key depends only on the secret and the scope, never on the request,
 * so it can be reused until the scope date changes. Lookups and inserts
 * are synchronous, which keeps concurrent async signers from interleaving
 * inside a get-or-derive.
 */
export class SigningKeyCache {
  private cache: Map<string, CacheEntry> = new Map();

  /**
   * Get signing key from cache or derive new one
   */
  getSigningKey(credentials: Credentials, scope: Scope): Uint8Array {
    const cacheKey = this.getCacheKey(credentials, scope);

    const cached = this.cache.get(cacheKey);
    if (cached && cached.date === scope.date) {
      return cached.key.slice();
    }

    const key = deriveSigningKey(
      credentials.secretAccessKey,
      scope.date,
      scope.region,
      scope.service
    );

    this.cache.set(cacheKey, { key, date: scope.date });

    // Keys from other days can no longer sign anything
    this.cleanupCache(scope.date);

    // Callers get a copy; the cached bytes stay private
    return key.slice();
  }

  /**
   * Check if a key for these credentials and scope is cached
   */
  has(credentials: Credentials, scope: Scope): boolean {
    return this.cache.has(this.getCacheKey(credentials, scope));
  }

  /**
   * Clear all cached keys
   */
  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * The secret is fingerprinted so it never sits in the map in clear text
   */
  private getCacheKey(credentials: Credentials, scope: Scope): string {
    const fingerprint = sha256Hex(credentials.secretAccessKey);
    return JSON.stringify([
      credentials.accessKeyId,
      fingerprint,
      scope.date,
      scope.region,
      scope.service,
    ]);
  }

  private cleanupCache(currentDate: string): void {
    for (const [key, value] of this.cache.entries()) {
      if (value.date !== currentDate) {
        this.cache.delete(key);
      }
    }
  }
}
