/**
 * Signature V4 signing module
 *
 * - Request signing with Authorization header
 * - Presigned URL generation (GET/PUT)
 * - Canonical request construction
 * - Signing key derivation with caching
 * - Cryptographic utilities (HMAC-SHA256, SHA-256)
 */

// Types
export type {
  QueryParameters,
  RequestDescriptor,
  Scope,
  SignOptions,
  SigningResult,
  PresignedUrlOptions,
  PresignedUrlResult,
} from './types.js';

// Main signer
export {
  SigV4Signer,
  type SigV4SignerConfig,
  UNSIGNED_PAYLOAD,
  EMPTY_SHA256,
  MAX_PRESIGN_EXPIRES,
} from './signer.js';

// Cryptographic utilities
export { hmacSha256, hmacSha256Hex, sha256Hash, sha256Hex, toHex } from './crypto.js';

// Canonical request utilities
export {
  createCanonicalRequest,
  canonicalizeHeaders,
  getCanonicalUri,
  getCanonicalQueryString,
  getCanonicalHeaders,
  getSignedHeaders,
  normalizeHeaderValue,
  uriEncode,
  type CanonicalHeaders,
} from './canonical.js';

// String to sign and scope
export { createStringToSign, SIGNING_ALGORITHM } from './string-to-sign.js';
export { createScope, formatScope, validateRegionAndService, SCOPE_TERMINATOR } from './scope.js';

// Signing key derivation
export { deriveSigningKey, SigningKeyCache } from './key-derivation.js';

// Date formatting
export { formatDateStamp, formatAmzDate, assertValidTimestamp } from './format.js';
