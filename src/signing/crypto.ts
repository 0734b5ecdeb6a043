/**
 * Cryptographic utilities for Signature V4 signing
 * Uses @noble/hashes for SHA-256 and HMAC-SHA256
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 as sha256Noble } from '@noble/hashes/sha256';

const encoder = new TextEncoder();

/**
 * UTF-8 encode string messages; bytes pass through untouched
 */
function toBytes(data: string | Uint8Array): Uint8Array {
  return typeof data === 'string' ? encoder.encode(data) : data;
}

/**
 * Compute HMAC-SHA256 over a raw byte key
 */
export function hmacSha256(key: Uint8Array, data: string | Uint8Array): Uint8Array {
  return hmac(sha256Noble, key, toBytes(data));
}

/**
 * Compute HMAC-SHA256 and return as hex string
 */
export function hmacSha256Hex(key: Uint8Array, data: string | Uint8Array): string {
  return toHex(hmacSha256(key, data));
}

/**
 * Compute SHA-256 hash
 */
export function sha256Hash(data: string | Uint8Array): Uint8Array {
  return sha256Noble(toBytes(data));
}

/**
 * Compute SHA-256 hash and return as hex string
 */
export function sha256Hex(data: string | Uint8Array): string {
  return toHex(sha256Hash(data));
}

/**
 * Convert byte array to lowercase hex string
 */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}
