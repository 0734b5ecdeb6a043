/**
 * Canonical request construction for Signature V4
 */

import { InvalidRequestDescriptorError } from '../errors/index.js';
import type { QueryParameters, RequestDescriptor } from './types.js';

const encoder = new TextEncoder();

/**
 * Canonicalized header set
 */
export interface CanonicalHeaders {
  /** Lowercase name and normalized value, sorted by name */
  entries: Array<[string, string]>;
  /** `name:value\n` block */
  canonical: string;
  /** `;`-joined names */
  signed: string;
}

function isUnreserved(code: number): boolean {
  return (
    (code >= 0x41 && code <= 0x5a) || // A-Z
    (code >= 0x61 && code <= 0x7a) || // a-z
    (code >= 0x30 && code <= 0x39) || // 0-9
    code === 0x2d || // -
    code === 0x5f || // _
    code === 0x2e || // .
    code === 0x7e // ~
  );
}

/**
 * URI encode following S3 requirements (RFC 3986)
 * Different from standard encodeURIComponent, which leaves !'()* alone
 */
export function uriEncode(str: string, encodeSlash = true): string {
  let encoded = '';
  // for..of walks code points, keeping surrogate pairs together
  for (const char of str) {
    const code = char.charCodeAt(0);
    if (char.length === 1 && isUnreserved(code)) {
      encoded += char;
    } else if (char === '/' && !encodeSlash) {
      encoded += '/';
    } else {
      for (const byte of encoder.encode(char)) {
        encoded += '%' + byte.toString(16).toUpperCase().padStart(2, '0');
      }
    }
  }
  return encoded;
}

/**
 * Get canonical URI from an absolute path
 *
 * Each segment is encoded on its own; empty segments (from repeated
 * slashes) are kept, since S3 object keys may contain them.
 */
export function getCanonicalUri(path: string): string {
  if (path === '') {
    return '/';
  }
  if (!path.startsWith('/')) {
    throw InvalidRequestDescriptorError.malformedPath(path);
  }
  return path
    .split('/')
    .map((segment) => uriEncode(segment))
    .join('/');
}

/**
 * Get canonical query string
 * Parameters are URI-encoded, then sorted by name and value
 */
export function getCanonicalQueryString(query?: QueryParameters): string {
  if (!query) {
    return '';
  }

  const params: Array<[string, string]> = [];
  for (const [name, value] of Object.entries(query)) {
    const values: readonly string[] = typeof value === 'string' ? [value] : value;
    for (const item of values) {
      params.push([uriEncode(name), uriEncode(item)]);
    }
  }

  params.sort((a, b) => {
    if (a[0] < b[0]) return -1;
    if (a[0] > b[0]) return 1;
    if (a[1] < b[1]) return -1;
    if (a[1] > b[1]) return 1;
    return 0;
  });

  return params.map(([key, value]) => `${key}=${value}`).join('&');
}

/**
 * Trim a header value and collapse internal whitespace runs
 */
export function normalizeHeaderValue(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

/**
 * Canonicalize a header map
 *
 * Names that differ only by case merge into one entry when their
 * normalized values agree; otherwise the header set is ambiguous.
 */
export function canonicalizeHeaders(headers: Record<string, string>): CanonicalHeaders {
  const merged = new Map<string, string>();

  for (const [rawName, rawValue] of Object.entries(headers)) {
    const name = rawName.trim().toLowerCase();
    if (name === '') {
      throw InvalidRequestDescriptorError.missingField('header name');
    }
    const value = normalizeHeaderValue(rawValue);
    const existing = merged.get(name);
    if (existing !== undefined && existing !== value) {
      throw InvalidRequestDescriptorError.ambiguousHeader(name);
    }
    merged.set(name, value);
  }

  const entries = Array.from(merged.entries()).sort((a, b) =>
    a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0
  );

  return {
    entries,
    canonical: entries.map(([name, value]) => `${name}:${value}\n`).join(''),
    signed: entries.map(([name]) => name).join(';'),
  };
}

/**
 * Get canonical headers block (each line ends with a newline)
 */
export function getCanonicalHeaders(headers: Record<string, string>): string {
  return canonicalizeHeaders(headers).canonical;
}

/**
 * Get signed headers (semicolon-separated list of lowercase header names)
 */
export function getSignedHeaders(headers: Record<string, string>): string {
  return canonicalizeHeaders(headers).signed;
}

/**
 * Create canonical request for Signature V4
 * Format:
 * HTTP_METHOD\n
 * CANONICAL_URI\n
 * CANONICAL_QUERY_STRING\n
 * CANONICAL_HEADERS\n
 * SIGNED_HEADERS\n
 * PAYLOAD_HASH
 *
 * Every header in `request.headers` is signed.
 */
export function createCanonicalRequest(
  request: Pick<RequestDescriptor, 'method' | 'path' | 'query' | 'headers'>,
  payloadHash: string
): string {
  if (!request.method || request.method.trim() === '') {
    throw InvalidRequestDescriptorError.missingField('method');
  }

  const headers = canonicalizeHeaders(request.headers);

  return [
    request.method.trim().toUpperCase(),
    getCanonicalUri(request.path),
    getCanonicalQueryString(request.query),
    headers.canonical,
    headers.signed,
    payloadHash,
  ].join('\n');
}
