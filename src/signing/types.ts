/**
 * Signing types for Signature V4 authentication
 */

/**
 * Query parameters; a repeated name maps to a list of values
 */
export type QueryParameters = Record<string, string | readonly string[]>;

/**
 * Everything about a request that takes part in the signature
 */
export interface RequestDescriptor {
  /** HTTP method, e.g. PUT */
  method: string;
  /** Host the request is sent to, without scheme */
  host: string;
  /** Absolute request path, not yet percent-encoded */
  path: string;
  /** Query parameters, if any */
  query?: QueryParameters;
  /** Headers to sign; names are case-insensitive */
  headers: Record<string, string>;
  /** Exact bytes sent as the body */
  payload: Uint8Array;
}

/**
 * Credential scope limiting a derived signing key
 */
export interface Scope {
  /** UTC date of the request timestamp, YYYYMMDD */
  readonly date: string;
  readonly region: string;
  readonly service: string;
  readonly terminator: 'aws4_request';
}

/**
 * Per-request signing options
 */
export interface SignOptions {
  /** Request timestamp (defaults to the signer's clock) */
  timestamp?: Date;
}

/**
 * Output of signing a request
 */
export interface SigningResult {
  /** Value of the Authorization header */
  authorization: string;
  /**
   * Every header that was canonicalized, lowercased, plus `authorization`.
   * Must be sent unmodified.
   */
  headers: Record<string, string>;
  /** Hex signature */
  signature: string;
  /** Semicolon-joined signed header names */
  signedHeaders: string;
  canonicalRequest: string;
  stringToSign: string;
  scope: Scope;
  /** Request timestamp, YYYYMMDDTHHMMSSZ */
  amzDate: string;
  /** Hex SHA-256 of the payload */
  payloadHash: string;
}

export interface PresignedUrlOptions {
  method: 'GET' | 'PUT';
  host: string;
  path: string;
  /** Lifetime in seconds, 1..604800 (7 days) */
  expiresIn: number;
  /** Extra query parameters to sign into the URL */
  query?: QueryParameters;
  /** URL scheme (default https) */
  protocol?: 'http' | 'https';
  timestamp?: Date;
}

export interface PresignedUrlResult {
  url: string;
  expiresAt: Date;
  method: 'GET' | 'PUT';
}
