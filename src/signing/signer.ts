/**
 * SigV4Signer - Signature Version 4 request signing
 */

import type { Credentials } from '../auth/types.js';
import { validateCredentials } from '../auth/provider.js';
import { ClockSourceError, InvalidRequestDescriptorError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import {
  canonicalizeHeaders,
  createCanonicalRequest,
  getCanonicalQueryString,
  getCanonicalUri,
} from './canonical.js';
import { hmacSha256Hex, sha256Hex } from './crypto.js';
import { assertValidTimestamp, formatAmzDate } from './format.js';
import { SigningKeyCache } from './key-derivation.js';
import { createScope, formatScope } from './scope.js';
import { SIGNING_ALGORITHM, createStringToSign } from './string-to-sign.js';
import type {
  PresignedUrlOptions,
  PresignedUrlResult,
  QueryParameters,
  RequestDescriptor,
  SignOptions,
  SigningResult,
} from './types.js';

// Constants
export const UNSIGNED_PAYLOAD = 'UNSIGNED-PAYLOAD';
export const EMPTY_SHA256 =
  'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
export const MAX_PRESIGN_EXPIRES = 604800; // 7 days in seconds

/**
 * Headers the signer owns; caller values for them are replaced
 */
const SIGNER_HEADERS = ['host', 'x-amz-date', 'x-amz-content-sha256', 'x-amz-security-token'];

export interface SigV4SignerConfig {
  credentials: Credentials;
  region: string;
  /** default: "s3" */
  service?: string;
  /**
   * Sign and send x-amz-content-sha256 (default: true, as S3 requires)
   */
  signPayloadHeader?: boolean;
  /** Shared key cache; each signer gets its own when omitted */
  keyCache?: SigningKeyCache;
  /** Source of the request timestamp (default: current time) */
  clock?: () => Date;
  logger?: Logger;
}

export class SigV4Signer {
  private readonly credentials: Credentials;
  private readonly region: string;
  private readonly service: string;
  private readonly signPayloadHeader: boolean;
  private readonly keyCache: SigningKeyCache;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  /**
   * @throws {MissingCredentialError} If a credential field is empty
   * @throws {UnsupportedRegionOrServiceError} If region or service is empty
   */
  constructor(config: SigV4SignerConfig) {
    validateCredentials(config.credentials);
    this.credentials = config.credentials;
    this.region = config.region;
    this.service = config.service ?? 's3';
    this.signPayloadHeader = config.signPayloadHeader ?? true;
    this.keyCache = config.keyCache ?? new SigningKeyCache();
    this.clock = config.clock ?? (() => new Date());
    this.logger = config.logger ?? new NoopLogger();

    // Fail at construction rather than on the first request
    createScope(new Date(0), this.region, this.service);
  }

  /**
   * Hash payload and return hex string
   * Empty body returns EMPTY_SHA256 constant
   */
  hashPayload(body: Uint8Array): string {
    if (body.length === 0) {
      return EMPTY_SHA256;
    }
    return sha256Hex(body);
  }

  /**
   * Sign a request with Signature V4
   *
   * Every header of the descriptor is signed, together with `host`,
   * `x-amz-date`, `x-amz-content-sha256` (unless disabled) and
   * `x-amz-security-token` for temporary credentials.
   */
  sign(request: RequestDescriptor, options: SignOptions = {}): SigningResult {
    const credentials = this.credentials;

    const timestamp = this.resolveTimestamp(options.timestamp);
    const amzDate = formatAmzDate(timestamp);
    const scope = createScope(timestamp, this.region, this.service);

    if (!request.host || request.host.trim() === '') {
      throw InvalidRequestDescriptorError.missingField('host');
    }

    const payloadHash = this.hashPayload(request.payload);

    const headers = this.finalizeHeaders(request, credentials, amzDate, payloadHash);
    const canonicalHeaders = canonicalizeHeaders(headers);

    const canonicalRequest = createCanonicalRequest({ ...request, headers }, payloadHash);
    const stringToSign = createStringToSign(amzDate, scope, canonicalRequest);

    const signingKey = this.keyCache.getSigningKey(credentials, scope);
    const signature = hmacSha256Hex(signingKey, stringToSign);

    const authorization = [
      `${SIGNING_ALGORITHM} Credential=${credentials.accessKeyId}/${formatScope(scope)}`,
      `SignedHeaders=${canonicalHeaders.signed}`,
      `Signature=${signature}`,
    ].join(', ');

    this.logger.debug('Signed request', {
      method: request.method,
      host: request.host,
      scope: formatScope(scope),
      signedHeaders: canonicalHeaders.signed,
    });

    // Send the values exactly as they were canonicalized
    const finalHeaders: Record<string, string> = Object.fromEntries(canonicalHeaders.entries);
    finalHeaders['authorization'] = authorization;

    return {
      authorization,
      headers: finalHeaders,
      signature,
      signedHeaders: canonicalHeaders.signed,
      canonicalRequest,
      stringToSign,
      scope,
      amzDate,
      payloadHash,
    };
  }

  /**
   * Generate presigned URL for GET or PUT operations
   * Maximum expiration is 7 days (604800 seconds)
   */
  presignUrl(options: PresignedUrlOptions): PresignedUrlResult {
    if (!Number.isInteger(options.expiresIn) || options.expiresIn <= 0) {
      throw new InvalidRequestDescriptorError({
        message: 'Presigned URL expiration must be a positive number of seconds',
        code: 'INVALID_EXPIRES',
        details: { expiresIn: options.expiresIn },
      });
    }
    if (options.expiresIn > MAX_PRESIGN_EXPIRES) {
      throw new InvalidRequestDescriptorError({
        message: `Presigned URL expiration cannot exceed ${MAX_PRESIGN_EXPIRES} seconds (7 days)`,
        code: 'INVALID_EXPIRES',
        details: { expiresIn: options.expiresIn },
      });
    }
    if (!options.host || options.host.trim() === '') {
      throw InvalidRequestDescriptorError.missingField('host');
    }

    const timestamp = this.resolveTimestamp(options.timestamp);
    const amzDate = formatAmzDate(timestamp);
    const scope = createScope(timestamp, this.region, this.service);

    const query: QueryParameters = {
      ...options.query,
      'X-Amz-Algorithm': SIGNING_ALGORITHM,
      'X-Amz-Credential': `${this.credentials.accessKeyId}/${formatScope(scope)}`,
      'X-Amz-Date': amzDate,
      'X-Amz-Expires': String(options.expiresIn),
      'X-Amz-SignedHeaders': 'host',
    };
    if (this.credentials.sessionToken) {
      query['X-Amz-Security-Token'] = this.credentials.sessionToken;
    }

    const canonicalRequest = createCanonicalRequest(
      {
        method: options.method,
        path: options.path,
        query,
        headers: { host: options.host },
      },
      UNSIGNED_PAYLOAD
    );
    const stringToSign = createStringToSign(amzDate, scope, canonicalRequest);
    const signingKey = this.keyCache.getSigningKey(this.credentials, scope);
    const signature = hmacSha256Hex(signingKey, stringToSign);

    const search = getCanonicalQueryString({ ...query, 'X-Amz-Signature': signature });
    const protocol = options.protocol ?? 'https';

    return {
      url: `${protocol}://${options.host}${getCanonicalUri(options.path)}?${search}`,
      expiresAt: new Date(timestamp.getTime() + options.expiresIn * 1000),
      method: options.method,
    };
  }

  private resolveTimestamp(timestamp?: Date): Date {
    const value = timestamp ?? this.readClock();
    assertValidTimestamp(value);
    return value;
  }

  private readClock(): Date {
    try {
      return this.clock();
    } catch (error) {
      throw ClockSourceError.unavailable(error);
    }
  }

  private finalizeHeaders(
    request: RequestDescriptor,
    credentials: Credentials,
    amzDate: string,
    payloadHash: string
  ): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      if (!SIGNER_HEADERS.includes(name.trim().toLowerCase())) {
        headers[name] = value;
      }
    }

    headers['host'] = request.host.trim();
    headers['x-amz-date'] = amzDate;
    if (this.signPayloadHeader) {
      headers['x-amz-content-sha256'] = payloadHash;
    }
    if (credentials.sessionToken) {
      headers['x-amz-security-token'] = credentials.sessionToken;
    }
    return headers;
  }
}
