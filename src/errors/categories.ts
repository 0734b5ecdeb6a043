/**
 * Specific error categories for the S3 upload signer
 * @module s3-upload-signer/errors/categories
 */

import { SignerError, type SignerErrorParams } from './error.js';

type CategoryParams = Omit<SignerErrorParams, 'type' | 'stage' | 'isRetryable'> & {
  isRetryable?: boolean;
};

/**
 * Access key ID or secret access key absent or empty
 */
export class MissingCredentialError extends SignerError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'missing_credential',
      stage: 'credentials',
      isRetryable: false,
    });
    this.name = 'MissingCredentialError';
    Object.setPrototypeOf(this, MissingCredentialError.prototype);
  }

  /**
   * A required credential field is missing
   */
  static missingField(field: 'accessKeyId' | 'secretAccessKey', source?: string): MissingCredentialError {
    return new MissingCredentialError({
      message: source
        ? `${field} is required but was not provided by ${source}`
        : `${field} is required but was not provided`,
      code: field === 'accessKeyId' ? 'MISSING_ACCESS_KEY_ID' : 'MISSING_SECRET_ACCESS_KEY',
      details: source ? { field, source } : { field },
    });
  }
}

/**
 * The request cannot be canonicalized as given
 */
export class InvalidRequestDescriptorError extends SignerError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'invalid_request_descriptor',
      stage: 'canonicalization',
      isRetryable: false,
    });
    this.name = 'InvalidRequestDescriptorError';
    Object.setPrototypeOf(this, InvalidRequestDescriptorError.prototype);
  }

  /**
   * Two headers differ only by name case and carry different values
   */
  static ambiguousHeader(name: string): InvalidRequestDescriptorError {
    return new InvalidRequestDescriptorError({
      message: `Header "${name}" is given more than once with different values`,
      code: 'AMBIGUOUS_HEADER',
      details: { header: name },
    });
  }

  /**
   * The request path is not an absolute path
   */
  static malformedPath(path: string): InvalidRequestDescriptorError {
    return new InvalidRequestDescriptorError({
      message: `Request path must be absolute, got: ${path}`,
      code: 'MALFORMED_PATH',
      details: { path },
    });
  }

  /**
   * An object key with `.` or `..` segments; URL parsers collapse them
   * before sending, so the signed path would not be the one requested
   */
  static dotSegment(key: string): InvalidRequestDescriptorError {
    return new InvalidRequestDescriptorError({
      message: `Object key must not contain "." or ".." segments: ${key}`,
      code: 'DOT_SEGMENT',
      details: { key },
    });
  }

  /**
   * A required descriptor field is empty
   */
  static missingField(field: string): InvalidRequestDescriptorError {
    return new InvalidRequestDescriptorError({
      message: `Request ${field} is required`,
      code: 'MISSING_FIELD',
      details: { field },
    });
  }
}

/**
 * The payload source failed to produce bytes
 */
export class PayloadReadError extends SignerError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'payload_read_error',
      stage: 'payload',
      isRetryable: false,
    });
    this.name = 'PayloadReadError';
    Object.setPrototypeOf(this, PayloadReadError.prototype);
  }

  /**
   * Wraps an error thrown by a payload source
   */
  static fromCause(source: string, cause: unknown): PayloadReadError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new PayloadReadError({
      message: `Failed to read payload from ${source}: ${reason}`,
      code: 'PAYLOAD_READ_FAILED',
      details: { source },
      cause,
    });
  }
}

/**
 * Region or service name unusable in a credential scope
 */
export class UnsupportedRegionOrServiceError extends SignerError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'unsupported_region_or_service',
      stage: 'scope',
      isRetryable: false,
    });
    this.name = 'UnsupportedRegionOrServiceError';
    Object.setPrototypeOf(this, UnsupportedRegionOrServiceError.prototype);
  }

  static emptyRegion(): UnsupportedRegionOrServiceError {
    return new UnsupportedRegionOrServiceError({
      message: 'region must be a non-empty string',
      code: 'EMPTY_REGION',
    });
  }

  static emptyService(): UnsupportedRegionOrServiceError {
    return new UnsupportedRegionOrServiceError({
      message: 'service must be a non-empty string',
      code: 'EMPTY_SERVICE',
    });
  }
}

/**
 * No usable request timestamp
 */
export class ClockSourceError extends SignerError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'clock_source_error',
      stage: 'clock',
      isRetryable: false,
    });
    this.name = 'ClockSourceError';
    Object.setPrototypeOf(this, ClockSourceError.prototype);
  }

  /**
   * The clock returned something that is not a valid date
   */
  static invalidTimestamp(value: unknown): ClockSourceError {
    return new ClockSourceError({
      message: `Request timestamp is not a valid date: ${String(value)}`,
      code: 'INVALID_TIMESTAMP',
    });
  }

  /**
   * The clock threw instead of returning a date
   */
  static unavailable(cause: unknown): ClockSourceError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ClockSourceError({
      message: `Request timestamp unavailable: ${reason}`,
      code: 'CLOCK_UNAVAILABLE',
      cause,
    });
  }
}

/**
 * Invalid uploader configuration
 */
export class ConfigError extends SignerError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'config_error',
      stage: 'config',
      isRetryable: false,
    });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  /**
   * Invalid configuration parameter
   */
  static invalidConfig(paramName: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid configuration parameter: ${paramName}`,
      code: 'INVALID_CONFIG',
      details: { paramName },
    });
  }
}

/**
 * The request never produced an HTTP response
 */
export class TransportError extends SignerError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'transport_error',
      stage: 'transport',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  /**
   * Request timed out
   */
  static timeout(timeoutMs: number): TransportError {
    return new TransportError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'TIMEOUT',
      details: { timeoutMs },
    });
  }

  /**
   * Connection could not be established or was dropped
   */
  static connectionFailed(message: string, cause?: unknown): TransportError {
    return new TransportError({
      message: `Connection failed: ${message}`,
      code: 'CONNECTION_FAILED',
      cause,
    });
  }
}

/**
 * The object store answered with a non-2xx status
 */
export class UploadRejectedError extends SignerError {
  constructor(params: CategoryParams & { status: number }) {
    super({
      ...params,
      type: 'upload_rejected',
      stage: 'transport',
      isRetryable: params.isRetryable ?? isRetryableStatus(params.status),
    });
    this.name = 'UploadRejectedError';
    Object.setPrototypeOf(this, UploadRejectedError.prototype);
  }
}

/**
 * Throttling and server-side failures may succeed on a later attempt
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}
