/**
 * Base error class for the S3 upload signer
 * @module s3-upload-signer/errors/error
 */

/**
 * Pipeline stage in which an error was raised
 */
export type SignerStage =
  | 'credentials'
  | 'config'
  | 'clock'
  | 'scope'
  | 'canonicalization'
  | 'payload'
  | 'transport';

/**
 * Parameters for creating a SignerError
 */
export interface SignerErrorParams {
  /**
   * Error kind, e.g. `missing_credential`
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * Stage of the signing/upload pipeline that failed
   */
  readonly stage: SignerStage;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * HTTP status code (transport errors only)
   */
  readonly status?: number;

  /**
   * Whether the caller may retry the surrounding operation
   */
  readonly isRetryable: boolean;

  /**
   * Request ID returned by the object store
   */
  readonly requestId?: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error, if any
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all signing and upload failures
 *
 * Carries the failing stage so that callers can tell bad credentials
 * from a bad request shape or an I/O failure; a rejected signature from
 * the object store says nothing about which input was wrong.
 */
export class SignerError extends Error {
  readonly type: string;

  readonly stage: SignerStage;

  readonly code?: string;

  readonly status?: number;

  readonly isRetryable: boolean;

  readonly requestId?: string;

  readonly details?: Record<string, unknown>;

  override readonly cause?: unknown;

  /**
   * Creates a new SignerError
   * @param params - Error parameters
   */
  constructor(params: SignerErrorParams) {
    super(params.message);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, SignerError.prototype);

    this.name = 'SignerError';
    this.type = params.type;
    this.stage = params.stage;
    this.code = params.code;
    this.status = params.status;
    this.isRetryable = params.isRetryable;
    this.requestId = params.requestId;
    this.details = params.details;
    this.cause = params.cause;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SignerError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      stage: this.stage,
      message: this.message,
      code: this.code,
      status: this.status,
      isRetryable: this.isRetryable,
      requestId: this.requestId,
      details: this.details,
    };
  }

  /**
   * Returns a string representation of the error
   */
  override toString(): string {
    const parts = [this.name, `(${this.stage})`];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    if (this.requestId) {
      parts.push(`(RequestId: ${this.requestId})`);
    }

    return parts.join(' ');
  }
}

/**
 * Type guard to check if an error is a SignerError
 */
export function isSignerError(error: unknown): error is SignerError {
  return error instanceof SignerError;
}
