/**
 * Object uploads with Signature V4 authentication
 */

import type { CredentialsProvider } from '../auth/index.js';
import {
  validateBucketName,
  validateConcurrency,
  type NormalizedUploaderConfig,
} from '../config/index.js';
import {
  InvalidRequestDescriptorError,
  SignerError,
  UploadRejectedError,
  isSignerError,
} from '../errors/index.js';
import { createLogger, logError, type Logger } from '../observability/index.js';
import { readPayload, toPayloadSource } from '../payload/index.js';
import {
  SigV4Signer,
  SigningKeyCache,
  getCanonicalUri,
  type PresignedUrlResult,
} from '../signing/index.js';
import {
  FetchTransport,
  getETag,
  getRequestId,
  isSuccessResponse,
  type HttpResponse,
  type HttpTransport,
} from '../transport/index.js';
import { formatErrorMessage, parseErrorResponse } from '../xml/index.js';
import { runWithConcurrency } from './pool.js';
import type {
  BatchUploadOptions,
  BatchUploadResult,
  PreparedUpload,
  UploadRequest,
  UploadResult,
} from './types.js';

export interface ObjectUploaderOptions {
  config: NormalizedUploaderConfig;
  credentials: CredentialsProvider;
  /** default: FetchTransport with the configured timeout */
  transport?: HttpTransport;
  /** Signing keys shared across uploads; one per uploader when omitted */
  keyCache?: SigningKeyCache;
  /** Source of request timestamps (default: current time) */
  clock?: () => Date;
  /** default: console logger at config.logLevel, or no logging */
  logger?: Logger;
}

interface ObjectLocation {
  bucket: string;
  key: string;
  host: string;
  path: string;
}

/**
 * Prepares, signs and sends object PUT requests
 *
 * Request flow:
 * 1. Resolve credentials and read the payload bytes
 * 2. Build the object location (virtual-hosted or path-style)
 * 3. Sign content-length, storage class, metadata and caller headers
 * 4. Send via HttpTransport with the signed headers unmodified
 * 5. Map non-2xx responses to UploadRejectedError
 */
export class ObjectUploader {
  private readonly config: NormalizedUploaderConfig;
  private readonly credentials: CredentialsProvider;
  private readonly transport: HttpTransport;
  private readonly keyCache: SigningKeyCache;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: ObjectUploaderOptions) {
    this.config = options.config;
    this.credentials = options.credentials;
    this.transport = options.transport ?? new FetchTransport({ timeout: options.config.timeout });
    this.keyCache = options.keyCache ?? new SigningKeyCache();
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger(options.config.logLevel);
  }

  /**
   * Reads the payload and signs the PUT without sending it
   */
  async prepare(request: UploadRequest): Promise<PreparedUpload> {
    const location = this.locate(request.bucket, request.key);
    const body = await readPayload(toPayloadSource(request.body));
    const signer = await this.createSigner();

    const signing = signer.sign({
      method: 'PUT',
      host: location.host,
      path: location.path,
      headers: this.buildHeaders(request, body),
      payload: body,
    });

    return {
      method: 'PUT',
      url: this.buildUrl(location),
      bucket: location.bucket,
      key: location.key,
      headers: signing.headers,
      body,
      signing,
    };
  }

  /**
   * Uploads one object
   *
   * @throws {SignerError} Typed by the stage that failed
   */
  async upload(request: UploadRequest): Promise<UploadResult> {
    const startTime = Date.now();
    const context = { bucket: request.bucket ?? this.config.bucket, key: request.key };

    try {
      const prepared = await this.prepare(request);

      this.logger.info('Uploading object', { ...context, size: prepared.body.length });

      const response = await this.transport.send({
        method: prepared.method,
        url: prepared.url,
        headers: prepared.headers,
        body: prepared.body,
      });

      if (!isSuccessResponse(response)) {
        throw this.rejection(response, prepared);
      }

      const result: UploadResult = {
        bucket: prepared.bucket,
        key: prepared.key,
        status: response.status,
        size: prepared.body.length,
        eTag: getETag(response.headers),
        requestId: getRequestId(response.headers),
      };

      this.logger.info('Upload completed', {
        ...context,
        status: result.status,
        eTag: result.eTag,
        durationMs: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      logError(this.logger, 'Upload', error, context);
      throw error;
    }
  }

  /**
   * Uploads many objects through a bounded worker pool
   *
   * Each item is signed on its own; one failure leaves the others alone.
   * Results are returned in input order.
   */
  async uploadBatch(
    requests: readonly UploadRequest[],
    options: BatchUploadOptions = {}
  ): Promise<BatchUploadResult[]> {
    const concurrency = options.concurrency ?? this.config.concurrency;
    validateConcurrency(concurrency);
    const settled = await runWithConcurrency(
      requests,
      concurrency,
      (request) => this.upload(request),
      options.onProgress
    );

    return settled.map((outcome, index): BatchUploadResult => {
      const request = requests[index];
      if (outcome.status === 'fulfilled') {
        return { status: 'fulfilled', request, value: outcome.value };
      }
      return { status: 'rejected', request, error: toSignerError(outcome.reason) };
    });
  }

  /**
   * Presigned GET or PUT URL for an object
   */
  async presign(
    key: string,
    method: 'GET' | 'PUT',
    expiresIn: number,
    bucket?: string
  ): Promise<PresignedUrlResult> {
    const location = this.locate(bucket, key);
    const signer = await this.createSigner();
    return signer.presignUrl({
      method,
      host: location.host,
      path: location.path,
      expiresIn,
      protocol: this.config.protocol,
    });
  }

  /**
   * Closes the underlying transport
   */
  async close(): Promise<void> {
    await this.transport.close();
  }

  private async createSigner(): Promise<SigV4Signer> {
    const credentials = await this.credentials.getCredentials();
    return new SigV4Signer({
      credentials,
      region: this.config.region,
      service: this.config.service,
      signPayloadHeader: this.config.signPayloadHeader,
      keyCache: this.keyCache,
      clock: this.clock,
      logger: this.logger,
    });
  }

  private locate(bucket: string | undefined, key: string): ObjectLocation {
    if (!key) {
      throw InvalidRequestDescriptorError.missingField('key');
    }
    if (key.split('/').some((segment) => segment === '.' || segment === '..')) {
      throw InvalidRequestDescriptorError.dotSegment(key);
    }
    const targetBucket = bucket ?? this.config.bucket;
    validateBucketName(targetBucket);

    if (this.config.forcePathStyle) {
      return {
        bucket: targetBucket,
        key,
        host: this.config.host,
        path: `/${targetBucket}/${key}`,
      };
    }
    return {
      bucket: targetBucket,
      key,
      host: `${targetBucket}.${this.config.host}`,
      path: `/${key}`,
    };
  }

  private buildUrl(location: ObjectLocation): string {
    return `${this.config.protocol}://${location.host}${getCanonicalUri(location.path)}`;
  }

  private buildHeaders(request: UploadRequest, body: Uint8Array): Record<string, string> {
    const headers: Record<string, string> = { ...request.headers };

    headers['content-length'] = String(body.length);

    if (request.contentType) {
      headers['content-type'] = request.contentType;
    }

    const storageClass = request.storageClass ?? this.config.storageClass;
    if (storageClass) {
      headers['x-amz-storage-class'] = storageClass;
    }

    if (request.metadata) {
      for (const [name, value] of Object.entries(request.metadata)) {
        headers[`x-amz-meta-${name.toLowerCase()}`] = value;
      }
    }

    return headers;
  }

  private rejection(response: HttpResponse, prepared: PreparedUpload): UploadRejectedError {
    const parsed = parseErrorResponse(new TextDecoder().decode(response.body));
    const requestId = parsed?.requestId ?? getRequestId(response.headers);

    const details: Record<string, unknown> = {
      bucket: prepared.bucket,
      key: prepared.key,
    };
    // Put both sides next to each other for signature mismatches
    if (parsed && (parsed.canonicalRequest || parsed.stringToSign)) {
      details['serverCanonicalRequest'] = parsed.canonicalRequest;
      details['serverStringToSign'] = parsed.stringToSign;
      details['clientCanonicalRequest'] = prepared.signing.canonicalRequest;
      details['clientStringToSign'] = prepared.signing.stringToSign;
    }

    return new UploadRejectedError({
      message: parsed
        ? formatErrorMessage(parsed)
        : `Upload of ${prepared.key} failed with HTTP ${response.status}`,
      code: parsed?.code ?? `HTTP_${response.status}`,
      status: response.status,
      requestId,
      details,
    });
  }
}

function toSignerError(error: unknown): SignerError {
  if (isSignerError(error)) {
    return error;
  }
  return new SignerError({
    type: 'unexpected_error',
    stage: 'transport',
    message: error instanceof Error ? error.message : String(error),
    isRetryable: false,
    cause: error,
  });
}
