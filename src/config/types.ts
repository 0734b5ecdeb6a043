/**
 * Configuration type definitions
 * @module s3-upload-signer/config/types
 */

import type { LogLevel } from '../observability/index.js';

/**
 * Uploader configuration parameters.
 */
export interface UploaderConfig {
  /**
   * Region used in the credential scope, e.g. `us-east-1`.
   */
  region: string;

  /**
   * Default target bucket.
   */
  bucket: string;

  /**
   * Service name used in the credential scope.
   * @default 's3'
   */
  service?: string;

  /**
   * Endpoint URL of the object store (scheme and host, optional port).
   * @default `https://s3.${region}.amazonaws.com`
   */
  endpoint?: string;

  /**
   * Address objects as `<endpoint>/<bucket>/<key>` instead of
   * `<bucket>.<endpoint host>/<key>`.
   * @default false
   */
  forcePathStyle?: boolean;

  /**
   * Default storage class sent as `x-amz-storage-class`.
   */
  storageClass?: string;

  /**
   * Request timeout in milliseconds.
   * @default 300000 (5 minutes)
   */
  timeout?: number;

  /**
   * Number of objects uploaded at once by batch uploads.
   * @default 4
   */
  concurrency?: number;

  /**
   * Sign and send `x-amz-content-sha256`. Required by S3, unknown to
   * most other services.
   * @default true
   */
  signPayloadHeader?: boolean;

  /**
   * Console log level; no logging when unset.
   */
  logLevel?: LogLevel;
}

/**
 * Normalized configuration with defaults applied.
 */
export interface NormalizedUploaderConfig {
  region: string;
  bucket: string;
  service: string;
  /**
   * Endpoint URL without a trailing slash.
   */
  endpoint: string;
  /**
   * `http` or `https`.
   */
  protocol: 'http' | 'https';
  /**
   * Endpoint host, including a non-default port.
   */
  host: string;
  forcePathStyle: boolean;
  storageClass?: string;
  timeout: number;
  concurrency: number;
  signPayloadHeader: boolean;
  logLevel?: LogLevel;
}
