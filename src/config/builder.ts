/**
 * Fluent configuration builder
 * @module s3-upload-signer/config/builder
 */

import type { LogLevel } from '../observability/index.js';
import type { NormalizedUploaderConfig, UploaderConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Fluent builder for constructing uploader configuration.
 */
export class UploaderConfigBuilder {
  private config: Partial<UploaderConfig> = {};

  /**
   * Sets the region used in the credential scope.
   */
  region(region: string): this {
    this.config.region = region;
    return this;
  }

  /**
   * Sets the default target bucket.
   */
  bucket(bucket: string): this {
    this.config.bucket = bucket;
    return this;
  }

  /**
   * Sets the service name used in the credential scope.
   */
  service(service: string): this {
    this.config.service = service;
    return this;
  }

  /**
   * Sets a custom endpoint URL.
   *
   * @param url - Endpoint URL, e.g. `http://localhost:9000`
   * @param forcePathStyle - Address buckets in the path rather than the host
   */
  endpoint(url: string, forcePathStyle?: boolean): this {
    this.config.endpoint = url;
    if (forcePathStyle !== undefined) {
      this.config.forcePathStyle = forcePathStyle;
    }
    return this;
  }

  /**
   * Sets path-style addressing.
   */
  forcePathStyle(enabled = true): this {
    this.config.forcePathStyle = enabled;
    return this;
  }

  /**
   * Sets the default storage class.
   */
  storageClass(storageClass: string): this {
    this.config.storageClass = storageClass;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  /**
   * Sets the number of concurrent batch uploads.
   */
  concurrency(n: number): this {
    this.config.concurrency = n;
    return this;
  }

  /**
   * Enables or disables the signed `x-amz-content-sha256` header.
   */
  signPayloadHeader(enabled: boolean): this {
    this.config.signPayloadHeader = enabled;
    return this;
  }

  /**
   * Enables console logging at the given level.
   */
  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Builds and validates the configuration.
   *
   * @throws {ConfigError} If configuration is invalid
   */
  build(): NormalizedUploaderConfig {
    return normalizeConfig(this.config);
  }
}
