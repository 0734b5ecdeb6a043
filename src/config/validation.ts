/**
 * Configuration validation and normalization
 * @module s3-upload-signer/config/validation
 */

import { ConfigError } from '../errors/index.js';
import { validateRegionAndService } from '../signing/scope.js';
import type { NormalizedUploaderConfig, UploaderConfig } from './types.js';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_SERVICE,
  DEFAULT_TIMEOUT,
  MAX_CONCURRENCY,
  defaultEndpoint,
} from './defaults.js';

const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

/**
 * Parses and checks an endpoint URL.
 *
 * @throws {ConfigError} If the URL is invalid or carries a path, query or credentials
 */
function parseEndpoint(endpoint: string): URL {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new ConfigError({
      message: `Invalid endpoint URL: ${error instanceof Error ? error.message : 'unknown error'}`,
      code: 'INVALID_ENDPOINT',
      details: { endpoint },
    });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError({
      message: 'endpoint must use http or https protocol',
      code: 'INVALID_ENDPOINT_PROTOCOL',
      details: { endpoint },
    });
  }

  if ((url.pathname !== '' && url.pathname !== '/') || url.search || url.hash) {
    throw new ConfigError({
      message: 'endpoint must not include a path, query or fragment',
      code: 'INVALID_ENDPOINT',
      details: { endpoint },
    });
  }

  if (url.username || url.password) {
    throw new ConfigError({
      message: 'endpoint must not embed credentials',
      code: 'INVALID_ENDPOINT',
    });
  }

  return url;
}

/**
 * Checks a bucket name against the DNS-compatible naming rules.
 *
 * @throws {ConfigError} If the name is missing or invalid
 */
export function validateBucketName(bucket: string | undefined): asserts bucket is string {
  if (!bucket) {
    throw new ConfigError({
      message: 'bucket is required',
      code: 'MISSING_BUCKET',
    });
  }

  if (!BUCKET_NAME_PATTERN.test(bucket)) {
    throw new ConfigError({
      message: `Invalid bucket name: ${bucket}`,
      code: 'INVALID_BUCKET',
      details: { bucket },
    });
  }
}

/**
 * @throws {ConfigError} Unless the value is an integer in 1..MAX_CONCURRENCY
 */
export function validateConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new ConfigError({
      message: 'concurrency must be a positive integer',
      code: 'INVALID_CONCURRENCY',
    });
  }
  if (concurrency > MAX_CONCURRENCY) {
    throw new ConfigError({
      message: `concurrency must not exceed ${MAX_CONCURRENCY}`,
      code: 'CONCURRENCY_TOO_HIGH',
    });
  }
}

/**
 * Validates uploader configuration.
 *
 * @throws {UnsupportedRegionOrServiceError} If region or service is empty
 * @throws {ConfigError} If any other parameter is invalid
 */
export function validateConfig(config: Partial<UploaderConfig>): void {
  validateRegionAndService(config.region ?? '', config.service ?? DEFAULT_SERVICE);

  validateBucketName(config.bucket);

  if (config.endpoint !== undefined) {
    parseEndpoint(config.endpoint);
  }

  if (config.storageClass !== undefined && config.storageClass.trim() === '') {
    throw ConfigError.invalidConfig('storageClass', 'storageClass must not be empty');
  }

  if (config.timeout !== undefined) {
    if (!Number.isInteger(config.timeout) || config.timeout <= 0) {
      throw new ConfigError({
        message: 'timeout must be a positive integer',
        code: 'INVALID_TIMEOUT',
      });
    }
  }

  if (config.concurrency !== undefined) {
    validateConcurrency(config.concurrency);
  }
}

/**
 * Normalizes uploader configuration by validating and applying defaults.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function normalizeConfig(config: Partial<UploaderConfig>): NormalizedUploaderConfig {
  validateConfig(config);

  // validateConfig guarantees both
  const region = config.region ?? '';
  const bucket = config.bucket ?? '';

  const url = parseEndpoint(config.endpoint ?? defaultEndpoint(region));

  return {
    region,
    bucket,
    service: config.service ?? DEFAULT_SERVICE,
    endpoint: `${url.protocol}//${url.host}`,
    protocol: url.protocol === 'http:' ? 'http' : 'https',
    host: url.host,
    forcePathStyle: config.forcePathStyle ?? false,
    storageClass: config.storageClass,
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    concurrency: config.concurrency ?? DEFAULT_CONCURRENCY,
    signPayloadHeader: config.signPayloadHeader ?? true,
    logLevel: config.logLevel,
  };
}
