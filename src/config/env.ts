/**
 * Environment variable configuration loading
 * @module s3-upload-signer/config/env
 */

import { ConfigError } from '../errors/index.js';
import { isLogLevel, type LogLevel } from '../observability/index.js';
import type { NormalizedUploaderConfig, UploaderConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names for uploader configuration.
 */
export const ENV_VARS = {
  REGION: 'AWS_REGION',
  DEFAULT_REGION: 'AWS_DEFAULT_REGION',
  BUCKET: 'S3_BUCKET',
  ENDPOINT: 'S3_ENDPOINT',
  FORCE_PATH_STYLE: 'S3_FORCE_PATH_STYLE',
  STORAGE_CLASS: 'S3_STORAGE_CLASS',
  TIMEOUT_MS: 'S3_TIMEOUT_MS',
  CONCURRENCY: 'S3_CONCURRENCY',
  LOG_LEVEL: 'S3_LOG_LEVEL',
} as const;

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Parses an integer from an environment variable.
 *
 * @throws {ConfigError} If value is not a valid integer
 */
function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError({
      message: `${name} must be a valid integer, got: ${value}`,
      code: 'INVALID_INTEGER',
      details: { name },
    });
  }

  return parseInt(value, 10);
}

/**
 * Parses a boolean flag (`true`/`false`/`1`/`0`).
 *
 * @throws {ConfigError} If value is not a recognised flag
 */
function parseBoolEnv(value: string | undefined, name: string): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }

  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigError({
        message: `${name} must be true or false, got: ${value}`,
        code: 'INVALID_BOOLEAN',
        details: { name },
      });
  }
}

function parseLogLevelEnv(value: string | undefined, name: string): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }

  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError({
      message: `${name} must be one of error, warn, info, debug, trace, got: ${value}`,
      code: 'INVALID_LOG_LEVEL',
      details: { name },
    });
  }
  return level;
}

/**
 * Creates uploader configuration from environment variables.
 *
 * Environment variables:
 * - AWS_REGION (required, AWS_DEFAULT_REGION as fallback)
 * - S3_BUCKET (required)
 * - S3_ENDPOINT (optional): custom endpoint URL
 * - S3_FORCE_PATH_STYLE (optional): true/false
 * - S3_STORAGE_CLASS (optional): default storage class
 * - S3_TIMEOUT_MS (optional): request timeout in milliseconds
 * - S3_CONCURRENCY (optional): concurrent batch uploads
 * - S3_LOG_LEVEL (optional): console log level
 *
 * Credentials are not read here; see EnvironmentCredentialsProvider.
 *
 * @param env - Environment to read from (defaults to process.env)
 * @throws {ConfigError} If variables are missing or invalid
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): NormalizedUploaderConfig {
  const config: Partial<UploaderConfig> = {
    region: readEnv(env, ENV_VARS.REGION) ?? readEnv(env, ENV_VARS.DEFAULT_REGION),
    bucket: readEnv(env, ENV_VARS.BUCKET),
    endpoint: readEnv(env, ENV_VARS.ENDPOINT),
    forcePathStyle: parseBoolEnv(readEnv(env, ENV_VARS.FORCE_PATH_STYLE), ENV_VARS.FORCE_PATH_STYLE),
    storageClass: readEnv(env, ENV_VARS.STORAGE_CLASS),
    timeout: parseIntEnv(readEnv(env, ENV_VARS.TIMEOUT_MS), ENV_VARS.TIMEOUT_MS),
    concurrency: parseIntEnv(readEnv(env, ENV_VARS.CONCURRENCY), ENV_VARS.CONCURRENCY),
    logLevel: parseLogLevelEnv(readEnv(env, ENV_VARS.LOG_LEVEL), ENV_VARS.LOG_LEVEL),
  };

  return normalizeConfig(config);
}
