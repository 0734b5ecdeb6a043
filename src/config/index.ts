/**
 * Configuration module
 * @module s3-upload-signer/config
 */

export type { UploaderConfig, NormalizedUploaderConfig } from './types.js';

export {
  DEFAULT_SERVICE,
  DEFAULT_TIMEOUT,
  DEFAULT_CONCURRENCY,
  MAX_CONCURRENCY,
  defaultEndpoint,
} from './defaults.js';

export {
  validateConfig,
  normalizeConfig,
  validateBucketName,
  validateConcurrency,
} from './validation.js';

export { UploaderConfigBuilder } from './builder.js';

export { createConfigFromEnv, ENV_VARS } from './env.js';
