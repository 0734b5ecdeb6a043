/**
 * Error system for the S3 upload signer
 * @module s3-upload-signer/errors
 */

export { SignerError, isSignerError, type SignerErrorParams, type SignerStage } from './error.js';

export {
  ClockSourceError,
  ConfigError,
  InvalidRequestDescriptorError,
  MissingCredentialError,
  PayloadReadError,
  TransportError,
  UnsupportedRegionOrServiceError,
  UploadRejectedError,
  isRetryableStatus,
} from './categories.js';
