/**
 * Credentials module
 * @module s3-upload-signer/auth
 */

export type { Credentials, CredentialsProvider } from './types.js';

export {
  StaticCredentialsProvider,
  EnvironmentCredentialsProvider,
  validateCredentials,
} from './provider.js';
