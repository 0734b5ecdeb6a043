/**
 * Credential type definitions
 * @module s3-upload-signer/auth/types
 */

/**
 * Access credentials used to sign requests. Never logged.
 */
export interface Credentials {
  /**
   * Access key ID, embedded in the Authorization header.
   */
  readonly accessKeyId: string;

  /**
   * Secret access key, only ever used to derive signing keys.
   */
  readonly secretAccessKey: string;

  /**
   * Session token for temporary credentials, sent as x-amz-security-token.
   */
  readonly sessionToken?: string;
}

/**
 * Provider interface for retrieving credentials.
 */
export interface CredentialsProvider {
  /**
   * Retrieves credentials.
   *
   * @throws {MissingCredentialError} If credentials are unavailable
   */
  getCredentials(): Promise<Credentials>;
}
