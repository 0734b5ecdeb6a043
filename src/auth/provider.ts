/**
 * Credential provider implementations
 * @module s3-upload-signer/auth/provider
 */

import { MissingCredentialError } from '../errors/index.js';
import type { Credentials, CredentialsProvider } from './types.js';

/**
 * Throws MissingCredentialError unless both key fields are non-empty.
 *
 * @param credentials - Candidate credentials
 * @param source - Where the credentials came from, for the error message
 */
export function validateCredentials(
  credentials: Partial<Credentials> | undefined,
  source?: string
): asserts credentials is Credentials {
  if (!credentials?.accessKeyId || credentials.accessKeyId.trim() === '') {
    throw MissingCredentialError.missingField('accessKeyId', source);
  }
  if (!credentials.secretAccessKey || credentials.secretAccessKey.trim() === '') {
    throw MissingCredentialError.missingField('secretAccessKey', source);
  }
}

/**
 * Static provider using fixed credentials.
 */
export class StaticCredentialsProvider implements CredentialsProvider {
  private readonly credentials: Credentials;

  /**
   * @throws {MissingCredentialError} If a key field is empty
   */
  constructor(credentials: Credentials) {
    validateCredentials(credentials);
    this.credentials = { ...credentials };
  }

  async getCredentials(): Promise<Credentials> {
    return this.credentials;
  }
}

/**
 * Environment-based provider.
 *
 * Environment variables:
 * - AWS_ACCESS_KEY_ID (required)
 * - AWS_SECRET_ACCESS_KEY (required)
 * - AWS_SESSION_TOKEN (optional)
 */
export class EnvironmentCredentialsProvider implements CredentialsProvider {
  static readonly ENV_VARS = {
    ACCESS_KEY_ID: 'AWS_ACCESS_KEY_ID',
    SECRET_ACCESS_KEY: 'AWS_SECRET_ACCESS_KEY',
    SESSION_TOKEN: 'AWS_SESSION_TOKEN',
  } as const;

  private readonly env: NodeJS.ProcessEnv;

  /**
   * @param env - Environment to read from (defaults to process.env)
   */
  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  /**
   * Reads credentials on every call, so rotated values are picked up.
   */
  async getCredentials(): Promise<Credentials> {
    const vars = EnvironmentCredentialsProvider.ENV_VARS;
    const candidate = {
      accessKeyId: this.env[vars.ACCESS_KEY_ID],
      secretAccessKey: this.env[vars.SECRET_ACCESS_KEY],
    };

    validateCredentials(candidate, 'the environment');

    const sessionToken = this.env[vars.SESSION_TOKEN];
    return sessionToken
      ? { ...candidate, sessionToken }
      : candidate;
  }
}
