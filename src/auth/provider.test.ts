import { describe, it, expect } from 'vitest';
import {
  EnvironmentCredentialsProvider,
  StaticCredentialsProvider,
  validateCredentials,
} from './provider.js';
import { MissingCredentialError } from '../errors/index.js';

describe('validateCredentials', () => {
  it('should accept both key fields', () => {
    expect(() =>
      validateCredentials({ accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' })
    ).not.toThrow();
  });

  it('should reject an undefined value', () => {
    expect(() => validateCredentials(undefined)).toThrow(MissingCredentialError);
  });

  it('should reject a blank access key id', () => {
    try {
      validateCredentials({ accessKeyId: '  ', secretAccessKey: 'test-secret' });
      expect.fail('expected validateCredentials to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(MissingCredentialError);
      expect(error).toMatchObject({ code: 'MISSING_ACCESS_KEY_ID', stage: 'credentials' });
    }
  });

  it('should name the source of a missing secret', () => {
    expect(() => validateCredentials({ accessKeyId: 'test-access-key' }, 'the environment')).toThrow(
      'secretAccessKey is required but was not provided by the environment'
    );
  });
});

describe('StaticCredentialsProvider', () => {
  it('should return the configured credentials', async () => {
    const provider = new StaticCredentialsProvider({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-session-token',
    });

    await expect(provider.getCredentials()).resolves.toEqual({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-session-token',
    });
  });

  it('should reject empty credentials at construction', () => {
    expect(
      () => new StaticCredentialsProvider({ accessKeyId: 'test-access-key', secretAccessKey: '' })
    ).toThrow(MissingCredentialError);
  });
});

describe('EnvironmentCredentialsProvider', () => {
  it('should read keys and session token', async () => {
    const provider = new EnvironmentCredentialsProvider({
      AWS_ACCESS_KEY_ID: 'test-access-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_SESSION_TOKEN: 'test-session-token',
    });

    await expect(provider.getCredentials()).resolves.toEqual({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-session-token',
    });
  });

  it('should omit an absent session token', async () => {
    const provider = new EnvironmentCredentialsProvider({
      AWS_ACCESS_KEY_ID: 'test-access-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
    });

    const credentials = await provider.getCredentials();
    expect(credentials).toEqual({ accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' });
    expect('sessionToken' in credentials).toBe(false);
  });

  it('should pick up rotated values on each call', async () => {
    const env: NodeJS.ProcessEnv = {
      AWS_ACCESS_KEY_ID: 'test-access-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
    };
    const provider = new EnvironmentCredentialsProvider(env);

    await provider.getCredentials();
    env.AWS_SECRET_ACCESS_KEY = 'rotated-secret';

    await expect(provider.getCredentials()).resolves.toMatchObject({
      secretAccessKey: 'rotated-secret',
    });
  });

  it('should reject when a key is missing', async () => {
    const provider = new EnvironmentCredentialsProvider({ AWS_SECRET_ACCESS_KEY: 'test-secret' });
    await expect(provider.getCredentials()).rejects.toThrow(MissingCredentialError);
  });
});
