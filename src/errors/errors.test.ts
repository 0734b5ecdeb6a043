import { describe, it, expect } from 'vitest';
import {
  ClockSourceError,
  ConfigError,
  InvalidRequestDescriptorError,
  MissingCredentialError,
  PayloadReadError,
  SignerError,
  TransportError,
  UploadRejectedError,
  isRetryableStatus,
  isSignerError,
} from './index.js';

describe('SignerError', () => {
  it('should keep instanceof through subclasses', () => {
    const error = MissingCredentialError.missingField('accessKeyId');

    expect(error).toBeInstanceOf(MissingCredentialError);
    expect(error).toBeInstanceOf(SignerError);
    expect(error).toBeInstanceOf(Error);
    expect(isSignerError(error)).toBe(true);
    expect(isSignerError(new Error('plain'))).toBe(false);
  });

  it('should serialize to JSON without the cause', () => {
    const error = new UploadRejectedError({
      message: 'AccessDenied: Access Denied',
      code: 'AccessDenied',
      status: 403,
      requestId: 'req-1',
      cause: new Error('inner'),
    });

    expect(error.toJSON()).toEqual({
      name: 'UploadRejectedError',
      type: 'upload_rejected',
      stage: 'transport',
      message: 'AccessDenied: Access Denied',
      code: 'AccessDenied',
      status: 403,
      isRetryable: false,
      requestId: 'req-1',
      details: undefined,
    });
  });

  it('should format a readable string', () => {
    const error = new UploadRejectedError({
      message: 'SlowDown: Please reduce your request rate.',
      code: 'SlowDown',
      status: 503,
      requestId: 'req-2',
    });

    expect(error.toString()).toBe(
      'UploadRejectedError (transport) [SlowDown] (503) - SlowDown: Please reduce your request rate. (RequestId: req-2)'
    );
  });
});

describe('error categories', () => {
  it('should assign a stage to each category', () => {
    expect(MissingCredentialError.missingField('secretAccessKey').stage).toBe('credentials');
    expect(InvalidRequestDescriptorError.malformedPath('x').stage).toBe('canonicalization');
    expect(PayloadReadError.fromCause('file', new Error('boom')).stage).toBe('payload');
    expect(ClockSourceError.invalidTimestamp('x').stage).toBe('clock');
    expect(ConfigError.invalidConfig('bucket').stage).toBe('config');
    expect(TransportError.timeout(1000).stage).toBe('transport');
  });

  it('should describe payload read failures with their cause', () => {
    const cause = new Error('EACCES: permission denied');
    const error = PayloadReadError.fromCause('/tmp/data.bin', cause);

    expect(error.message).toBe(
      'Failed to read payload from /tmp/data.bin: EACCES: permission denied'
    );
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('PAYLOAD_READ_FAILED');
  });

  it('should treat transport failures as retryable', () => {
    expect(TransportError.timeout(5000).isRetryable).toBe(true);
    expect(TransportError.timeout(5000).message).toBe('Request timed out after 5000ms');
    expect(TransportError.connectionFailed('socket hang up').code).toBe('CONNECTION_FAILED');
  });

  it('should derive retryability of rejections from the status', () => {
    expect(new UploadRejectedError({ message: 'x', status: 503 }).isRetryable).toBe(true);
    expect(new UploadRejectedError({ message: 'x', status: 429 }).isRetryable).toBe(true);
    expect(new UploadRejectedError({ message: 'x', status: 403 }).isRetryable).toBe(false);
  });
});

describe('isRetryableStatus', () => {
  it('should match throttling and server errors', () => {
    expect(isRetryableStatus(429)).toBe(true);
    expect(isRetryableStatus(500)).toBe(true);
    expect(isRetryableStatus(400)).toBe(false);
    expect(isRetryableStatus(404)).toBe(false);
  });
});
