import { describe, it, expect } from 'vitest';
import { createScope, formatScope } from './scope.js';
import { createStringToSign } from './string-to-sign.js';
import { UnsupportedRegionOrServiceError } from '../errors/index.js';

describe('createScope', () => {
  it('should take the date from the UTC day of the timestamp', () => {
    const scope = createScope(new Date('2021-01-31T23:59:59Z'), 'us-east-1', 's3');
    expect(formatScope(scope)).toBe('20210131/us-east-1/s3/aws4_request');
  });

  it('should reject blank region and service', () => {
    expect(() => createScope(new Date(0), ' ', 's3')).toThrow(UnsupportedRegionOrServiceError);
    expect(() => createScope(new Date(0), 'us-east-1', '')).toThrow(UnsupportedRegionOrServiceError);
  });
});

describe('createStringToSign', () => {
  it('should hash the canonical request', () => {
    const scope = createScope(new Date('2015-08-30T12:36:00Z'), 'us-east-1', 'service');
    const canonicalRequest = [
      'GET',
      '/',
      '',
      'host:example.amazonaws.com',
      'x-amz-date:20150830T123600Z',
      '',
      'host;x-amz-date',
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    ].join('\n');

    expect(createStringToSign('20150830T123600Z', scope, canonicalRequest)).toBe(
      'AWS4-HMAC-SHA256\n20150830T123600Z\n20150830/us-east-1/service/aws4_request\n' +
        'bb579772317eb040ac9ed261061d46c1f17a8133879d6129b6e1c25292927e63'
    );
  });
});
