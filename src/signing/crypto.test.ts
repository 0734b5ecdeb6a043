/**
 * Tests for SHA-256 and HMAC-SHA256 primitives
 */

import { describe, it, expect } from 'vitest';
import { hmacSha256, hmacSha256Hex, sha256Hash, sha256Hex, toHex } from './crypto.js';

describe('sha256Hex', () => {
  it('should hash the empty byte sequence', () => {
    expect(sha256Hex(new Uint8Array(0))).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('should hash strings as UTF-8', () => {
    expect(sha256Hex('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });

  it('should hash non-UTF-8 bytes as given', () => {
    const payload = new Uint8Array([0xff, 0xfe, 0x00, 0x80]);
    expect(sha256Hex(payload)).toBe(
      '5a741968f40e57485ed6e1a1af381adeb2714223c35acedf1ad0670e42df2eb5'
    );
  });

  it('should change when a single byte changes', () => {
    expect(sha256Hex(new Uint8Array([0xff, 0xfd, 0x00, 0x80]))).toBe(
      '33c616f209701a0706e046e3427696f10712fe51607168ccbb4f34c1575ca1a2'
    );
  });
});

describe('sha256Hash', () => {
  it('should return 32 raw bytes', () => {
    const digest = sha256Hash('abc');
    expect(digest).toBeInstanceOf(Uint8Array);
    expect(digest.length).toBe(32);
    expect(toHex(digest)).toBe(sha256Hex('abc'));
  });
});

describe('hmacSha256', () => {
  it('should match RFC 4231 test case 2', () => {
    const key = new TextEncoder().encode('Jefe');
    expect(hmacSha256Hex(key, 'what do ya want for nothing?')).toBe(
      '5bdcc146bf60754e6a042426089575c75a003f089d2739839dec58b964ec3843'
    );
  });

  it('should return 32 raw bytes', () => {
    const mac = hmacSha256(new Uint8Array([1, 2, 3]), 'message');
    expect(mac.length).toBe(32);
  });
});

describe('toHex', () => {
  it('should produce lowercase, zero-padded hex', () => {
    expect(toHex(new Uint8Array([0x00, 0x0f, 0xab, 0xff]))).toBe('000fabff');
  });
});
