import { describe, it, expect, vi } from 'vitest';
import { FetchTransport } from './fetch-transport.js';
import { getETag, getHeader, getRequestId, isSuccessResponse } from './types.js';
import { TransportError } from '../errors/index.js';

describe('FetchTransport', () => {
  it('should send headers and body unmodified', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      new Response('', { status: 200, headers: { ETag: '"abc123"', 'x-amz-request-id': 'req-1' } })
    );
    const transport = new FetchTransport({ timeout: 1000, fetch: fetchImpl });
    const body = new Uint8Array([104, 105]);

    const response = await transport.send({
      method: 'PUT',
      url: 'https://my-bucket.s3.us-east-1.amazonaws.com/notes/hi.txt',
      headers: { authorization: 'AWS4-HMAC-SHA256 Credential=x', 'content-length': '2' },
      body,
    });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://my-bucket.s3.us-east-1.amazonaws.com/notes/hi.txt');
    expect(init?.method).toBe('PUT');
    expect(init?.headers).toEqual({
      authorization: 'AWS4-HMAC-SHA256 Credential=x',
      'content-length': '2',
    });
    expect(init?.body).toBe(body);

    expect(response.status).toBe(200);
    expect(response.headers['etag']).toBe('"abc123"');
    expect(getETag(response.headers)).toBe('abc123');
    expect(getRequestId(response.headers)).toBe('req-1');
  });

  it('should return error responses instead of throwing', async () => {
    const transport = new FetchTransport({
      timeout: 1000,
      fetch: async () => new Response('<Error><Code>AccessDenied</Code></Error>', { status: 403 }),
    });

    const response = await transport.send({ method: 'PUT', url: 'https://h/k', headers: {} });

    expect(response.status).toBe(403);
    expect(isSuccessResponse(response)).toBe(false);
    expect(new TextDecoder().decode(response.body)).toBe('<Error><Code>AccessDenied</Code></Error>');
  });

  it('should map an aborted request to a timeout', async () => {
    const transport = new FetchTransport({
      timeout: 10,
      fetch: (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const error = new Error('The operation was aborted');
            error.name = 'AbortError';
            reject(error);
          });
        }),
    });

    const error: unknown = await transport
      .send({ method: 'PUT', url: 'https://h/k', headers: {} })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ code: 'TIMEOUT', isRetryable: true });
  });

  it('should map network failures to connection errors', async () => {
    const transport = new FetchTransport({
      timeout: 1000,
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });

    await expect(
      transport.send({ method: 'PUT', url: 'https://h/k', headers: {} })
    ).rejects.toThrow('Connection failed: fetch failed');
  });
});

describe('getHeader', () => {
  it('should match names case-insensitively', () => {
    expect(getHeader({ 'Content-Type': 'text/plain' }, 'content-type')).toBe('text/plain');
    expect(getHeader({}, 'etag')).toBeUndefined();
  });
});
