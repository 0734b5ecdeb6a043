/**
 * Fetch-based HTTP transport implementation
 */

import { TransportError } from '../errors/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Request timeout in milliseconds */
  timeout: number;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

/**
 * Fetch-based HTTP transport implementation
 *
 * Uses the Fetch API built into Node.js. Headers are passed through
 * untouched, since any change after signing breaks the signature.
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;

  constructor(options: FetchTransportOptions) {
    this.options = options;
  }

  /**
   * Sends an HTTP request and returns buffered response
   */
  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);
    const fetchImpl = this.options.fetch ?? fetch;

    try {
      const response = await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const arrayBuffer = await response.arrayBuffer();

      return {
        status: response.status,
        headers: this.convertHeaders(response.headers),
        body: new Uint8Array(arrayBuffer),
      };
    } catch (error) {
      throw this.handleError(error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Closes the transport (no-op for fetch-based transport)
   */
  async close(): Promise<void> {
    // Fetch API doesn't require explicit cleanup
  }

  /**
   * Converts Headers object to plain object
   */
  private convertHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key] = value;
    });
    return result;
  }

  /**
   * Handles errors from fetch operations
   */
  private handleError(error: unknown): TransportError {
    if (error instanceof TransportError) {
      return error;
    }

    if (error instanceof Error) {
      if (error.name === 'AbortError' || error.name === 'TimeoutError') {
        return TransportError.timeout(this.options.timeout);
      }
      return TransportError.connectionFailed(error.message, error);
    }

    return TransportError.connectionFailed(String(error), error);
  }
}
