/**
 * XML parsing for S3 error responses
 */

import { isRecord, parseXml } from './parser.js';

/**
 * Parsed error information from an S3 response
 */
export interface ParsedError {
  /**
   * Error code (e.g., 'SignatureDoesNotMatch', 'AccessDenied')
   */
  readonly code: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * Request ID for debugging
   */
  readonly requestId?: string;

  /**
   * Resource that caused the error
   */
  readonly resource?: string;

  /**
   * Host ID for debugging
   */
  readonly hostId?: string;

  /**
   * String to sign the server computed; present on SignatureDoesNotMatch
   */
  readonly stringToSign?: string;

  /**
   * Canonical request the server computed; present on SignatureDoesNotMatch
   */
  readonly canonicalRequest?: string;
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value === '' ? undefined : value;
  }
  if (isRecord(value) && typeof value['#text'] === 'string') {
    return value['#text'];
  }
  return undefined;
}

/**
 * Parses an S3 error XML body
 *
 * @returns Parsed error, or undefined when the body is not an S3 error document
 *
 * @example
 * ```typescript
 * const error = parseErrorResponse(`
 *   <Error>
 *     <Code>SignatureDoesNotMatch</Code>
 *     <Message>The request signature we calculated does not match the signature you provided.</Message>
 *     <RequestId>4442587FB7D0A2F9</RequestId>
 *   </Error>
 * `);
 * error?.code; // 'SignatureDoesNotMatch'
 * ```
 */
export function parseErrorResponse(xml: string): ParsedError | undefined {
  if (!xml.includes('<Error')) {
    return undefined;
  }

  let parsed: Record<string, unknown>;
  try {
    parsed = parseXml(xml);
  } catch {
    // Not XML; the caller falls back to the HTTP status
    return undefined;
  }

  const error = parsed['Error'];
  if (!isRecord(error)) {
    return undefined;
  }

  const code = text(error['Code']);
  if (!code) {
    return undefined;
  }

  return {
    code,
    message: text(error['Message']) ?? code,
    requestId: text(error['RequestId']),
    resource: text(error['Resource']),
    hostId: text(error['HostId']),
    stringToSign: text(error['StringToSign']),
    canonicalRequest: text(error['CanonicalRequest']),
  };
}

/**
 * Creates a user-friendly error message from parsed error
 *
 * @example
 * ```typescript
 * formatErrorMessage({ code: 'NoSuchBucket', message: 'The specified bucket does not exist', requestId: 'R1' });
 * // 'NoSuchBucket: The specified bucket does not exist (RequestId: R1)'
 * ```
 */
export function formatErrorMessage(error: ParsedError): string {
  let message = `${error.code}: ${error.message}`;

  if (error.requestId) {
    message += ` (RequestId: ${error.requestId})`;
  }

  if (error.resource) {
    message += ` [Resource: ${error.resource}]`;
  }

  return message;
}
