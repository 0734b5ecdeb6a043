/**
 * Upload type definitions
 */

import type { SignerError } from '../errors/index.js';
import type { PayloadSource } from '../payload/index.js';
import type { SigningResult } from '../signing/index.js';

/**
 * A single object PUT
 */
export interface UploadRequest {
  /** Object key, without a leading slash */
  key: string;
  /** Body bytes or a source for them */
  body: PayloadSource | Uint8Array;
  /** Target bucket (default: from config) */
  bucket?: string;
  /** MIME type sent as content-type */
  contentType?: string;
  /** Storage class (default: from config) */
  storageClass?: string;
  /** Custom metadata, sent as x-amz-meta-* headers */
  metadata?: Record<string, string>;
  /** Further headers to sign and send */
  headers?: Record<string, string>;
}

/**
 * A signed request, ready for the transport
 */
export interface PreparedUpload {
  method: 'PUT';
  url: string;
  bucket: string;
  key: string;
  /** Signed headers, including authorization; send unmodified */
  headers: Record<string, string>;
  body: Uint8Array;
  signing: SigningResult;
}

export interface UploadResult {
  bucket: string;
  key: string;
  status: number;
  /** Bytes sent */
  size: number;
  eTag?: string;
  requestId?: string;
}

/**
 * Per-item outcome of a batch upload
 */
export type BatchUploadResult =
  | { status: 'fulfilled'; request: UploadRequest; value: UploadResult }
  | { status: 'rejected'; request: UploadRequest; error: SignerError };

export interface BatchUploadOptions {
  /** Concurrent uploads (default: from config) */
  concurrency?: number;
  /** Called after each item settles */
  onProgress?: (completed: number, total: number) => void;
}
