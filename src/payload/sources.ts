/**
 * Payload source implementations
 */

import { readFile, stat } from 'fs/promises';
import { basename } from 'path';
import { PayloadReadError } from '../errors/index.js';
import type { PayloadSource } from './types.js';

/**
 * In-memory payload
 */
export class BytesPayloadSource implements PayloadSource {
  readonly name: string;
  private readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array, name = '<memory>') {
    this.bytes = bytes;
    this.name = name;
  }

  async size(): Promise<number> {
    return this.bytes.length;
  }

  async read(): Promise<Uint8Array> {
    return this.bytes;
  }
}

/**
 * Payload read from a local file
 */
export class FilePayloadSource implements PayloadSource {
  readonly name: string;
  readonly path: string;

  constructor(path: string) {
    this.path = path;
    this.name = path;
  }

  /**
   * Last path segment, a natural default object key
   */
  get fileName(): string {
    return basename(this.path);
  }

  async size(): Promise<number> {
    const stats = await stat(this.path);
    if (!stats.isFile()) {
      throw new Error(`${this.path} is not a regular file`);
    }
    return stats.size;
  }

  /**
   * Reads the file as raw bytes; the size is checked against the file's
   * metadata so a file that changes mid-read is not uploaded half-written.
   */
  async read(): Promise<Uint8Array> {
    const expected = await this.size();
    const buffer = await readFile(this.path);
    if (buffer.length !== expected) {
      throw new Error(
        `${this.path} changed while being read (expected ${expected} bytes, read ${buffer.length})`
      );
    }
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }
}

/**
 * Reads a payload source, wrapping any failure in PayloadReadError
 */
export async function readPayload(source: PayloadSource): Promise<Uint8Array> {
  try {
    return await source.read();
  } catch (error) {
    if (error instanceof PayloadReadError) {
      throw error;
    }
    throw PayloadReadError.fromCause(source.name, error);
  }
}

/**
 * Accepts bytes or a source and returns a source
 */
export function toPayloadSource(body: PayloadSource | Uint8Array): PayloadSource {
  return body instanceof Uint8Array ? new BytesPayloadSource(body) : body;
}
