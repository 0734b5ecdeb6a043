/**
 * Payload source abstraction
 */

/**
 * Supplies the exact bytes of a request body
 */
export interface PayloadSource {
  /** Human-readable origin, used in error messages and logs */
  readonly name: string;

  /** Size in bytes as reported by the source's metadata */
  size(): Promise<number>;

  /** Read the full payload */
  read(): Promise<Uint8Array>;
}
