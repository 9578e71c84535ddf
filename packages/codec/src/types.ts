/**
 * Turns call arguments, return values and error descriptors into the single
 * binary payload that accompanies every channel message, and back.
 *
 * A codec may speak several numbered formats. Two endpoints agree on the
 * highest version both sides support; every codec must decode every version
 * from 1 up to its `maxSupportedVersion()`.
 */
export interface PayloadCodec {
  /**
   * Encodes `value` in format `version`.
   * @throws {CodecError} If the value cannot be represented or the version is unsupported.
   */
  encode(value: unknown, version: number): Uint8Array;

  /**
   * Decodes bytes produced by `encode` with the same `version`.
   * @throws {CodecError} If the bytes are malformed or the version is unsupported.
   */
  decode(bytes: Uint8Array, version: number): unknown;

  /** The highest format version this codec can produce and read. */
  maxSupportedVersion(): number;
}

/**
 * Raised when a payload cannot be encoded or decoded.
 */
export class CodecError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'CodecError';
    this.cause = cause;
  }
}
