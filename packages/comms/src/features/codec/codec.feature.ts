import { CodecError, type PayloadCodec } from '@commwire/codec';
import type { Feature } from '../../runtime/framework/feature.js';
import { CommError, DecodeError } from '../../types/errors.js';

export interface CodecContribution {
  codec: {
    /** @throws {CommError} when the value cannot be encoded at `version`. */
    encode(value: unknown, version: number): Uint8Array;
    /** @throws {DecodeError} when the bytes cannot be decoded at `version`. */
    decode(bytes: Uint8Array, version: number): unknown;
    /** The highest version this endpoint reads and writes. */
    maxSupportedVersion(): number;
  };
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Puts the configured payload codec behind the endpoint's own error types.
 */
export class CodecFeature implements Feature<CodecContribution> {
  constructor(private readonly payloadCodec: PayloadCodec) {}

  public contribute(): CodecContribution {
    const payloadCodec = this.payloadCodec;
    return {
      codec: {
        encode(value, version) {
          try {
            return payloadCodec.encode(value, version);
          } catch (error) {
            if (error instanceof CodecError) {
              throw new CommError(`Could not encode payload: ${reason(error)}`, error);
            }
            throw error;
          }
        },
        decode(bytes, version) {
          try {
            return payloadCodec.decode(bytes, version);
          } catch (error) {
            throw new DecodeError(`Could not decode payload: ${reason(error)}`, error);
          }
        },
        maxSupportedVersion: () => payloadCodec.maxSupportedVersion(),
      },
    };
  }

  public init(): void {}

  public close(): void {}
}
