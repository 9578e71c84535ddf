import SuperJSON from 'superjson';
import { fromByteArray, toByteArray } from 'base64-js';
import { CodecError, type PayloadCodec } from './types.js';

/** Plain JSON text. Every endpoint reads it; the handshake always travels in it. */
export const BASE_CODEC_VERSION = 1;

/** `superjson` text, keeping `Date`, `Map`, `Set`, `bigint`, `undefined` and `Uint8Array`. */
export const LATEST_CODEC_VERSION = 2;

export interface DefaultCodecOptions {
  /**
   * Caps the advertised version, to talk like an older peer. Defaults to
   * `LATEST_CODEC_VERSION`.
   */
  maxVersion?: number;
}

// A private instance so the transformer below never leaks into other users of
// the shared superjson registry.
const richJson = new SuperJSON();

// JSON has no binary type; byte arrays travel as base64 strings.
richJson.registerCustom<Uint8Array, string>(
  {
    isApplicable: (v): v is Uint8Array => v instanceof Uint8Array,
    serialize: (v) => fromByteArray(v),
    deserialize: (v) => toByteArray(v),
  },
  'uint8array',
);

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

function toText(bytes: Uint8Array): string {
  try {
    return textDecoder.decode(bytes);
  } catch (error) {
    throw new CodecError('Payload is not valid UTF-8 text.', error);
  }
}

/** Values are wrapped so that a bare `undefined` still produces a document. */
function unwrap(document: unknown): unknown {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new CodecError('Payload document is not an object.');
  }
  return 'value' in document ? document.value : undefined;
}

/**
 * Creates the codec used by default on both endpoints.
 *
 * @example
 * ```ts
 * const codec = createDefaultCodec();
 * const bytes = codec.encode({ when: new Date() }, 2);
 * codec.decode(bytes, 2); // { when: Date }
 * ```
 */
export function createDefaultCodec(options: DefaultCodecOptions = {}): PayloadCodec {
  const maxVersion = options.maxVersion ?? LATEST_CODEC_VERSION;
  if (
    !Number.isInteger(maxVersion) ||
    maxVersion < BASE_CODEC_VERSION ||
    maxVersion > LATEST_CODEC_VERSION
  ) {
    throw new RangeError(
      `maxVersion must be an integer between ${BASE_CODEC_VERSION} and ${LATEST_CODEC_VERSION}, got ${maxVersion}.`,
    );
  }

  const checkVersion = (version: number) => {
    if (!Number.isInteger(version) || version < BASE_CODEC_VERSION || version > maxVersion) {
      throw new CodecError(`Unsupported codec version: ${version} (supported: ${BASE_CODEC_VERSION}..${maxVersion}).`);
    }
  };

  return {
    encode(value, version) {
      checkVersion(version);
      let text: string;
      try {
        text =
          version === BASE_CODEC_VERSION
            ? JSON.stringify({ value })
            : richJson.stringify({ value });
      } catch (error) {
        throw new CodecError(
          `Failed to encode payload with codec version ${version}: ${error instanceof Error ? error.message : String(error)}`,
          error,
        );
      }
      return textEncoder.encode(text);
    },

    decode(bytes, version) {
      checkVersion(version);
      const text = toText(bytes);
      let document: unknown;
      try {
        document = version === BASE_CODEC_VERSION ? JSON.parse(text) : richJson.parse(text);
      } catch (error) {
        throw new CodecError(
          `Failed to decode payload with codec version ${version}: ${error instanceof Error ? error.message : String(error)}`,
          error,
        );
      }
      return unwrap(document);
    },

    maxSupportedVersion() {
      return maxVersion;
    },
  };
}
