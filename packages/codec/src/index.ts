/**
 * Payload codecs for commwire channels.
 *
 * The default codec ships two formats: plain JSON (version 1) and superjson
 * (version 2). Each channel uses the lower of the two endpoints' maxima.
 *
 * @packageDocumentation
 */
export { CodecError, type PayloadCodec } from './types.js';
export {
  BASE_CODEC_VERSION,
  LATEST_CODEC_VERSION,
  createDefaultCodec,
  type DefaultCodecOptions,
} from './default-codec.js';
