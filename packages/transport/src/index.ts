export { AsyncEventEmitter } from './events.js';
export type { DefaultEventMap } from 'tseep';

export type { BaseChannel, ChannelId, CommChannel } from './channel.js';

export type { ChannelTransport } from './transport.js';

export type {
  JsonArray,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  MaybePromise,
} from './types.js';
