import type { JsonObject, MaybePromise } from './types.js';

/**
 * Identifies one open channel. Unique among the channels currently open on a
 * transport; the transport that creates the channel picks it.
 */
export type ChannelId = string;

/**
 * Lifecycle surface shared by everything that can be closed.
 */
export interface BaseChannel {
  /**
   * `true` once the channel has closed, from either side. A closed channel is
   * permanently unusable.
   */
  readonly isClosed: boolean;

  /**
   * Registers a handler for the channel's closure, the single, final event in
   * its lifecycle.
   *
   * @remarks
   * Each handler is called exactly once. A handler registered after the
   * channel has already closed is still called, asynchronously.
   *
   * @param handler Receives an `Error` if the closure was abnormal, or
   * `undefined` for a graceful close by either peer.
   */
  onClose(handler: (reason?: Error) => MaybePromise<void>): void;

  /**
   * Closes the channel and notifies the remote end. Idempotent.
   */
  close(): Promise<void>;
}

/**
 * One bidirectional message link between two endpoints.
 *
 * Every message is a JSON metadata object plus exactly one binary payload.
 * Messages sent on one channel arrive in the order they were sent; there is
 * no ordering between different channels.
 */
export interface CommChannel extends BaseChannel {
  /** The channel identifier, identical on both ends. */
  readonly id: ChannelId;

  /** The name the opening side gave the channel (its "target"). */
  readonly name: string;

  /**
   * Sends one message to the remote end.
   *
   * @returns A promise that resolves once the message is handed to the
   * underlying link. It rejects if the channel is closed.
   */
  send(metadata: JsonObject, payload: Uint8Array): Promise<void>;

  /**
   * Registers the handler for incoming messages.
   *
   * @remarks
   * A channel has a single message listener: registering a new one replaces
   * the previous one. Messages that arrive before any listener is attached
   * are buffered and flushed to the first listener.
   */
  onMessage(
    handler: (metadata: JsonObject, payload: Uint8Array) => MaybePromise<void>,
  ): void;
}
