import type { CommChannel } from './channel.js';
import type { MaybePromise } from './types.js';

/**
 * The messaging substrate two endpoints talk over.
 *
 * A transport opens named channels to its peer and announces the channels its
 * peer opens. It knows nothing about the calls carried on those channels.
 */
export interface ChannelTransport {
  /**
   * Opens a new channel to the remote peer.
   *
   * @param name The target name the remote side sees for this channel.
   * @returns A promise for the local end of the channel. It rejects if the
   * transport is closed.
   */
  open(name: string): Promise<CommChannel>;

  /**
   * Registers a handler called for every channel the remote peer opens.
   *
   * @remarks
   * Channels opened before any handler is registered are held back and
   * delivered to the first handler.
   */
  onIncomingChannel(handler: (channel: CommChannel) => MaybePromise<void>): void;

  /**
   * Registers a handler for the transport's closure.
   *
   * @param handler Receives an `Error` if the transport was aborted, or
   * `undefined` for a graceful shutdown.
   */
  onClose(handler: (reason?: Error) => MaybePromise<void>): void;

  /**
   * Closes the transport and every channel it carries. Idempotent.
   */
  close(): Promise<void>;

  /**
   * Tears the transport down because of an error. Idempotent. Both peers see
   * `reason` in their close handlers.
   */
  abort(reason: Error): Promise<void>;
}
