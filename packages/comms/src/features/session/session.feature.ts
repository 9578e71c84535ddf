import { BASE_CODEC_VERSION } from '@commwire/codec';
import {
  AsyncEventEmitter,
  type ChannelId,
  type ChannelTransport,
  type CommChannel,
  type JsonObject,
} from '@commwire/transport';
import type { Feature } from '../../runtime/framework/feature.js';
import { timeoutToDelay } from '../../runtime/timers.js';
import type { CommLogger } from '../../types/common.js';
import { CommError, CommTimeoutError } from '../../types/errors.js';
import type { CommMessageMetadata, MessageKind } from '../../types/protocol.js';
import type { CodecContribution } from '../codec/codec.feature.js';
import { ChannelSession } from './channel-session.js';

/**
 * Channel lifecycle and traffic, before any interpretation.
 */
export type SessionEvents = {
  /** A channel was registered. Emitted before its messages are listened to. */
  open: (session: ChannelSession) => void;
  /** A raw message arrived on a registered channel. */
  message: (channelId: ChannelId, metadata: JsonObject, payload: Uint8Array) => void;
  /** A session completed its handshake. */
  ready: (session: ChannelSession) => void;
  /** A registered channel closed, from either side. Emitted once per channel. */
  close: (channelId: ChannelId, reason?: Error) => void;
};

export interface SessionContribution {
  readonly sessionEmitter: AsyncEventEmitter<SessionEvents>;
  /**
   * Registers every channel the transport's peer opens under the comm name.
   * Call once the endpoint is fully assembled. Idempotent.
   */
  acceptIncomingChannels(): void;
  /** Starts tracking a channel. @returns its id. */
  registerChannel(channel: CommChannel): ChannelId;
  /** Opens a channel through the transport and registers it. */
  openChannel(name?: string): Promise<ChannelId>;
  /** Closes one channel, or every channel when `channelId` is omitted. */
  closeChannel(channelId?: ChannelId): Promise<void>;
  /** With no id: whether any channel is open. */
  isOpen(channelId?: ChannelId): boolean;
  /** With no id: whether every open channel is ready. `false` when none is open. */
  isReady(channelId?: ChannelId): boolean;
  /**
   * Resolves once `isReady(channelId)` holds. Rejects at once for a channel
   * that is not open, and when that channel closes first.
   */
  whenReady(channelId?: ChannelId, timeout?: number): Promise<void>;
  /** The given id, or every open id when omitted. */
  getChannelIds(channelId?: ChannelId): ChannelId[];
  /**
   * Completes a session's handshake at `min(requested, local max)`.
   * @returns The version in effect afterwards.
   */
  markReady(channelId: ChannelId, requestedVersion: number): number;
  /**
   * Encodes `data` at each target session's version and sends it with the
   * metadata built from `kind` and `content`. Failures on some of several
   * targets are logged; the message counts as sent if any target took it.
   * @throws {CommError} when no target channel is open, or encoding fails.
   */
  sendMessage(
    channelId: ChannelId | undefined,
    kind: MessageKind,
    content: CommMessageMetadata['content'],
    data: unknown,
  ): Promise<void>;
}

export interface SessionOptions {
  /** Needed by `openChannel` and for accepting incoming channels. */
  transport?: ChannelTransport;
  /** The target name: incoming channels with another name are ignored. */
  commName: string;
  runtimeDescriptor: string;
  logger: CommLogger;
}

/**
 * Tracks the channel sessions of an endpoint and is the only path by which
 * messages enter or leave it.
 */
export class SessionFeature implements Feature<SessionContribution, CodecContribution> {
  private readonly sessionEmitter = new AsyncEventEmitter<SessionEvents>();
  private readonly sessions = new Map<ChannelId, ChannelSession>();
  private readonly readyWaiters = new Set<(error: Error) => void>();
  private capability!: CodecContribution;
  private closing = false;
  private accepting = false;

  constructor(private readonly options: SessionOptions) {}

  public contribute(): SessionContribution {
    return {
      sessionEmitter: this.sessionEmitter,
      acceptIncomingChannels: this.acceptIncomingChannels.bind(this),
      registerChannel: this.registerChannel.bind(this),
      openChannel: this.openChannel.bind(this),
      closeChannel: this.closeChannel.bind(this),
      isOpen: this.isOpen.bind(this),
      isReady: this.isReady.bind(this),
      whenReady: this.whenReady.bind(this),
      getChannelIds: this.getChannelIds.bind(this),
      markReady: this.markReady.bind(this),
      sendMessage: this.sendMessage.bind(this),
    };
  }

  public init(capability: CodecContribution): void {
    this.capability = capability;
  }

  private acceptIncomingChannels(): void {
    const { transport, commName, logger } = this.options;
    if (!transport) {
      throw new CommError('This endpoint has no transport to accept channels from.');
    }
    if (this.accepting) return;
    this.accepting = true;

    transport.onIncomingChannel((channel) => {
      if (channel.name !== commName) {
        logger.debug(`[comms session] Ignoring channel ${channel.id} for target '${channel.name}'.`);
        return;
      }
      try {
        this.registerChannel(channel);
      } catch (error) {
        logger.warn(`[comms session] Refused channel ${channel.id}:`, error);
        channel.close().catch((err: unknown) => logger.error('[comms session] Failed to close refused channel:', err));
      }
    });
  }

  private registerChannel(channel: CommChannel): ChannelId {
    if (this.closing) {
      throw new CommError('Endpoint is shut down; cannot register channels.');
    }
    if (channel.isClosed) {
      throw new CommError(`Channel ${channel.id} is already closed.`);
    }
    if (this.sessions.has(channel.id)) {
      throw new CommError(`Channel ${channel.id} is already registered.`);
    }

    const session = new ChannelSession(channel, BASE_CODEC_VERSION);
    this.sessions.set(channel.id, session);
    this.sessionEmitter.emit('open', session);

    channel.onMessage((metadata, payload) => {
      this.sessionEmitter.emit('message', channel.id, metadata, payload);
    });
    channel.onClose((reason) => this.handleChannelClose(session, reason));
    return channel.id;
  }

  private async openChannel(name?: string): Promise<ChannelId> {
    const { transport, commName } = this.options;
    if (!transport) {
      throw new CommError('This endpoint has no transport to open channels with.');
    }
    if (this.closing) {
      throw new CommError('Endpoint is shut down; cannot open channels.');
    }
    const channel = await transport.open(name ?? commName);
    return this.registerChannel(channel);
  }

  private handleChannelClose(session: ChannelSession, reason?: Error): void {
    if (this.sessions.get(session.id) === session) {
      this.sessions.delete(session.id);
    }
    this.options.logger.debug(`[comms session] Channel ${session.id} closed.`);
    this.sessionEmitter.emit('close', session.id, reason);
  }

  private async closeChannel(channelId?: ChannelId): Promise<void> {
    const targets: ChannelSession[] = [];
    for (const id of this.getChannelIds(channelId)) {
      const session = this.sessions.get(id);
      if (!session) continue;
      this.sessions.delete(id);
      targets.push(session);
    }
    await Promise.all(targets.map((session) => session.channel.close()));
  }

  private getChannelIds(channelId?: ChannelId): ChannelId[] {
    return channelId === undefined ? [...this.sessions.keys()] : [channelId];
  }

  private isOpen(channelId?: ChannelId): boolean {
    return channelId === undefined ? this.sessions.size > 0 : this.sessions.has(channelId);
  }

  private isReady(channelId?: ChannelId): boolean {
    const ids = this.getChannelIds(channelId);
    if (ids.length === 0) return false;
    return ids.every((id) => this.sessions.get(id)?.isReady ?? false);
  }

  private whenReady(channelId?: ChannelId, timeout?: number): Promise<void> {
    if (this.isReady(channelId)) return Promise.resolve();
    if (this.closing) return Promise.reject(new CommError('Endpoint is shut down.'));
    if (channelId !== undefined && !this.isOpen(channelId)) {
      return Promise.reject(new CommError(`Channel ${channelId} is not open.`));
    }

    return new Promise<void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const cleanup = () => {
        clearTimeout(timer);
        this.sessionEmitter.off('ready', onReady);
        this.sessionEmitter.off('close', onClose);
        this.readyWaiters.delete(fail);
      };
      const fail = (error: Error) => {
        cleanup();
        reject(error);
      };
      const onReady = () => {
        if (!this.isReady(channelId)) return;
        cleanup();
        resolve();
      };
      const onClose = (closedId: ChannelId) => {
        if (channelId === closedId) {
          fail(new CommError(`Channel ${channelId} closed before it became ready.`));
        } else if (channelId === undefined && this.isReady()) {
          // The channel that held everything back is gone; the rest are ready.
          cleanup();
          resolve();
        }
      };

      this.sessionEmitter.on('ready', onReady);
      this.sessionEmitter.on('close', onClose);
      this.readyWaiters.add(fail);
      if (timeout !== undefined) {
        timer = setTimeout(() => {
          fail(new CommTimeoutError(`Timeout while waiting for ${channelId ?? 'the endpoint'} to become ready.`));
        }, timeoutToDelay(timeout));
      }
    });
  }

  private markReady(channelId: ChannelId, requestedVersion: number): number {
    const session = this.sessions.get(channelId);
    if (!session) {
      throw new CommError(`Channel ${channelId} is not open.`);
    }
    const version = Math.min(requestedVersion, this.capability.codec.maxSupportedVersion());
    if (!session.markReady(version)) {
      this.options.logger.debug(`[comms session] Ignoring repeated handshake on channel ${channelId}.`);
      return session.codecVersion;
    }
    this.options.logger.debug(`[comms session] Channel ${channelId} ready with codec version ${version}.`);
    this.sessionEmitter.emit('ready', session);
    return version;
  }

  private async sendMessage(
    channelId: ChannelId | undefined,
    kind: MessageKind,
    content: CommMessageMetadata['content'],
    data: unknown,
  ): Promise<void> {
    if (!this.isOpen(channelId)) {
      throw new CommError('The comm is not connected.');
    }
    const { codec } = this.capability;
    const targets = this.getChannelIds(channelId);
    const sends = targets.map((id) => {
      const session = this.sessions.get(id);
      if (!session) {
        return Promise.reject(new CommError(`Channel ${id} is not open.`));
      }
      const metadata: CommMessageMetadata = {
        messageKind: kind,
        content,
        codecVersion: session.codecVersion,
        runtime: this.options.runtimeDescriptor,
      };
      try {
        return session.channel.send(metadata, codec.encode(data, session.codecVersion));
      } catch (error) {
        return Promise.reject(error);
      }
    });
    const results = await Promise.allSettled(sends);
    const failures = results.flatMap((result, index) =>
      result.status === 'rejected' ? [{ id: targets[index], reason: result.reason }] : [],
    );
    if (failures.length === results.length) {
      throw failures[0].reason;
    }
    failures.forEach(({ id, reason }) => {
      this.options.logger.warn(`[comms session] Failed to send ${kind} on channel ${id}:`, reason);
    });
  }

  public async close(_contribution: SessionContribution, error?: Error): Promise<void> {
    this.closing = true;
    const shutdown = error ?? new CommError('Endpoint is shut down.');
    [...this.readyWaiters].forEach((fail) => fail(shutdown));
    await this.closeChannel();
    this.sessionEmitter.removeAllListeners();
  }
}
