import { v4 as uuid } from 'uuid';
import type {
  ChannelId,
  ChannelTransport,
  CommChannel,
  JsonObject,
  MaybePromise,
} from '@commwire/transport';
import { AsyncEventEmitter } from '@commwire/transport';

// #region Event Type Definitions
/**
 * Internal events used by `MemoryTransport` for coordination.
 * @internal
 */
type MemoryTransportEvents = {
  incomingChannel: (channel: CommChannel) => void;
  close: (reason?: Error) => void;
};

/** @internal */
type MemoryChannelEvents = {
  message: (metadata: JsonObject, payload: Uint8Array) => void;
  close: (reason?: Error) => void;
};

type QueuedMessage = { metadata: JsonObject; payload: Uint8Array };
// #endregion

// #region Channel Implementation

/**
 * One end of an in-memory channel. Two instances are linked to each other;
 * whatever one sends, the other receives.
 *
 * Messages are delivered on a later microtask, in send order, and copied on
 * the way so neither side can observe the other's mutations. Messages that
 * arrive before a listener is attached are queued.
 * @internal
 */
export class MemoryChannel implements CommChannel {
  private readonly events = new AsyncEventEmitter<MemoryChannelEvents>();
  private peer: MemoryChannel | null = null;
  private closeReason: Error | undefined;
  public isClosed = false;

  private messageQueue: QueuedMessage[] = [];
  private hasListener = false;

  constructor(
    public readonly id: ChannelId,
    public readonly name: string,
  ) {}

  /** Links this end to its counterpart. @internal */
  public _link(peer: MemoryChannel): void {
    this.peer = peer;
  }

  public send(metadata: JsonObject, payload: Uint8Array): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new Error(`Channel ${this.id} is closed.`));
    }
    const peer = this.peer;
    if (!peer) {
      return Promise.reject(new Error(`Channel ${this.id} is not linked.`));
    }
    const message: QueuedMessage = {
      metadata: structuredClone(metadata),
      payload: payload.slice(),
    };
    queueMicrotask(() => peer._receive(message));
    return Promise.resolve();
  }

  /**
   * Called by the linked end to deliver a message. Emitted if a listener is
   * present, queued otherwise.
   * @internal
   */
  public _receive(message: QueuedMessage): void {
    if (this.isClosed) return;

    if (this.hasListener) {
      this.events
        .emitAsync('message', message.metadata, message.payload)
        .catch((err: unknown) => {
          console.error(`[transport-mem] Message listener on channel ${this.id} failed:`, err);
        });
    } else {
      this.messageQueue.push(message);
    }
  }

  public onMessage(
    handler: (metadata: JsonObject, payload: Uint8Array) => MaybePromise<void>,
  ): void {
    this.events.removeAllListeners('message');
    this.events.on('message', handler);
    this.hasListener = true;

    if (this.messageQueue.length > 0) {
      const queue = this.messageQueue;
      this.messageQueue = [];
      queue.forEach((msg) => this._receive(msg));
    }
  }

  public onClose(handler: (reason?: Error) => MaybePromise<void>): void {
    if (this.isClosed) {
      const reason = this.closeReason;
      queueMicrotask(() => {
        Promise.resolve(handler(reason)).catch((err: unknown) => {
          console.error(`[transport-mem] Close handler on channel ${this.id} failed:`, err);
        });
      });
      return;
    }
    this.events.on('close', handler);
  }

  public close(): Promise<void> {
    this._destroy();
    return Promise.resolve();
  }

  /**
   * Central, idempotent cleanup. Closing either end closes both.
   * @internal
   */
  public _destroy(reason?: Error): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.closeReason = reason;
    this.messageQueue = [];

    this.peer?._destroy(reason);

    queueMicrotask(() => {
      this.events
        .emitAsync('close', reason)
        .finally(() => this.events.removeAllListeners())
        .catch((err: unknown) => {
          console.error(`[transport-mem] Close handler on channel ${this.id} failed:`, err);
        });
    });
  }
}
// #endregion

/**
 * An in-memory transport, for tests and for running both endpoints in one
 * process. It is always created in pairs by `MemoryConnector`.
 */
export class MemoryTransport implements ChannelTransport {
  private readonly events = new AsyncEventEmitter<MemoryTransportEvents>();
  private remoteTransport: MemoryTransport | null = null;
  private _isClosed = false;

  private readonly channels = new Map<ChannelId, MemoryChannel>();
  private pendingIncoming: CommChannel[] = [];
  private hasIncomingHandler = false;

  /** Links this transport to its peer. @internal */
  public _link(remote: MemoryTransport): void {
    this.remoteTransport = remote;
  }

  public get isClosed(): boolean {
    return this._isClosed;
  }

  /**
   * Accepts the remote end of a channel the peer just opened.
   * @internal
   */
  public _acceptChannel(channel: MemoryChannel): void {
    if (this._isClosed) {
      channel._destroy();
      return;
    }
    this.track(channel);
    if (this.hasIncomingHandler) {
      this.events.emit('incomingChannel', channel);
    } else {
      this.pendingIncoming.push(channel);
    }
  }

  private track(channel: MemoryChannel): void {
    this.channels.set(channel.id, channel);
    channel.onClose(() => {
      this.channels.delete(channel.id);
    });
  }

  public open(name: string): Promise<CommChannel> {
    if (this._isClosed) {
      return Promise.reject(new Error('Transport is closed.'));
    }
    const remote = this.remoteTransport;
    if (!remote || remote._isClosed) {
      return Promise.reject(new Error('Transport has no live peer.'));
    }

    const channelId = uuid();
    const local = new MemoryChannel(channelId, name);
    const far = new MemoryChannel(channelId, name);
    local._link(far);
    far._link(local);

    this.track(local);
    queueMicrotask(() => remote._acceptChannel(far));

    return Promise.resolve(local);
  }

  public onIncomingChannel(
    handler: (channel: CommChannel) => MaybePromise<void>,
  ): void {
    this.events.on('incomingChannel', handler);
    if (!this.hasIncomingHandler) {
      this.hasIncomingHandler = true;
      const pending = this.pendingIncoming;
      this.pendingIncoming = [];
      pending.forEach((channel) => this.events.emit('incomingChannel', channel));
    }
  }

  public onClose(handler: (reason?: Error) => MaybePromise<void>): void {
    this.events.on('close', handler);
  }

  /** Central, idempotent cleanup logic for the transport. @internal */
  public _destroy(reason?: Error): void {
    if (this._isClosed) return;
    this._isClosed = true;

    const channelsToClose = [...this.channels.values()];
    channelsToClose.forEach((ch) => ch._destroy(reason));
    this.channels.clear();
    this.pendingIncoming = [];

    this.events.emit('close', reason);
    this.events.removeAllListeners();
  }

  public abort(reason: Error): Promise<void> {
    if (this._isClosed) return Promise.resolve();
    queueMicrotask(() => {
      this.remoteTransport?._destroy(reason);
      this._destroy(reason);
    });
    return Promise.resolve();
  }

  public close(): Promise<void> {
    if (this._isClosed) return Promise.resolve();
    queueMicrotask(() => {
      this.remoteTransport?._destroy();
      this._destroy();
    });
    return Promise.resolve();
  }
}

/**
 * Creates a pair of linked `MemoryTransport` instances, one for each endpoint
 * of an in-process connection.
 */
export class MemoryConnector {
  public readonly client: MemoryTransport;
  public readonly server: MemoryTransport;

  constructor() {
    const clientTransport = new MemoryTransport();
    const serverTransport = new MemoryTransport();
    clientTransport._link(serverTransport);
    serverTransport._link(clientTransport);
    this.client = clientTransport;
    this.server = serverTransport;
  }
}
