import type { ChannelId, ChannelTransport, CommChannel } from '@commwire/transport';
import { BuiltinCallsFeature } from '../features/builtin/builtin-calls.feature.js';
import { CallExecutorFeature } from '../features/call/call-executor.feature.js';
import { CallManagerFeature } from '../features/call/call-manager.feature.js';
import { CodecFeature } from '../features/codec/codec.feature.js';
import type { ErrorKindConstructor } from '../features/error/error-kinds.js';
import { ErrorHandlingFeature } from '../features/error/error.feature.js';
import { LifecycleFeature } from '../features/lifecycle/lifecycle.feature.js';
import { ProtocolHandlerFeature } from '../features/protocol/protocol.handler.feature.js';
import { SessionFeature } from '../features/session/session.feature.js';
import { buildFeatures } from '../runtime/factory.js';
import type { CallHandler } from '../types/common.js';
import { resolveOptions, type CommEndpointOptions } from './options.js';
import type { RemoteCallFactory, RemoteCallOptions } from './proxy.js';

/**
 * One side of a comm: a set of channels to peers, the call handlers it
 * exposes over them, and the means to call the peers' handlers.
 *
 * Methods that take an optional `channelId` act on every open channel when
 * it is omitted.
 */
export interface CommEndpoint {
  /** Starts serving a channel and sends it this side's handshake. */
  registerChannel(channel: CommChannel): ChannelId;
  /** Opens a channel under the comm name (or `name`) and registers it. */
  openChannel(name?: string): Promise<ChannelId>;
  close(channelId?: ChannelId): Promise<void>;
  isOpen(channelId?: ChannelId): boolean;
  /** Whether the handshake completed. `false` when no channel is open. */
  isReady(channelId?: ChannelId): boolean;
  /**
   * Resolves once `isReady(channelId)` holds. Rejects with `CommError` for
   * a channel that is not open or closes before its handshake.
   * @param timeout Seconds; waits indefinitely when omitted.
   */
  whenReady(channelId?: ChannelId, timeout?: number): Promise<void>;
  getChannelIds(channelId?: ChannelId): ChannelId[];
  /** Exposes `handler` as `name`. Omit `handler` to unregister. */
  registerCallHandler(name: string, handler?: CallHandler): void;
  remoteCall<TBlocking extends boolean = false>(
    options?: RemoteCallOptions<TBlocking>,
  ): RemoteCallFactory<TBlocking>;
  /** Lets remote errors of `kind` be raised locally as `ctor` instances. */
  registerErrorKind(kind: string, ctor: ErrorKindConstructor): void;
  isClosing(): boolean;
  /**
   * Closes every channel and rejects every waiting call. The transport is
   * left open. Idempotent.
   */
  shutdown(error?: Error): Promise<void>;
}

async function buildEndpoint(
  transport: ChannelTransport | undefined,
  acceptIncoming: boolean,
  options: CommEndpointOptions,
): Promise<CommEndpoint> {
  const { commName, defaultTimeout, runtimeDescriptor, codec, logger, onAsyncError } = resolveOptions(options);

  const features = [
    new ErrorHandlingFeature({ logger, onAsyncError }),
    new CodecFeature(codec),
    new SessionFeature({ transport, commName, runtimeDescriptor, logger }),
    new ProtocolHandlerFeature(logger),
    new CallManagerFeature({ logger, defaultTimeout }),
    new CallExecutorFeature(logger),
    new BuiltinCallsFeature(logger),
    new LifecycleFeature(),
  ] as const;
  const { capability, close } = await buildFeatures(features);
  if (acceptIncoming) capability.acceptIncomingChannels();

  return {
    registerChannel: capability.registerChannel,
    openChannel: capability.openChannel,
    close: capability.closeChannel,
    isOpen: capability.isOpen,
    isReady: capability.isReady,
    whenReady: capability.whenReady,
    getChannelIds: capability.getChannelIds,
    registerCallHandler: capability.registerCallHandler,
    remoteCall: capability.remoteCall,
    registerErrorKind: capability.errors.registerErrorKind,
    isClosing: capability.isClosing,
    shutdown: close,
  };
}

/**
 * Creates an endpoint with no transport. Channels are handed to it with
 * `registerChannel`.
 */
export function createCommEndpoint(options: CommEndpointOptions = {}): Promise<CommEndpoint> {
  return buildEndpoint(undefined, false, options);
}

/**
 * Creates the kernel side: it serves every channel the peer opens under the
 * comm name.
 *
 * @example
 * ```ts
 * const { client, server } = new MemoryConnector();
 * const kernel = await createKernelComm(server);
 * kernel.registerCallHandler('add', (x: number, y: number) => x + y);
 *
 * const frontend = await createFrontendComm(client);
 * await frontend.whenReady();
 * await frontend.remoteCall({ blocking: true }).call('add').invoke(2, 3); // 5
 * ```
 */
export function createKernelComm(
  transport: ChannelTransport,
  options: CommEndpointOptions = {},
): Promise<CommEndpoint> {
  return buildEndpoint(transport, true, options);
}

/**
 * Creates the frontend side and opens its channel to the kernel.
 */
export async function createFrontendComm(
  transport: ChannelTransport,
  options: CommEndpointOptions = {},
): Promise<CommEndpoint> {
  const endpoint = await buildEndpoint(transport, false, options);
  try {
    await endpoint.openChannel();
  } catch (error) {
    await endpoint.shutdown();
    throw error;
  }
  return endpoint;
}
