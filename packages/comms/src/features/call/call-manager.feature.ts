import { z } from 'zod';
import { RemoteCallFactory, type CallRequest, type RemoteCallOptions } from '../../api/proxy.js';
import type { Feature } from '../../runtime/framework/feature.js';
import type { CommLogger } from '../../types/common.js';
import { CommError } from '../../types/errors.js';
import type { CallEnvelope, CallPayload } from '../../types/protocol.js';
import type { ErrorHandlingContribution } from '../error/error.feature.js';
import type { ProtocolHandlerContribution } from '../protocol/protocol.handler.feature.js';
import type { SessionContribution } from '../session/session.feature.js';
import { CorrelationEngine } from './correlation-engine.js';

const remoteCallOptionsSchema = z.object({
  channelId: z.string().optional(),
  blocking: z.boolean().optional(),
  timeout: z.number().finite().nonnegative().optional(),
  callback: z.function().optional(),
});

const SHUTDOWN_MESSAGE = 'Endpoint is shut down; pending call aborted.';

export interface CallManagerContribution {
  /**
   * Creates calls with the given options. A `blocking: true` literal makes
   * the calls' results typed as the remote values.
   */
  remoteCall<TBlocking extends boolean = false>(
    options?: RemoteCallOptions<TBlocking>,
  ): RemoteCallFactory<TBlocking>;
  /** @internal */
  readonly correlation: CorrelationEngine;
}

type CallManagerRequires = SessionContribution & ProtocolHandlerContribution & ErrorHandlingContribution;

export interface CallManagerOptions {
  logger: CommLogger;
  /** Seconds. */
  defaultTimeout: number;
}

/**
 * Sends calls and waits for their replies.
 */
export class CallManagerFeature implements Feature<CallManagerContribution, CallManagerRequires> {
  private capability!: CallManagerRequires;
  private engine!: CorrelationEngine;
  private closed = false;

  constructor(private readonly options: CallManagerOptions) {}

  public contribute(): CallManagerContribution {
    const dispatch = this.performCall.bind(this);
    // The engine needs the error feature, which is only reachable after init.
    this.engine = new CorrelationEngine({
      logger: this.options.logger,
      rebuildError: (descriptor) => this.capability.errors.rebuild(descriptor),
      reportAsyncError: (descriptor) => this.capability.errors.reportAsyncError(descriptor),
    });
    return {
      remoteCall: <TBlocking extends boolean = false>(options: RemoteCallOptions<TBlocking> = {}) => {
        const checked = remoteCallOptionsSchema.safeParse(options);
        if (!checked.success) {
          throw new TypeError(`Invalid remote call options: ${checked.error.message}`);
        }
        return new RemoteCallFactory<TBlocking>(dispatch, options);
      },
      correlation: this.engine,
    };
  }

  public init(capability: CallManagerRequires): void {
    this.capability = capability;
    capability.semanticEmitter.on('reply', (reply) => {
      this.engine.dispatchReply(reply);
    });
  }

  private async performCall(request: CallRequest): Promise<unknown> {
    const { callName, args, kwargs, options } = request;
    const { channelId, callback } = options;
    const blocking = options.blocking ?? false;
    const timeout = options.timeout ?? this.options.defaultTimeout;
    const { sendMessage, isOpen } = this.capability;

    if (!isOpen(channelId)) {
      if (blocking) {
        throw new CommError(`Cannot call '${callName}': the comm is not connected.`);
      }
      this.options.logger.debug(`[comms call] Dropping call '${callName}': the comm is not connected.`);
      return undefined;
    }

    const callId = this.engine.issueCallId();
    const envelope: CallEnvelope = {
      callName,
      callId,
      settings: {
        blocking,
        sendReply: blocking || callback !== undefined,
        timeout: blocking ? timeout : null,
      },
    };
    const payload: CallPayload = { callArgs: args, callKwargs: kwargs };

    this.engine.register(callId, blocking, callback);
    try {
      await sendMessage(channelId, 'remote_call', envelope, payload);
    } catch (error) {
      this.engine.deregister(callId);
      if (blocking) throw error;
      this.options.logger.warn(`[comms call] Failed to send call '${callName}':`, error);
      return undefined;
    }

    if (!blocking) return undefined;
    if (this.closed) {
      throw new CommError(SHUTDOWN_MESSAGE);
    }
    return this.engine.waitAndConsume(callId, callName, timeout);
  }

  public close(_contribution: CallManagerContribution, error?: Error): void {
    this.closed = true;
    this.engine.abortAll(new CommError(SHUTDOWN_MESSAGE, error));
  }
}
