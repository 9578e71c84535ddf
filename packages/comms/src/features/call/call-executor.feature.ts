import type { Feature } from '../../runtime/framework/feature.js';
import type { CallContext, CallHandler, CommLogger } from '../../types/common.js';
import type { ErrorDescriptor, IncomingCall } from '../../types/protocol.js';
import type { ErrorHandlingContribution } from '../error/error.feature.js';
import type { LifecycleContribution } from '../lifecycle/lifecycle.feature.js';
import type { ProtocolHandlerContribution } from '../protocol/protocol.handler.feature.js';
import type { SessionContribution } from '../session/session.feature.js';
import { CallRegistry } from './call-registry.js';

export interface CallExecutorContribution {
  /** Exposes `handler` to the remote side as `name`. Omit it to unregister. */
  registerCallHandler(name: string, handler?: CallHandler): void;
}

type CallExecutorRequires =
  ProtocolHandlerContribution &
  SessionContribution &
  ErrorHandlingContribution &
  LifecycleContribution;

type Outcome = { isError: false; value: unknown } | { isError: true; value: ErrorDescriptor };

/**
 * Runs incoming calls and sends their replies back on the calling channel.
 *
 * A success is replied to only when the caller asked for a reply; an error
 * always is.
 */
export class CallExecutorFeature implements Feature<CallExecutorContribution, CallExecutorRequires> {
  private readonly registry = new CallRegistry();
  private capability!: CallExecutorRequires;

  constructor(private readonly logger: CommLogger) {}

  public contribute(): CallExecutorContribution {
    return {
      registerCallHandler: (name, handler) => this.registry.register(name, handler),
    };
  }

  public init(capability: CallExecutorRequires): void {
    this.capability = capability;
    capability.semanticEmitter.on('call', (call) => this.execute(call));
  }

  private async execute(call: IncomingCall): Promise<void> {
    const { channelId, envelope, args, kwargs } = call;
    const { callName, callId } = envelope;
    const { errors, isClosing } = this.capability;
    const context: CallContext = { channelId, callId, callName, isClosing };

    let outcome: Outcome;
    try {
      const callArgs = Object.keys(kwargs).length > 0 ? [...args, kwargs] : args;
      const value = await this.registry.execute(context, callArgs);
      if (!envelope.settings.sendReply) return;
      outcome = { isError: false, value };
    } catch (error) {
      outcome = { isError: true, value: errors.describe(error, callName, callId) };
    }

    try {
      await this.reply(call, outcome);
    } catch (error) {
      if (outcome.isError || !this.capability.isOpen(channelId)) {
        this.logger.warn(`[comms executor] Could not reply to '${callName}' (${callId}):`, error);
        return;
      }
      // The value itself could not be sent; tell the caller why instead.
      await this.reply(call, { isError: true, value: errors.describe(error, callName, callId) }).catch((err: unknown) => {
        this.logger.warn(`[comms executor] Could not reply to '${callName}' (${callId}):`, err);
      });
    }
  }

  private reply(call: IncomingCall, outcome: Outcome): Promise<void> {
    const { callId, callName } = call.envelope;
    return this.capability.sendMessage(
      call.channelId,
      'remote_call_reply',
      { callId, callName, isError: outcome.isError },
      outcome.value,
    );
  }

  public close(): void {}
}
