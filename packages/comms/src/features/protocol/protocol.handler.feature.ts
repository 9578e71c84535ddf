import { AsyncEventEmitter, type ChannelId, type JsonObject } from '@commwire/transport';
import type { Feature } from '../../runtime/framework/feature.js';
import type { CommLogger } from '../../types/common.js';
import { DecodeError } from '../../types/errors.js';
import {
  callEnvelopeSchema,
  callPayloadSchema,
  errorDescriptorSchema,
  messageHeaderSchema,
  replyEnvelopeSchema,
  type IncomingCall,
  type IncomingReply,
  type ReplyEnvelope,
  type ReplyResult,
} from '../../types/protocol.js';
import type { CodecContribution } from '../codec/codec.feature.js';
import type { ErrorHandlingContribution } from '../error/error.feature.js';
import type { SessionContribution } from '../session/session.feature.js';

/**
 * Validated, decoded traffic.
 */
export type SemanticEvents = {
  call: (call: IncomingCall) => void;
  reply: (reply: IncomingReply) => void;
};

export interface ProtocolHandlerContribution {
  semanticEmitter: AsyncEventEmitter<SemanticEvents>;
}

type ProtocolHandlerRequires = SessionContribution & CodecContribution & ErrorHandlingContribution;

/**
 * Turns raw channel messages into `call` and `reply` events.
 *
 * Messages with malformed metadata or an unknown kind are dropped. A call
 * whose payload does not decode is dropped too. A reply whose payload does
 * not decode is still delivered, as a `DecodeError`, so its caller does not
 * wait for nothing.
 */
export class ProtocolHandlerFeature implements Feature<ProtocolHandlerContribution, ProtocolHandlerRequires> {
  private readonly semanticEmitter = new AsyncEventEmitter<SemanticEvents>();
  private capability!: ProtocolHandlerRequires;

  constructor(private readonly logger: CommLogger) {}

  public contribute(): ProtocolHandlerContribution {
    return {
      semanticEmitter: this.semanticEmitter,
    };
  }

  public init(capability: ProtocolHandlerRequires): void {
    this.capability = capability;
    capability.sessionEmitter.on('message', (channelId, metadata, payload) => {
      this.processMessage(channelId, metadata, payload);
    });
  }

  private processMessage(channelId: ChannelId, metadata: JsonObject, payload: Uint8Array): void {
    const header = messageHeaderSchema.safeParse(metadata);
    if (!header.success) {
      this.logger.warn(`[comms protocol] Dropping malformed message on channel ${channelId}:`, header.error.issues);
      return;
    }
    const { messageKind, content, codecVersion } = header.data;

    try {
      switch (messageKind) {
        case 'remote_call':
          this.processCall(channelId, content, codecVersion, payload);
          break;
        case 'remote_call_reply':
          this.processReply(channelId, content, codecVersion, payload);
          break;
        default:
          this.logger.debug(`[comms protocol] No such message kind: ${messageKind}`);
      }
    } catch (error) {
      this.logger.error(`[comms protocol] Error processing ${messageKind} message:`, error);
    }
  }

  private processCall(channelId: ChannelId, content: unknown, codecVersion: number, payload: Uint8Array): void {
    const envelope = callEnvelopeSchema.safeParse(content);
    if (!envelope.success) {
      this.logger.warn(`[comms protocol] Dropping call with malformed content on channel ${channelId}:`, envelope.error.issues);
      return;
    }
    const { callName, callId } = envelope.data;

    let decoded: unknown;
    try {
      decoded = this.capability.codec.decode(payload, codecVersion);
    } catch (error) {
      this.logger.debug(`[comms protocol] Could not decode call '${callName}' (${callId}), dropping it:`, error);
      return;
    }
    const body = callPayloadSchema.safeParse(decoded);
    if (!body.success) {
      this.logger.debug(`[comms protocol] Call '${callName}' (${callId}) has malformed arguments, dropping it.`);
      return;
    }

    this.semanticEmitter.emit('call', {
      channelId,
      envelope: envelope.data,
      args: body.data.callArgs,
      kwargs: body.data.callKwargs,
    });
  }

  private processReply(channelId: ChannelId, content: unknown, codecVersion: number, payload: Uint8Array): void {
    const envelope = replyEnvelopeSchema.safeParse(content);
    if (!envelope.success) {
      this.logger.warn(`[comms protocol] Dropping reply with malformed content on channel ${channelId}:`, envelope.error.issues);
      return;
    }
    const result = this.decodeReply(envelope.data, codecVersion, payload);
    // Reply callbacks run inside this emit; the caller logs what they throw.
    this.semanticEmitter.emit('reply', { channelId, envelope: envelope.data, ...result });
  }

  private decodeReply(envelope: ReplyEnvelope, codecVersion: number, payload: Uint8Array): ReplyResult {
    const { errors, codec } = this.capability;
    const { callName, callId } = envelope;

    let value: unknown;
    try {
      value = codec.decode(payload, codecVersion);
    } catch (error) {
      return { isError: true, error: errors.describe(error, callName, callId) };
    }
    if (!envelope.isError) {
      return { isError: false, value };
    }

    const descriptor = errorDescriptorSchema.safeParse(value);
    if (!descriptor.success) {
      const malformed = new DecodeError(`The error reply to '${callName}' does not describe an error.`);
      return { isError: true, error: errors.describe(malformed, callName, callId) };
    }
    return { isError: true, error: descriptor.data };
  }

  public close(contribution: ProtocolHandlerContribution): void {
    contribution.semanticEmitter.removeAllListeners();
  }
}
