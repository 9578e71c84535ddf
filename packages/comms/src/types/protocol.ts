import { z } from 'zod';
import type { ChannelId } from '@commwire/transport';

// =================================================================
// Message metadata
// Every channel message is this metadata object plus one binary payload
// produced by the payload codec.
// =================================================================

/** Reserved name of the handshake call that negotiates the codec version. */
export const HANDSHAKE_CALL = '_set_codec_version';
/** Liveness probe; answered by a `pong` call back on the same channel. */
export const PING_CALL = 'ping';
/** Acknowledgment of a `ping`. */
export const PONG_CALL = 'pong';

export const MESSAGE_KINDS = ['remote_call', 'remote_call_reply'] as const;
export type MessageKind = (typeof MESSAGE_KINDS)[number];

/** Settings carried with every call. `sendReply` is computed, never user-set. */
export const callSettingsSchema = z.object({
  blocking: z.boolean(),
  sendReply: z.boolean(),
  /** Seconds the caller is prepared to wait, or `null` when not blocking. */
  timeout: z.number().nonnegative().nullable(),
});
export type CallSettings = z.infer<typeof callSettingsSchema>;

/** The metadata content of a `remote_call` message. */
export const callEnvelopeSchema = z.object({
  callName: z.string().min(1),
  callId: z.string().min(1),
  settings: callSettingsSchema,
});
export type CallEnvelope = z.infer<typeof callEnvelopeSchema>;

/** The metadata content of a `remote_call_reply` message. */
export const replyEnvelopeSchema = z.object({
  callId: z.string().min(1),
  /** Only for diagnostics. */
  callName: z.string(),
  isError: z.boolean(),
});
export type ReplyEnvelope = z.infer<typeof replyEnvelopeSchema>;

/**
 * Fields common to every message. `content` is checked against the schema
 * of its kind once the kind is known.
 */
export const messageHeaderSchema = z.object({
  messageKind: z.string(),
  content: z.unknown(),
  /** The codec version the payload was encoded with. */
  codecVersion: z.number().int().positive(),
  /** Free-form description of the sender's runtime, for diagnostics. */
  runtime: z.string(),
});

export type CommMessageMetadata = {
  messageKind: MessageKind;
  content: CallEnvelope | ReplyEnvelope;
  codecVersion: number;
  runtime: string;
};

/** The decoded payload of a `remote_call` message. */
export const callPayloadSchema = z.object({
  callArgs: z.array(z.unknown()),
  callKwargs: z.record(z.unknown()),
});
export type CallPayload = z.infer<typeof callPayloadSchema>;

// =================================================================
// Error descriptor
// The payload of an error reply: enough to rebuild the error on the
// calling side and print where it happened on the executing side.
// =================================================================

export const stackFrameSchema = z.object({
  functionName: z.string(),
  file: z.string(),
  line: z.number().int().nullable(),
  column: z.number().int().nullable(),
});
export type StackFrame = z.infer<typeof stackFrameSchema>;

export const errorDescriptorSchema = z.object({
  /** Stable identifier of the error type, e.g. `TypeError`. */
  kind: z.string(),
  message: z.string(),
  callName: z.string(),
  callId: z.string(),
  /** Innermost frame last. */
  frames: z.array(stackFrameSchema),
  /** The executing side's raw stack text, when it had one. */
  stack: z.string().nullable(),
});
export type ErrorDescriptor = z.infer<typeof errorDescriptorSchema>;

// =================================================================
// Semantic events
// What the protocol handler emits once a message is validated and decoded.
// =================================================================

/** A validated, decoded incoming call. */
export interface IncomingCall {
  channelId: ChannelId;
  envelope: CallEnvelope;
  args: unknown[];
  kwargs: Record<string, unknown>;
}

/** A reply's outcome: a value, or the descriptor of the error the remote raised. */
export type ReplyResult =
  | { isError: false; value: unknown }
  | { isError: true; error: ErrorDescriptor };

/** A validated, decoded incoming reply. */
export type IncomingReply = {
  channelId: ChannelId;
  envelope: ReplyEnvelope;
} & ReplyResult;
