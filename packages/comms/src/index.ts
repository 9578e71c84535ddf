/**
 * Bidirectional remote calls over named channels.
 *
 * Each side of a comm is an endpoint. An endpoint exposes call handlers to its
 * peers and calls theirs, blocking (awaiting the reply, with a timeout) or
 * non-blocking (fire-and-forget, optionally with a callback). Errors raised
 * by a remote handler come back as local errors of the same kind.
 *
 * @packageDocumentation
 */

// =================================================================
// Endpoints
// =================================================================
export {
  createCommEndpoint,
  createFrontendComm,
  createKernelComm,
  type CommEndpoint,
} from './api/endpoint.js';
export type { CommEndpointOptions } from './api/options.js';
export {
  RemoteCall,
  RemoteCallFactory,
  type CallStub,
  type RemoteCallOptions,
} from './api/proxy.js';

// =================================================================
// Types
// =================================================================
export type {
  CallCallback,
  CallContext,
  CallHandler,
  CallId,
  CallOutcome,
  CommLogger,
} from './types/common.js';
export {
  HANDSHAKE_CALL,
  PING_CALL,
  PONG_CALL,
  type CallEnvelope,
  type CallSettings,
  type CommMessageMetadata,
  type ErrorDescriptor,
  type MessageKind,
  type ReplyEnvelope,
  type StackFrame,
} from './types/protocol.js';

// =================================================================
// Errors
// =================================================================
export {
  CommError,
  CommTimeoutError,
  CommsError,
  DecodeError,
  NoSuchCallError,
  RemoteError,
  type TimeoutDetails,
} from './types/errors.js';
export type { AsyncErrorHandler } from './features/error/error.feature.js';
export { remoteDescriptorOf, type ErrorKindConstructor } from './features/error/error-kinds.js';
export { describeError, formatErrorDescriptor, parseStackFrames } from './features/error/error-descriptor.js';

// =================================================================
// Internals, for building custom endpoints and for tests
// =================================================================
export { CorrelationEngine, type CorrelationEngineOptions } from './features/call/correlation-engine.js';
export { CallRegistry } from './features/call/call-registry.js';
export { ChannelSession, type SessionStatus } from './features/session/channel-session.js';
export { buildFeatures } from './runtime/factory.js';
export { MAX_TIMER_DELAY_MS, timeoutToDelay } from './runtime/timers.js';
export type { Feature } from './runtime/framework/feature.js';
