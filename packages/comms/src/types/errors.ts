import type { CallId } from './common.js';
import type { ErrorDescriptor } from './protocol.js';

/**
 * Base class of every error the comm layer raises itself.
 */
export class CommsError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'CommsError';
    this.cause = cause;
  }
}

/**
 * A communication failure: the target is closed or not connected, a message
 * could not be encoded or sent, or the endpoint shut down mid-wait.
 */
export class CommError extends CommsError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'CommError';
  }
}

/**
 * Raised on the executing side when a call names no registered handler. The
 * caller sees it through the error reply.
 */
export class NoSuchCallError extends CommsError {
  public readonly callName?: string;
  constructor(message: string, callName?: string) {
    super(message);
    this.name = 'NoSuchCallError';
    this.callName = callName;
  }
}

export interface TimeoutDetails {
  callName: string;
  callId: CallId;
  /** Seconds. */
  timeout: number;
}

/**
 * A blocking call's reply did not arrive in time. The call is forgotten, so
 * a reply that arrives later is treated as unmatched.
 */
export class CommTimeoutError extends CommsError {
  public readonly details?: TimeoutDetails;
  constructor(message: string, details?: TimeoutDetails) {
    super(message);
    this.name = 'CommTimeoutError';
    this.details = details;
  }
}

/**
 * An incoming payload could not be decoded. On the reply path the failure is
 * delivered to the waiting caller as this error.
 */
export class DecodeError extends CommsError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'DecodeError';
  }
}

/**
 * An error raised by a remote handler.
 *
 * It is raised as-is when the remote error's kind is not registered locally.
 * Otherwise it is attached as the `cause` of the rebuilt local error.
 */
export class RemoteError extends CommsError {
  /** The remote error's kind, e.g. `TypeError`. */
  public readonly kind: string;
  public readonly descriptor: ErrorDescriptor;

  constructor(descriptor: ErrorDescriptor, remoteTrace: readonly string[]) {
    super(descriptor.message);
    this.name = 'RemoteError';
    this.kind = descriptor.kind;
    this.descriptor = descriptor;
    this.stack = [`RemoteError [${descriptor.kind}]: ${descriptor.message}`, ...remoteTrace].join('\n');
  }
}
