import {
  CommError,
  CommTimeoutError,
  CommsError,
  DecodeError,
  NoSuchCallError,
  RemoteError,
} from '../../types/errors.js';
import type { ErrorDescriptor } from '../../types/protocol.js';
import { formatErrorDescriptor } from './error-descriptor.js';

/** Anything that can rebuild an error from its message. */
export type ErrorKindConstructor = new (message: string) => Error;

const BUILTIN_KINDS: Record<string, ErrorKindConstructor> = {
  Error,
  TypeError,
  RangeError,
  SyntaxError,
  ReferenceError,
  EvalError,
  URIError,
  CommsError,
  CommError,
  NoSuchCallError,
  CommTimeoutError,
  DecodeError,
};

/**
 * Maps error kinds to local constructors so that a remote error is raised on
 * the calling side as the same kind of error.
 */
export class ErrorKindRegistry {
  private readonly kinds = new Map<string, ErrorKindConstructor>(Object.entries(BUILTIN_KINDS));

  register(kind: string, ctor: ErrorKindConstructor): void {
    this.kinds.set(kind, ctor);
  }

  has(kind: string): boolean {
    return this.kinds.has(kind);
  }

  /**
   * Rebuilds the error a descriptor describes.
   *
   * A known kind yields an instance of its constructor, with a `RemoteError`
   * carrying the descriptor as `cause` and the remote trace appended to the
   * stack. An unknown kind yields the `RemoteError` itself.
   */
  rebuild(descriptor: ErrorDescriptor): Error {
    const trace = formatErrorDescriptor(descriptor);
    const remote = new RemoteError(descriptor, trace);
    const Ctor = this.kinds.get(descriptor.kind);
    if (!Ctor) return remote;

    const error = new Ctor(descriptor.message);
    if (error.name !== descriptor.kind) error.name = descriptor.kind;
    error.cause = remote;
    error.stack = [error.stack ?? `${error.name}: ${error.message}`, 'Remote trace:', ...trace].join('\n');
    return error;
  }
}

/**
 * Returns the descriptor of the remote error behind `error`, if it came from
 * the other side.
 */
export function remoteDescriptorOf(error: unknown): ErrorDescriptor | undefined {
  if (error instanceof RemoteError) return error.descriptor;
  if (error instanceof Error && error.cause instanceof RemoteError) return error.cause.descriptor;
  return undefined;
}
