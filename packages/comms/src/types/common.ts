import type { ChannelId } from '@commwire/transport';

/** Correlates a call with its eventual reply. A UUID v4 string. */
export type CallId = string;

/**
 * Where diagnostics go. `console` satisfies it, and is the default.
 */
export type CommLogger = Pick<Console, 'debug' | 'warn' | 'error'>;

/**
 * What a call handler knows about the call it is serving. Bound as `this`
 * when the handler runs.
 */
export interface CallContext {
  /** The channel the call arrived on; replies and call-backs go there. */
  readonly channelId: ChannelId;
  readonly callId: CallId;
  readonly callName: string;
  /** `true` once the endpoint has started shutting down. */
  readonly isClosing: () => boolean;
}

/**
 * A locally callable function exposed to the remote side.
 *
 * Handlers receive the caller's positional arguments. When the caller also
 * sent keyword arguments, they arrive as one extra trailing object.
 *
 * @example
 * ```ts
 * endpoint.registerCallHandler('add', (x: number, y: number) => x + y);
 * endpoint.registerCallHandler('whoami', function (this: CallContext) {
 *   return this.channelId;
 * });
 * ```
 */
export type CallHandler = (this: CallContext, ...args: never[]) => unknown;

/** Invoked with the decoded return value of a successful non-blocking call. */
export type CallCallback = (value: unknown) => void;

/**
 * The outcome type of a call: the remote value when blocking, nothing otherwise.
 * @template TBlocking Whether the call waits for its reply.
 * @template TResult The remote handler's return type.
 */
export type CallOutcome<TBlocking extends boolean, TResult> = TBlocking extends true
  ? Awaited<TResult>
  : void;
