import type { ChannelId } from '@commwire/transport';
import type { CallCallback, CallOutcome } from '../types/common.js';

/**
 * How a remote call is made.
 * @template TBlocking Inferred from `blocking`, so the result type follows it.
 */
export interface RemoteCallOptions<TBlocking extends boolean = boolean> {
  /** The channel to call on. Every open channel when omitted. */
  channelId?: ChannelId;
  /** Wait for the reply and resolve with its value. Defaults to `false`. */
  blocking?: TBlocking;
  /** Seconds a blocking call waits. Defaults to the endpoint's `defaultTimeout`. */
  timeout?: number;
  /**
   * Receives the value of a successful reply. Asks the remote side for a reply
   * even when not blocking.
   */
  callback?: CallCallback;
}

/** One call as handed to the endpoint. @internal */
export interface CallRequest {
  callName: string;
  args: unknown[];
  kwargs: Record<string, unknown>;
  options: RemoteCallOptions;
}

/** @internal */
export type CallDispatcher = (request: CallRequest) => Promise<unknown>;

/**
 * A named remote function, bound to one set of call options.
 *
 * A blocking call resolves with the remote value. A non-blocking call
 * resolves once the message is sent; if the target is not connected it
 * resolves without sending.
 */
export class RemoteCall {
  constructor(
    public readonly name: string,
    private readonly dispatch: CallDispatcher,
    private readonly options: RemoteCallOptions,
  ) {}

  public invoke(...args: unknown[]): Promise<unknown> {
    return this.invokeWithKwargs(args, {});
  }

  /**
   * Sends keyword arguments as well. A handler receives them as a trailing
   * object after the positional arguments.
   */
  public invokeWithKwargs(args: unknown[], kwargs: Record<string, unknown>): Promise<unknown> {
    return this.dispatch({ callName: this.name, args, kwargs, options: this.options });
  }
}

/**
 * A typed view over a remote API, with one promise-returning method per
 * function of `TApi`.
 */
export type CallStub<TApi, TBlocking extends boolean> = {
  readonly [K in keyof TApi as K extends string ? K : never]: TApi[K] extends (...args: infer A) => infer R
    ? (...args: A) => Promise<CallOutcome<TBlocking, R>>
    : never;
};

/**
 * Creates calls that share one set of options.
 *
 * @example
 * ```ts
 * const remote = endpoint.remoteCall({ blocking: true, timeout: 5 });
 * await remote.call('add').invoke(2, 3); // 5
 *
 * interface Calculator { add(x: number, y: number): number }
 * await remote.stub<Calculator>().add(2, 3); // typed as number
 * ```
 */
export class RemoteCallFactory<TBlocking extends boolean = boolean> {
  constructor(
    private readonly dispatch: CallDispatcher,
    public readonly options: RemoteCallOptions<TBlocking>,
  ) {}

  public call(name: string): RemoteCall {
    return new RemoteCall(name, this.dispatch, this.options);
  }

  /**
   * Returns an object whose every property is a remote function. Properties
   * cannot be set on it.
   */
  public stub<TApi extends object>(): CallStub<TApi, TBlocking> {
    const stub = new Proxy(
      {},
      {
        get: (_target, prop) => {
          // Keep the stub from being mistaken for a thenable.
          if (typeof prop === 'symbol' || prop === 'then') return undefined;
          const remote = this.call(prop);
          return (...args: unknown[]) => remote.invoke(...args);
        },
        set: () => {
          throw new TypeError('Properties cannot be set on a remote call stub.');
        },
      },
    );
    // The proxy answers every string key, which the mapped type describes.
    return stub as CallStub<TApi, TBlocking>;
  }
}
