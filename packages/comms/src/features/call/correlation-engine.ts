import { v4 as uuid } from 'uuid';
import { timeoutToDelay } from '../../runtime/timers.js';
import type { CallCallback, CallId, CommLogger } from '../../types/common.js';
import { CommError, CommTimeoutError } from '../../types/errors.js';
import type { ErrorDescriptor, IncomingReply, ReplyResult } from '../../types/protocol.js';

interface OutstandingCall {
  blocking: boolean;
  callback?: CallCallback;
}

interface Waiter {
  wake(): void;
  abort(error: Error): void;
}

export interface CorrelationEngineOptions {
  logger: CommLogger;
  /** Rebuilds the local error a blocking caller is rejected with. */
  rebuildError(descriptor: ErrorDescriptor): Error;
  /** Reports remote errors that have no waiting caller. */
  reportAsyncError(descriptor: ErrorDescriptor): void;
}

/**
 * Matches replies to the calls that are waiting for them.
 *
 * A call is registered before its message is sent, so its reply can never
 * arrive unannounced. A reply for a call that is not (or no longer)
 * registered is unmatched: its error is reported, or a success is logged.
 */
export class CorrelationEngine {
  private readonly waitlist = new Map<CallId, OutstandingCall>();
  private readonly inbox = new Map<CallId, ReplyResult>();
  private readonly waiters = new Map<CallId, Waiter>();

  constructor(private readonly options: CorrelationEngineOptions) {}

  public issueCallId(): CallId {
    return uuid();
  }

  /**
   * Starts expecting a reply. Only blocking calls and calls with a callback
   * are tracked; for the rest nothing is recorded.
   */
  public register(callId: CallId, blocking: boolean, callback?: CallCallback): void {
    if (!blocking && !callback) return;
    this.waitlist.set(callId, { blocking, callback });
  }

  /** Forgets a call, e.g. when its message could not be sent. */
  public deregister(callId: CallId): void {
    this.waitlist.delete(callId);
    this.inbox.delete(callId);
  }

  public isPending(callId: CallId): boolean {
    return this.waitlist.has(callId);
  }

  public get pendingCount(): number {
    return this.waitlist.size;
  }

  /**
   * Routes a decoded reply.
   *
   * @throws whatever the call's callback throws.
   */
  public dispatchReply(reply: IncomingReply): void {
    const { callId, callName } = reply.envelope;
    const entry = this.waitlist.get(callId);
    if (!entry) {
      if (reply.isError) {
        this.options.reportAsyncError(reply.error);
      } else {
        this.options.logger.debug(`[comms call] Got an unexpected reply ${callName}, id: ${callId}`);
      }
      return;
    }
    this.waitlist.delete(callId);

    if (reply.isError) {
      if (entry.blocking) {
        this.deliver(callId, reply);
      } else {
        this.options.reportAsyncError(reply.error);
      }
      return;
    }

    if (entry.blocking) {
      this.deliver(callId, { isError: false, value: reply.value });
    }
    entry.callback?.(reply.value);
  }

  private deliver(callId: CallId, result: ReplyResult): void {
    this.inbox.set(callId, result);
    this.waiters.get(callId)?.wake();
  }

  /**
   * Waits for the reply of a registered blocking call and consumes it.
   *
   * @param timeout Seconds.
   * @returns The reply value.
   * @throws {CommTimeoutError} when no reply arrives in time. The call is
   * then forgotten.
   * @throws the rebuilt remote error for an error reply.
   */
  public waitAndConsume(callId: CallId, callName: string, timeout: number): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const consume = (): boolean => {
        const result = this.inbox.get(callId);
        if (!result) return false;
        this.inbox.delete(callId);
        if (result.isError) {
          reject(this.options.rebuildError(result.error));
        } else {
          resolve(result.value);
        }
        return true;
      };

      if (consume()) return;
      if (!this.waitlist.has(callId)) {
        reject(new CommError(`Call '${callName}' (${callId}) is not awaiting a reply.`));
        return;
      }

      const timer = setTimeout(() => {
        this.waiters.delete(callId);
        this.deregister(callId);
        reject(
          new CommTimeoutError(`Timeout while waiting for '${callName}' reply (id: ${callId}).`, {
            callName,
            callId,
            timeout,
          }),
        );
      }, timeoutToDelay(timeout));

      this.waiters.set(callId, {
        wake: () => {
          clearTimeout(timer);
          this.waiters.delete(callId);
          consume();
        },
        abort: (error) => {
          clearTimeout(timer);
          this.waiters.delete(callId);
          reject(error);
        },
      });
    });
  }

  /** Rejects every waiting caller with `error` and forgets all calls. */
  public abortAll(error: Error): void {
    const waiters = [...this.waiters.values()];
    this.waiters.clear();
    this.waitlist.clear();
    this.inbox.clear();
    waiters.forEach((waiter) => waiter.abort(error));
  }
}
