import type { CallContext, CallHandler } from '../../types/common.js';
import { NoSuchCallError } from '../../types/errors.js';

/**
 * The locally callable functions, by call name.
 */
export class CallRegistry {
  private readonly handlers = new Map<string, CallHandler>();

  /** Registers `handler` under `name`, replacing any previous one. Omit it to unregister. */
  public register(name: string, handler?: CallHandler): void {
    if (handler === undefined) {
      this.handlers.delete(name);
      return;
    }
    this.handlers.set(name, handler);
  }

  /**
   * Runs the handler registered under `context.callName` with `context` as
   * `this`, and awaits its result.
   *
   * @throws {NoSuchCallError} when nothing is registered under that name.
   */
  public async execute(context: CallContext, args: unknown[]): Promise<unknown> {
    const handler = this.handlers.get(context.callName);
    if (!handler) {
      throw new NoSuchCallError(`No such call: ${context.callName}`, context.callName);
    }
    const result: unknown = await Reflect.apply(handler, context, args);
    return result;
  }
}
