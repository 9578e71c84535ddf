import { EventEmitter, type DefaultEventMap } from 'tseep';

/**
 * An event emitter whose emissions can be awaited. It extends `tseep`'s
 * `EventEmitter`, so the plain synchronous `emit` is still available.
 *
 * @template EventMap - A map of event names to their listener signatures.
 */
export class AsyncEventEmitter<
  EventMap extends DefaultEventMap = DefaultEventMap,
> extends EventEmitter<EventMap> {
  /**
   * Emits an event and waits for all listeners, which run concurrently.
   * The returned promise rejects with the first listener failure.
   *
   * @example
   * ```ts
   * channelEvents.on('message', async (metadata, payload) => handle(metadata, payload));
   * await channelEvents.emitAsync('message', metadata, payload);
   * ```
   */
  async emitAsync<E extends keyof EventMap>(
    event: E,
    ...args: Parameters<EventMap[E]>
  ): Promise<void> {
    const listeners = this.listeners(event);
    await Promise.all(listeners.map((fn) => Promise.resolve(fn(...args))));
  }
}
