import type { Feature } from '../../runtime/framework/feature.js';

export interface LifecycleContribution {
  /**
   * `true` once the endpoint has started shutting down. Handlers can check it
   * to refuse new long-running work.
   */
  isClosing: () => boolean;
}

/**
 * Tracks whether the endpoint is shutting down. Listed last, so that it is
 * the first feature to close.
 */
export class LifecycleFeature implements Feature<LifecycleContribution> {
  private _isClosing = false;

  public contribute(): LifecycleContribution {
    return {
      isClosing: () => this._isClosing,
    };
  }

  public init(): void {}

  public close(): void {
    this._isClosing = true;
  }
}
