import type { ChannelId, CommChannel } from '@commwire/transport';

/**
 * `opening` until the peer's handshake arrives, `ready` after. A session
 * that is closed is simply dropped from the endpoint.
 */
export type SessionStatus = 'opening' | 'ready';

/** Per-channel state: the channel itself, its status and its codec version. */
export class ChannelSession {
  private _status: SessionStatus = 'opening';
  private _codecVersion: number;

  constructor(
    public readonly channel: CommChannel,
    initialCodecVersion: number,
  ) {
    this._codecVersion = initialCodecVersion;
  }

  public get id(): ChannelId {
    return this.channel.id;
  }

  public get status(): SessionStatus {
    return this._status;
  }

  public get isReady(): boolean {
    return this._status === 'ready';
  }

  /** The version outgoing payloads are encoded with. */
  public get codecVersion(): number {
    return this._codecVersion;
  }

  /**
   * Moves the session to `ready` with the negotiated version.
   * @returns `false` if the session was already ready; nothing changes then.
   */
  public markReady(codecVersion: number): boolean {
    if (this._status === 'ready') return false;
    this._codecVersion = codecVersion;
    this._status = 'ready';
    return true;
  }
}
