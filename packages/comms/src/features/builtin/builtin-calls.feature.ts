import type { Feature } from '../../runtime/framework/feature.js';
import type { CallContext, CommLogger } from '../../types/common.js';
import { HANDSHAKE_CALL, PING_CALL, PONG_CALL } from '../../types/protocol.js';
import type { CallExecutorContribution } from '../call/call-executor.feature.js';
import type { CallManagerContribution } from '../call/call-manager.feature.js';
import type { CodecContribution } from '../codec/codec.feature.js';
import type { SessionContribution } from '../session/session.feature.js';

type BuiltinCallsRequires =
  CallExecutorContribution &
  CallManagerContribution &
  SessionContribution &
  CodecContribution;

/**
 * The calls every endpoint answers:
 *
 * - `_set_codec_version(version)` completes the handshake of the calling
 *   channel. Each side sends it, non-blocking, as soon as it registers a
 *   channel, with its own highest codec version.
 * - `ping()` answers with a non-blocking `pong()` on the calling channel.
 * - `pong()` does nothing.
 */
export class BuiltinCallsFeature implements Feature<{}, BuiltinCallsRequires> {
  constructor(private readonly logger: CommLogger) {}

  public contribute(): {} {
    return {};
  }

  public init(capability: BuiltinCallsRequires): void {
    const { registerCallHandler, remoteCall, markReady, sessionEmitter, codec } = capability;
    const logger = this.logger;

    registerCallHandler(HANDSHAKE_CALL, function (this: CallContext, requested: unknown) {
      if (typeof requested !== 'number' || !Number.isInteger(requested) || requested < 1) {
        logger.warn(`[comms builtin] Ignoring handshake with invalid codec version: ${String(requested)}`);
        return;
      }
      markReady(this.channelId, requested);
    });

    registerCallHandler(PING_CALL, async function (this: CallContext) {
      await remoteCall({ channelId: this.channelId }).call(PONG_CALL).invoke();
    });

    registerCallHandler(PONG_CALL, () => undefined);

    sessionEmitter.on('open', (session) => {
      remoteCall({ channelId: session.id })
        .call(HANDSHAKE_CALL)
        .invoke(codec.maxSupportedVersion())
        .catch((error: unknown) => {
          logger.warn(`[comms builtin] Handshake on channel ${session.id} failed:`, error);
        });
    });
  }

  public close(): void {}
}
