import type { CommChannel, JsonObject, JsonValue, MaybePromise } from '@commwire/transport';
import { MemoryConnector } from '@commwire/transport-mem';
import { createFrontendComm, createKernelComm, type CommEndpoint, type CommEndpointOptions } from '../src/index.js';

export function createTestLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export type TestLogger = ReturnType<typeof createTestLogger>;

export interface ConnectedPair {
  kernel: CommEndpoint;
  frontend: CommEndpoint;
  kernelLogger: TestLogger;
  frontendLogger: TestLogger;
  connector: MemoryConnector;
}

/** A kernel and a frontend over one in-memory transport, handshake completed. */
export async function connectPair(
  kernelOptions: CommEndpointOptions = {},
  frontendOptions: CommEndpointOptions = {},
): Promise<ConnectedPair> {
  const connector = new MemoryConnector();
  const kernelLogger = createTestLogger();
  const frontendLogger = createTestLogger();
  const kernel = await createKernelComm(connector.server, { logger: kernelLogger, ...kernelOptions });
  const frontend = await createFrontendComm(connector.client, { logger: frontendLogger, ...frontendOptions });
  await frontend.whenReady(undefined, 1);
  await kernel.whenReady(undefined, 1);
  return { kernel, frontend, kernelLogger, frontendLogger, connector };
}

/** Reads `content[key]` from a raw message's metadata, when content is an object. */
export function contentField(metadata: JsonObject, key: string): JsonValue | undefined {
  const content = metadata.content;
  if (typeof content !== 'object' || content === null || Array.isArray(content)) return undefined;
  return content[key];
}

/** Collects every raw message a channel receives. */
export function recordMessages(channel: CommChannel): Array<{ metadata: JsonObject; payload: Uint8Array }> {
  const messages: Array<{ metadata: JsonObject; payload: Uint8Array }> = [];
  channel.onMessage((metadata, payload) => {
    messages.push({ metadata, payload });
  });
  return messages;
}

/** A channel whose sends always fail. Closing it runs its close handlers. */
export class FailingChannel implements CommChannel {
  public readonly name = 'comm_api';
  public isClosed = false;
  private readonly closeHandlers: Array<(reason?: Error) => MaybePromise<void>> = [];

  constructor(public readonly id: string) {}

  public send(): Promise<void> {
    return Promise.reject(new Error(`Channel ${this.id} refuses to send.`));
  }

  public onMessage(): void {
    // Nothing ever arrives.
  }

  public onClose(handler: (reason?: Error) => MaybePromise<void>): void {
    this.closeHandlers.push(handler);
  }

  public async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    await Promise.all(this.closeHandlers.map((handler) => handler()));
  }
}
