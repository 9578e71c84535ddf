import { MemoryConnector } from '@commwire/transport-mem';
import { createDefaultCodec } from '@commwire/codec';
import {
  CommError,
  CommTimeoutError,
  NoSuchCallError,
  RemoteError,
  createCommEndpoint,
  createFrontendComm,
  createKernelComm,
  remoteDescriptorOf,
  type CallContext,
} from '../src/index.js';
import { FailingChannel, connectPair, createTestLogger } from './helpers.js';

class ZeroDivisionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ZeroDivisionError';
  }
}

interface KernelApi {
  add(x: number, y: number): number;
}

describe('comm endpoints', () => {
  describe('handshake', () => {
    it('makes both sides ready over the same channel', async () => {
      const { kernel, frontend } = await connectPair();

      expect(kernel.isReady()).toBe(true);
      expect(frontend.isReady()).toBe(true);
      expect(kernel.getChannelIds()).toEqual(frontend.getChannelIds());
    });

    it('uses the richer codec when both sides support it', async () => {
      const { kernel, frontend } = await connectPair();
      kernel.registerCallHandler('typeOf', (value: unknown) => (value instanceof Date ? 'date' : typeof value));

      const typeOf = frontend.remoteCall({ blocking: true }).call('typeOf');
      await expect(typeOf.invoke(new Date(0))).resolves.toBe('date');
    });

    it('falls back to the version both sides support', async () => {
      const { kernel, frontend } = await connectPair({}, { codec: createDefaultCodec({ maxVersion: 1 }) });
      kernel.registerCallHandler('typeOf', (value: unknown) => (value instanceof Date ? 'date' : typeof value));

      const typeOf = frontend.remoteCall({ blocking: true }).call('typeOf');
      await expect(typeOf.invoke(new Date(0))).resolves.toBe('string');
    });

    it('ignores a repeated handshake', async () => {
      const { kernelLogger, frontend } = await connectPair();

      await frontend.remoteCall({ blocking: true }).call('_set_codec_version').invoke(1);

      const [channelId] = frontend.getChannelIds();
      expect(kernelLogger.debug).toHaveBeenCalledWith(
        `[comms session] Ignoring repeated handshake on channel ${channelId}.`,
      );
    });

    it('refuses to wait for a channel that is not open', async () => {
      const { frontend } = await connectPair();
      await expect(frontend.whenReady('no-such-channel')).rejects.toThrow('Channel no-such-channel is not open.');
    });

    it('stops waiting for readiness once the only unready channel closes', async () => {
      const { kernel } = await connectPair();
      kernel.registerChannel(new FailingChannel('broken-1'));
      expect(kernel.isReady()).toBe(false);

      const ready = kernel.whenReady();
      await kernel.close('broken-1');
      await expect(ready).resolves.toBeUndefined();
      expect(kernel.isReady()).toBe(true);
    });

    it('times out waiting for readiness without channels', async () => {
      const endpoint = await createCommEndpoint({ logger: createTestLogger() });
      expect(endpoint.isReady()).toBe(false);
      await expect(endpoint.whenReady(undefined, 0.01)).rejects.toBeInstanceOf(CommTimeoutError);
    });
  });

  describe('blocking calls', () => {
    it('returns the remote value', async () => {
      const { kernel, frontend } = await connectPair();
      kernel.registerCallHandler('add', (x: number, y: number) => x + y);

      await expect(frontend.remoteCall({ blocking: true }).call('add').invoke(2, 3)).resolves.toBe(5);
    });

    it('works in both directions', async () => {
      const { kernel, frontend } = await connectPair();
      frontend.registerCallHandler('upper', (text: string) => text.toUpperCase());

      await expect(kernel.remoteCall({ blocking: true }).call('upper').invoke('abc')).resolves.toBe('ABC');
    });

    it('awaits asynchronous handlers', async () => {
      const { kernel, frontend } = await connectPair();
      kernel.registerCallHandler('later', async (value: number) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return value * 2;
      });

      await expect(frontend.remoteCall({ blocking: true }).call('later').invoke(21)).resolves.toBe(42);
    });

    it('calls through a typed stub', async () => {
      const { kernel, frontend } = await connectPair();
      kernel.registerCallHandler('add', (x: number, y: number) => x + y);

      const api = frontend.remoteCall({ blocking: true }).stub<KernelApi>();
      const sum: number = await api.add(20, 22);
      expect(sum).toBe(42);
    });

    it('passes keyword arguments as a trailing object', async () => {
      const { kernel, frontend } = await connectPair();
      kernel.registerCallHandler('greet', (name: string, options?: { punctuation?: string }) => {
        return `Hello, ${name}${options?.punctuation ?? '.'}`;
      });
      const greet = frontend.remoteCall({ blocking: true }).call('greet');

      await expect(greet.invokeWithKwargs(['Ada'], { punctuation: '!' })).resolves.toBe('Hello, Ada!');
      await expect(greet.invoke('Ada')).resolves.toBe('Hello, Ada.');
    });

    it('binds the call context as this', async () => {
      const { kernel, frontend } = await connectPair();
      kernel.registerCallHandler('whoami', function (this: CallContext) {
        return `${this.callName}@${this.channelId}`;
      });

      const [channelId] = frontend.getChannelIds();
      await expect(frontend.remoteCall({ blocking: true }).call('whoami').invoke()).resolves.toBe(`whoami@${channelId}`);
    });

    it('raises a registered error kind with the remote trace attached', async () => {
      const { kernel, frontend } = await connectPair();
      kernel.registerCallHandler('divide', (x: number, y: number) => {
        if (y === 0) throw new ZeroDivisionError('division by zero');
        return x / y;
      });
      frontend.registerErrorKind('ZeroDivisionError', ZeroDivisionError);

      const error: unknown = await frontend
        .remoteCall({ blocking: true })
        .call('divide')
        .invoke(1, 0)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ZeroDivisionError);
      expect(error).toHaveProperty('message', 'division by zero');
      const descriptor = remoteDescriptorOf(error);
      expect(descriptor?.kind).toBe('ZeroDivisionError');
      expect(descriptor?.callName).toBe('divide');
      expect(descriptor?.frames.length).toBeGreaterThan(0);
    });

    it('raises an unregistered error kind as a RemoteError', async () => {
      const { kernel, frontend } = await connectPair();
      kernel.registerCallHandler('divide', () => {
        throw new ZeroDivisionError('division by zero');
      });

      const call = frontend.remoteCall({ blocking: true }).call('divide').invoke(1, 0);
      await expect(call).rejects.toBeInstanceOf(RemoteError);
      await expect(call).rejects.toHaveProperty('kind', 'ZeroDivisionError');
    });

    it('raises NoSuchCallError for an unknown call', async () => {
      const { frontend } = await connectPair();

      const call = frontend.remoteCall({ blocking: true }).call('missing').invoke();
      await expect(call).rejects.toBeInstanceOf(NoSuchCallError);
      await expect(call).rejects.toThrow('No such call: missing');
    });

    it('times out quickly and treats the late reply as unmatched', async () => {
      const { kernel, frontend, frontendLogger } = await connectPair();
      kernel.registerCallHandler('slow', async () => {
        await new Promise((resolve) => setTimeout(resolve, 50));
        return 'late';
      });

      const started = Date.now();
      const call = frontend.remoteCall({ blocking: true, timeout: 0.01 }).call('slow').invoke();
      await expect(call).rejects.toBeInstanceOf(CommTimeoutError);
      expect(Date.now() - started).toBeLessThan(100);

      await vi.waitFor(() =>
        expect(frontendLogger.debug).toHaveBeenCalledWith(expect.stringContaining('Got an unexpected reply slow')),
      );
      expect(frontendLogger.error).not.toHaveBeenCalled();
    });

    it('waits out a timeout longer than timers accept', async () => {
      const { kernel, frontend } = await connectPair();
      kernel.registerCallHandler('later', async () => {
        await new Promise((resolve) => setTimeout(resolve, 20));
        return 'ok';
      });

      await expect(
        frontend.remoteCall({ blocking: true, timeout: 3_000_000 }).call('later').invoke(),
      ).resolves.toBe('ok');
    });

    it('lets a handler make a blocking call back to the waiting caller', async () => {
      const { kernel, frontend } = await connectPair();
      frontend.registerCallHandler('inner', (x: number) => x * 2);
      kernel.registerCallHandler('outer', function (this: CallContext, x: number) {
        return kernel.remoteCall({ blocking: true, channelId: this.channelId }).call('inner').invoke(x);
      });

      await expect(frontend.remoteCall({ blocking: true }).call('outer').invoke(10)).resolves.toBe(20);
    });

    it('uses the default timeout from the options', async () => {
      const { kernel, frontend } = await connectPair({}, { defaultTimeout: 0.01 });
      kernel.registerCallHandler('never', () => new Promise(() => undefined));

      await expect(frontend.remoteCall({ blocking: true }).call('never').invoke()).rejects.toBeInstanceOf(
        CommTimeoutError,
      );
    });
  });

  describe('non-blocking calls', () => {
    it('delivers the call without waiting', async () => {
      const { kernel, frontend } = await connectPair();
      const handler = vi.fn();
      kernel.registerCallHandler('notify', handler);

      await expect(frontend.remoteCall().call('notify').invoke('hello')).resolves.toBeUndefined();
      await vi.waitFor(() => expect(handler).toHaveBeenCalledWith('hello'));
    });

    it('passes the value of the reply to the callback', async () => {
      const { kernel, frontend } = await connectPair();
      kernel.registerCallHandler('add', (x: number, y: number) => x + y);

      const received = await new Promise<unknown>((resolve, reject) => {
        frontend.remoteCall({ callback: resolve }).call('add').invoke(4, 5).catch(reject);
      });
      expect(received).toBe(9);
    });

    it('reports remote errors to onAsyncError', async () => {
      const onAsyncError = vi.fn();
      const { kernel, frontend } = await connectPair({}, { onAsyncError });
      kernel.registerCallHandler('explode', () => {
        throw new TypeError('bad input');
      });

      await frontend.remoteCall().call('explode').invoke();

      await vi.waitFor(() => expect(onAsyncError).toHaveBeenCalledTimes(1));
      const [error, descriptor] = onAsyncError.mock.calls[0];
      expect(error).toBeInstanceOf(TypeError);
      expect(descriptor).toMatchObject({ kind: 'TypeError', message: 'bad input', callName: 'explode' });
    });

    it('prints remote errors to the logger by default', async () => {
      const { kernel, frontend, frontendLogger } = await connectPair();
      kernel.registerCallHandler('explode', () => {
        throw new TypeError('bad input');
      });

      await frontend.remoteCall().call('explode').invoke();

      await vi.waitFor(() => expect(frontendLogger.error).toHaveBeenCalledTimes(1));
      const [printed] = frontendLogger.error.mock.calls[0];
      expect(printed).toMatch(/^Exception in comms call explode:\n/);
      expect(printed).toMatch(/\nTypeError: bad input$/);
    });

    it('logs a callback failure without disturbing the endpoint', async () => {
      const { kernel, frontend, frontendLogger } = await connectPair();
      kernel.registerCallHandler('add', (x: number, y: number) => x + y);

      await frontend
        .remoteCall({
          callback: () => {
            throw new Error('callback failed');
          },
        })
        .call('add')
        .invoke(1, 1);

      await vi.waitFor(() =>
        expect(frontendLogger.error).toHaveBeenCalledWith(
          '[comms protocol] Error processing remote_call_reply message:',
          new Error('callback failed'),
        ),
      );
      await expect(frontend.remoteCall({ blocking: true }).call('add').invoke(2, 2)).resolves.toBe(4);
    });
  });

  describe('ping', () => {
    it('is answered with a pong on the calling channel', async () => {
      const { frontend } = await connectPair();
      const pong = vi.fn();
      frontend.registerCallHandler('pong', pong);

      await frontend.remoteCall().call('ping').invoke();

      await vi.waitFor(() => expect(pong).toHaveBeenCalledTimes(1));
    });
  });

  describe('closed channels', () => {
    it('drops non-blocking calls and rejects blocking ones', async () => {
      const { frontend, frontendLogger } = await connectPair();
      await frontend.close();

      expect(frontend.isOpen()).toBe(false);
      await expect(frontend.remoteCall().call('add').invoke(1, 2)).resolves.toBeUndefined();
      expect(frontendLogger.debug).toHaveBeenCalledWith("[comms call] Dropping call 'add': the comm is not connected.");
      await expect(frontend.remoteCall({ blocking: true }).call('add').invoke(1, 2)).rejects.toBeInstanceOf(CommError);
    });

    it('notices when the peer closes the channel', async () => {
      const { kernel, frontend } = await connectPair();
      await kernel.close();

      await vi.waitFor(() => expect(frontend.isOpen()).toBe(false));
      expect(frontend.isReady()).toBe(false);
    });

    it('rejects calls to a channel id that is not open', async () => {
      const { frontend } = await connectPair();

      await expect(
        frontend.remoteCall({ blocking: true, channelId: 'no-such-channel' }).call('add').invoke(1, 2),
      ).rejects.toThrow("Cannot call 'add': the comm is not connected.");
    });
  });

  describe('shutdown', () => {
    it('rejects waiting calls and closes every channel', async () => {
      const { kernel, frontend } = await connectPair();
      const never = vi.fn(() => new Promise(() => undefined));
      kernel.registerCallHandler('never', never);

      const call = frontend.remoteCall({ blocking: true, timeout: 5 }).call('never').invoke();
      const rejected = expect(call).rejects.toThrow('Endpoint is shut down; pending call aborted.');
      await vi.waitFor(() => expect(never).toHaveBeenCalled());
      await frontend.shutdown();

      await rejected;
      expect(frontend.isClosing()).toBe(true);
      expect(frontend.isOpen()).toBe(false);
      await vi.waitFor(() => expect(kernel.isOpen()).toBe(false));
    });

    it('refuses to open channels afterwards', async () => {
      const { frontend } = await connectPair();
      await frontend.shutdown();

      await expect(frontend.openChannel()).rejects.toThrow('Endpoint is shut down; cannot open channels.');
    });
  });

  describe('several channels', () => {
    async function connectTwoFrontends() {
      const connector = new MemoryConnector();
      const kernel = await createKernelComm(connector.server, { logger: createTestLogger() });
      const first = await createFrontendComm(connector.client, { logger: createTestLogger() });
      const second = await createFrontendComm(connector.client, { logger: createTestLogger() });
      await first.whenReady(undefined, 1);
      await second.whenReady(undefined, 1);
      await vi.waitFor(() => expect(kernel.getChannelIds()).toHaveLength(2));
      await kernel.whenReady(undefined, 1);
      return { kernel, first, second };
    }

    it('sends a non-blocking call to every open channel', async () => {
      const { kernel, first, second } = await connectTwoFrontends();
      const onFirst = vi.fn();
      const onSecond = vi.fn();
      first.registerCallHandler('notify', onFirst);
      second.registerCallHandler('notify', onSecond);

      await kernel.remoteCall().call('notify').invoke('all');

      await vi.waitFor(() => {
        expect(onFirst).toHaveBeenCalledWith('all');
        expect(onSecond).toHaveBeenCalledWith('all');
      });
    });

    it('returns the first reply of a blocking broadcast', async () => {
      const { kernel, first, second } = await connectTwoFrontends();
      first.registerCallHandler('name', () => 'first');
      second.registerCallHandler('name', () => 'second');

      const name = await kernel.remoteCall({ blocking: true }).call('name').invoke();
      expect(['first', 'second']).toContain(name);
    });

    it('still delivers a broadcast when one channel fails to send', async () => {
      const { kernel, frontend, kernelLogger } = await connectPair();
      frontend.registerCallHandler('add', (x: number, y: number) => x + y);
      kernel.registerChannel(new FailingChannel('broken-1'));

      await expect(kernel.remoteCall({ blocking: true }).call('add').invoke(2, 3)).resolves.toBe(5);
      expect(kernelLogger.warn).toHaveBeenCalledWith(
        '[comms session] Failed to send remote_call on channel broken-1:',
        new Error('Channel broken-1 refuses to send.'),
      );
    });

    it('fails a call when every channel fails to send', async () => {
      const endpoint = await createCommEndpoint({ logger: createTestLogger() });
      endpoint.registerChannel(new FailingChannel('broken-1'));

      await expect(endpoint.remoteCall({ blocking: true }).call('add').invoke(1, 2)).rejects.toThrow(
        'Channel broken-1 refuses to send.',
      );
    });

    it('targets a single channel by id', async () => {
      const { kernel, first, second } = await connectTwoFrontends();
      first.registerCallHandler('name', () => 'first');
      second.registerCallHandler('name', () => 'second');
      const [secondId] = second.getChannelIds();

      await expect(kernel.remoteCall({ blocking: true, channelId: secondId }).call('name').invoke()).resolves.toBe(
        'second',
      );
    });
  });

  describe('options', () => {
    it('rejects an invalid default timeout', async () => {
      await expect(createCommEndpoint({ defaultTimeout: -1 })).rejects.toBeInstanceOf(TypeError);
    });

    it('rejects an invalid call timeout', async () => {
      const endpoint = await createCommEndpoint({ logger: createTestLogger() });
      expect(() => endpoint.remoteCall({ timeout: Number.NaN })).toThrow(TypeError);
    });

    it('ignores channels opened for another comm name', async () => {
      const connector = new MemoryConnector();
      const kernelLogger = createTestLogger();
      const kernel = await createKernelComm(connector.server, { logger: kernelLogger, commName: 'plots' });
      await connector.client.open('comm_api');

      await vi.waitFor(() =>
        expect(kernelLogger.debug).toHaveBeenCalledWith(expect.stringContaining("for target 'comm_api'")),
      );
      expect(kernel.isOpen()).toBe(false);
    });
  });
});
