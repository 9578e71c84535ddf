import { z } from 'zod';
import { createDefaultCodec, type PayloadCodec } from '@commwire/codec';
import type { CommLogger } from '../types/common.js';
import type { AsyncErrorHandler } from '../features/error/error.feature.js';

/**
 * Configuration of one comm endpoint. Every field is optional.
 */
export interface CommEndpointOptions {
  /** The target name channels are opened under and accepted by. */
  commName?: string;
  /** Seconds a blocking call waits when the call sets no timeout. */
  defaultTimeout?: number;
  /** Describes this side's runtime in every outgoing message. */
  runtimeDescriptor?: string;
  codec?: PayloadCodec;
  logger?: CommLogger;
  /** Replaces the default printing of remote errors no caller waits for. */
  onAsyncError?: AsyncErrorHandler;
}

export type ResolvedOptions = Required<Omit<CommEndpointOptions, 'onAsyncError'>> &
  Pick<CommEndpointOptions, 'onAsyncError'>;

const DEFAULT_OPTIONS: Omit<ResolvedOptions, 'codec'> = {
  commName: 'comm_api',
  defaultTimeout: 3,
  runtimeDescriptor: `node ${process.version}`,
  logger: console,
};

const optionsSchema = z.object({
  commName: z.string().min(1).optional(),
  defaultTimeout: z.number().finite().positive().optional(),
  runtimeDescriptor: z.string().optional(),
});

/**
 * Validates user options and fills in the defaults.
 * @throws {TypeError} for an empty `commName` or a non-positive `defaultTimeout`.
 */
export function resolveOptions(options: CommEndpointOptions = {}): ResolvedOptions {
  const checked = optionsSchema.safeParse(options);
  if (!checked.success) {
    throw new TypeError(`Invalid comm endpoint options: ${checked.error.message}`);
  }
  const { commName, defaultTimeout, runtimeDescriptor } = checked.data;
  return {
    commName: commName ?? DEFAULT_OPTIONS.commName,
    defaultTimeout: defaultTimeout ?? DEFAULT_OPTIONS.defaultTimeout,
    runtimeDescriptor: runtimeDescriptor ?? DEFAULT_OPTIONS.runtimeDescriptor,
    codec: options.codec ?? createDefaultCodec(),
    logger: options.logger ?? DEFAULT_OPTIONS.logger,
    onAsyncError: options.onAsyncError,
  };
}
