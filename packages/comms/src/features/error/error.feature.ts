import type { Feature } from '../../runtime/framework/feature.js';
import type { CallId, CommLogger } from '../../types/common.js';
import type { ErrorDescriptor } from '../../types/protocol.js';
import { describeError, formatErrorDescriptor } from './error-descriptor.js';
import { ErrorKindRegistry, type ErrorKindConstructor } from './error-kinds.js';

/**
 * Receives errors raised remotely by calls nobody is waiting on: non-blocking
 * calls, and replies that match no pending call.
 */
export type AsyncErrorHandler = (error: Error, descriptor: ErrorDescriptor) => void;

export interface ErrorHandlingContribution {
  errors: {
    registerErrorKind(kind: string, ctor: ErrorKindConstructor): void;
    describe(error: unknown, callName: string, callId: CallId): ErrorDescriptor;
    rebuild(descriptor: ErrorDescriptor): Error;
    reportAsyncError(descriptor: ErrorDescriptor): void;
  };
}

export interface ErrorHandlingOptions {
  logger: CommLogger;
  onAsyncError?: AsyncErrorHandler;
}

/**
 * Owns the error-kind registry and the reporting of remote errors that have
 * no waiting caller. Without an `onAsyncError` handler those are printed to
 * the logger.
 */
export class ErrorHandlingFeature implements Feature<ErrorHandlingContribution> {
  private readonly registry = new ErrorKindRegistry();

  constructor(private readonly options: ErrorHandlingOptions) {}

  public contribute(): ErrorHandlingContribution {
    return {
      errors: {
        registerErrorKind: (kind, ctor) => this.registry.register(kind, ctor),
        describe: describeError,
        rebuild: (descriptor) => this.registry.rebuild(descriptor),
        reportAsyncError: (descriptor) => this.reportAsyncError(descriptor),
      },
    };
  }

  public init(): void {}

  public close(): void {}

  private reportAsyncError(descriptor: ErrorDescriptor): void {
    const { logger, onAsyncError } = this.options;
    if (!onAsyncError) {
      logger.error(formatErrorDescriptor(descriptor).join('\n'));
      return;
    }
    try {
      onAsyncError(this.registry.rebuild(descriptor), descriptor);
    } catch (error) {
      logger.error('[comms error] onAsyncError handler threw:', error);
    }
  }
}
