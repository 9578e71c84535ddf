import type { CallId } from '../../types/common.js';
import type { ErrorDescriptor, StackFrame } from '../../types/protocol.js';

// `    at fn (file:line:col)` or `    at file:line:col`
const LOCATED_FRAME = /^\s*at (?:(.+?) \()?(.*?):(\d+):(\d+)\)?$/;
// `    at new Promise (<anonymous>)`
const UNLOCATED_FRAME = /^\s*at (.+?) \((.+)\)$/;

/**
 * Parses V8 stack text into frames, innermost frame last. Lines that are not
 * frames, such as the leading `Name: message` line, are skipped.
 */
export function parseStackFrames(stack: string): StackFrame[] {
  const frames: StackFrame[] = [];
  for (const line of stack.split('\n')) {
    const located = LOCATED_FRAME.exec(line);
    if (located) {
      frames.push({
        functionName: located[1] ?? '<anonymous>',
        file: located[2],
        line: Number(located[3]),
        column: Number(located[4]),
      });
      continue;
    }
    const unlocated = UNLOCATED_FRAME.exec(line);
    if (unlocated) {
      frames.push({ functionName: unlocated[1], file: unlocated[2], line: null, column: null });
    }
  }
  return frames.reverse();
}

/**
 * Subclasses that leave `name` at its inherited `'Error'` are known by their
 * constructor's name.
 */
function errorKindOf(error: Error): string {
  const ctorName = error.constructor.name;
  if (error.name === 'Error' && error.constructor !== Error && ctorName) {
    return ctorName;
  }
  return error.name || 'Error';
}

/**
 * Captures an error raised while executing a call, in a form that survives
 * the trip back to the caller. Thrown non-`Error` values get the kind `Error`.
 */
export function describeError(error: unknown, callName: string, callId: CallId): ErrorDescriptor {
  if (error instanceof Error) {
    const stack = error.stack ?? null;
    return {
      kind: errorKindOf(error),
      message: error.message,
      callName,
      callId,
      frames: stack === null ? [] : parseStackFrames(stack),
      stack,
    };
  }
  return { kind: 'Error', message: String(error), callName, callId, frames: [], stack: null };
}

function formatFrame(frame: StackFrame): string {
  const location = frame.line === null ? frame.file : `${frame.file}:${frame.line}:${frame.column ?? 0}`;
  return `    at ${frame.functionName} (${location})`;
}

/**
 * Renders a descriptor as printable lines: a header naming the call, the
 * remote frames outermost first, then `kind: message`.
 */
export function formatErrorDescriptor(descriptor: ErrorDescriptor): string[] {
  return [
    `Exception in comms call ${descriptor.callName}:`,
    ...descriptor.frames.map(formatFrame),
    `${descriptor.kind}: ${descriptor.message}`,
  ];
}
