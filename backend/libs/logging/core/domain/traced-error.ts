import { Logger } from '@nestjs/common';
import { LogFieldKey } from '../value-objects';
import {
  LogFields,
  LogFieldsProvider,
  errorMessage,
  findInChain,
  typeName,
} from './error-chain';
import { StackInhibitSet, stackInhibitSet } from './stack-inhibit-set';

/**
 * TracedError - Carries the call stack of the point where `trace` first saw
 * an error.
 *
 * The message is the wrapped error's message; the stack only surfaces in log
 * records through `setLogFields`, or through `callStack`.
 */
export class TracedError extends Error implements LogFieldsProvider {
  override readonly name = 'TracedError';

  constructor(
    cause: unknown,
    readonly callStack: string,
  ) {
    super(errorMessage(cause), { cause });
  }

  setLogFields(fields: LogFields): void {
    fields[LogFieldKey.ERROR_STACK] = this.callStack;
  }

  unwrap(): unknown {
    return this.cause;
  }

  /** Class name of the wrapped error. */
  typeName(): string {
    return typeName(this.cause);
  }
}

/**
 * Receives diagnostics emitted by the tracer.
 */
export type TraceReporter = (message: string, fields: LogFields) => void;

function captureCallStack(): string {
  const { stack = '' } = new Error();
  // Drop the "Error" header line
  return stack.split('\n').slice(1).join('\n');
}

/**
 * StackTracer - Wraps errors in a TracedError at most once per chain.
 */
export class StackTracer {
  private readonly logger = new Logger(StackTracer.name);
  private reporter: TraceReporter = (message, fields) =>
    this.logger.error(message, fields[LogFieldKey.ERROR_STACK]);

  /**
   * Emit a record as soon as a stack is captured, for errors that might be
   * dropped before anything logs them.
   */
  logImmediately = false;

  constructor(private readonly inhibitSet: StackInhibitSet) {}

  setReporter(reporter: TraceReporter): void {
    this.reporter = reporter;
  }

  trace<E>(err: E): E | TracedError | undefined {
    if (err === null || err === undefined) {
      return undefined;
    }

    if (!err) {
      // Usually `trace(a && b)`: the value is not an error at all
      this.reporter(
        `# FALSY VALUE PASSED TO trace (value is ${String(err)}, type is ${typeof err}) #`,
        { [LogFieldKey.ERROR_STACK]: captureCallStack() },
      );
      return undefined;
    }

    if (this.inhibitSet.isInhibited(err)) {
      return err;
    }

    if (findInChain(err, TracedError)) {
      return err;
    }

    const callStack = captureCallStack();
    if (this.logImmediately) {
      this.reporter('ERROR', {
        [LogFieldKey.ERROR_MESSAGE]: errorMessage(err),
        [LogFieldKey.ERROR_STACK]: callStack,
      });
    }

    return new TracedError(err, callStack);
  }
}

/** Process-wide tracer backed by the default inhibit set. */
export const stackTracer = new StackTracer(stackInhibitSet);

/**
 * Wrap `err` with the current call stack unless it is inhibited or already
 * traced.
 */
export function trace<E>(err: E): E | TracedError | undefined {
  return stackTracer.trace(err);
}

/**
 * The TracedError inside `err`'s chain, if any.
 */
export function getTracedError(err: unknown): TracedError | undefined {
  return findInChain(err, TracedError);
}
