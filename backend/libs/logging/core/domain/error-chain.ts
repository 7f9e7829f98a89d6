/**
 * Flat key/value payload of a single log record.
 */
export type LogFields = Record<string, unknown>;

/**
 * Implemented by errors that know how to describe themselves in a log record.
 * Takes priority over any handler registered for the same error.
 */
export interface LogFieldsProvider {
  setLogFields(fields: LogFields): void;
}

/** Upper bound on chain walks; a guard against hand-built cause cycles. */
export const MAX_CHAIN_DEPTH = 100;

export function isLogFieldsProvider(value: unknown): value is LogFieldsProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'setLogFields' in value &&
    typeof value.setLogFields === 'function'
  );
}

/**
 * Next link of an error chain (the ES2022 `cause`), or undefined at the end.
 */
export function errorCause(err: unknown): unknown {
  if (typeof err !== 'object' || err === null || !('cause' in err)) {
    return undefined;
  }
  return err.cause;
}

/**
 * Terminal node of the chain starting at `err`.
 */
export function rootCause(err: unknown): unknown {
  let current = err;
  for (let depth = 0; depth < MAX_CHAIN_DEPTH; depth++) {
    const next = errorCause(current);
    if (next === undefined || next === null) {
      break;
    }
    current = next;
  }
  return current;
}

/**
 * First node of the chain that is an instance of `type`.
 */
export function findInChain<T>(
  err: unknown,
  type: abstract new (...args: never[]) => T,
): T | undefined {
  let current = err;
  for (
    let depth = 0;
    current !== undefined && current !== null && depth < MAX_CHAIN_DEPTH;
    depth++
  ) {
    if (current instanceof type) {
      return current;
    }
    current = errorCause(current);
  }
  return undefined;
}

/**
 * Rendered message of an error-like value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  if (
    typeof err === 'object' &&
    err !== null &&
    'message' in err &&
    typeof err.message === 'string'
  ) {
    return err.message;
  }
  if (typeof err === 'object' && err !== null) {
    try {
      return JSON.stringify(err);
    } catch {
      return String(err);
    }
  }
  return String(err);
}

/**
 * Runtime type label, e.g. `HttpException` or `string`.
 */
export function typeName(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value !== 'object' && typeof value !== 'function') {
    return typeof value;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (
    typeof proto === 'object' &&
    proto !== null &&
    'constructor' in proto &&
    typeof proto.constructor === 'function' &&
    proto.constructor.name
  ) {
    return proto.constructor.name;
  }
  return 'Object';
}
