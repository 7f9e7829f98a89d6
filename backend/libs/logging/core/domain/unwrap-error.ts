import { LogFieldKey } from '../value-objects';
import {
  LogFields,
  MAX_CHAIN_DEPTH,
  errorCause,
  errorMessage,
  isLogFieldsProvider,
} from './error-chain';
import { ErrorRegistry, errorRegistry } from './error-registry';

/**
 * Walks the error chain and adds what every node knows to `fields`.
 *
 * `error_message` is the head's message. Each node then either describes
 * itself through `setLogFields` or is passed to the handler registered for
 * its identity; the walk always continues to the cause. When two nodes set
 * the same key, the one closer to the root wins.
 */
export function unwrapError(
  err: unknown,
  fields: LogFields,
  registry: ErrorRegistry = errorRegistry,
): void {
  if (err === null || err === undefined) {
    return;
  }

  fields[LogFieldKey.ERROR_MESSAGE] = errorMessage(err);

  let current: unknown = err;
  for (
    let depth = 0;
    current !== null && current !== undefined && depth < MAX_CHAIN_DEPTH;
    depth++
  ) {
    if (isLogFieldsProvider(current)) {
      current.setLogFields(fields);
    } else {
      registry.lookup(current)?.(current, fields);
    }
    current = errorCause(current);
  }
}
