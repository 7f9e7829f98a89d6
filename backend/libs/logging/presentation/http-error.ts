import { HttpException } from '@nestjs/common';
import { STATUS_CODES } from 'http';
import { errorCause, findInChain } from '@logging/domain';

/**
 * HttpException carrying `cause`, so the chain below it still reaches the
 * access record.
 *
 * @param message Response body; defaults to the standard status text
 *
 * @example
 * ```typescript
 * throw newHttpError(err, HttpStatus.BAD_GATEWAY, 'Upstream unavailable');
 * ```
 */
export function newHttpError(
  cause: unknown,
  status: number,
  message?: string | Record<string, unknown>,
): HttpException {
  return new HttpException(
    message ?? STATUS_CODES[status] ?? `Status ${status}`,
    status,
    { cause },
  );
}

/**
 * The innermost HttpException of the chain, i.e. the one closest to the root
 * cause, or undefined when the chain has none.
 */
export function getInnerHttpError(err: unknown): HttpException | undefined {
  let inner: HttpException | undefined;
  let current: unknown = err;
  while (current !== null && current !== undefined) {
    const found = findInChain(current, HttpException);
    if (!found) {
      break;
    }
    inner = found;
    current = errorCause(found);
  }
  return inner;
}
