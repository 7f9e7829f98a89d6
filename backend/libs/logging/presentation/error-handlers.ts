import { HttpException } from '@nestjs/common';
import {
  JsonWebTokenError,
  NotBeforeError,
  TokenExpiredError,
} from 'jsonwebtoken';
import {
  ErrorRegistry,
  LogFields,
  errorRegistry,
  typeName,
} from '@logging/domain';
import { LogFieldKey } from '@logging/value-objects';

/** Set when the default handler is registered for a type it cannot read. */
export const UNHANDLED_ERROR_FIELD = 'errorlogger';

/**
 * The response body when it is a string or a payload without a string
 * `message`, e.g. `{ error_code: 42 }`; the exception message otherwise.
 */
function httpMessage(err: HttpException): unknown {
  const response = err.getResponse();
  if (
    typeof response === 'string' ||
    !('message' in response) ||
    typeof response.message !== 'string'
  ) {
    return response;
  }
  return err.message;
}

/**
 * Fields for HttpException and the jsonwebtoken error family.
 */
export function defaultErrorLogHandler(err: unknown, fields: LogFields): void {
  if (err instanceof HttpException) {
    fields[LogFieldKey.HTTP_MESSAGE] = httpMessage(err);
    fields[LogFieldKey.HTTP_STATUS] = err.getStatus();
    return;
  }

  if (err instanceof JsonWebTokenError) {
    fields[LogFieldKey.JWT_ERROR] = err.name;
    fields[LogFieldKey.JWT_TEXT] = err.message;
    if (err instanceof TokenExpiredError) {
      fields[LogFieldKey.JWT_EXPIRED_AT] = err.expiredAt.toISOString();
    }
    if (err instanceof NotBeforeError) {
      fields[LogFieldKey.JWT_NOT_BEFORE] = err.date.toISOString();
    }
    return;
  }

  fields[UNHANDLED_ERROR_FIELD] =
    `defaultErrorLogHandler: don't know how to handle ${typeName(err)}`;
}

export function registerDefaultErrorHandlers(
  registry: ErrorRegistry = errorRegistry,
): void {
  registry.register(defaultErrorLogHandler, HttpException, JsonWebTokenError);
}
