import {
  ForbiddenException,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { LogFields, newHttpError, trace } from '@logging';

/**
 * Expected outcome of a lookup, not worth a stack trace.
 */
export class UserNotFoundError extends Error {
  override readonly name = 'UserNotFoundError';

  constructor(readonly userId: string) {
    super(`user ${userId} not found`);
  }
}

/**
 * Repository failure that describes itself in the access record.
 */
export class UserLookupError extends Error {
  override readonly name = 'UserLookupError';

  constructor(
    readonly userId: string,
    cause: unknown,
  ) {
    super(`lookup of user ${userId} failed`, { cause });
  }

  setLogFields(fields: LogFields): void {
    fields.user_id = this.userId;
  }
}

/** Sent as 403 {"statusCode":403,"message":"User disabled"}. */
export const USER_DISABLED = new ForbiddenException('User disabled');

/** Sent as 403 {"statusCode":403,"message":"Nope"}. */
export const NOPE = new ForbiddenException('Nope');

/**
 * Generic 500 "User error" for the caller; the traced cause stays in the log.
 */
export function userError(err: unknown): HttpException {
  return newHttpError(trace(err), HttpStatus.INTERNAL_SERVER_ERROR, 'User error');
}
