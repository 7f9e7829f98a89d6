import { ForbiddenException } from '@nestjs/common';
import {
  JsonWebTokenError,
  NotBeforeError,
  TokenExpiredError,
} from 'jsonwebtoken';
import { ErrorRegistry, LogFields, unwrapError } from '@logging/domain';
import { LogFieldKey } from '@logging/value-objects';
import {
  UNHANDLED_ERROR_FIELD,
  defaultErrorLogHandler,
  registerDefaultErrorHandlers,
} from './error-handlers';
import { newHttpError } from './http-error';

describe('defaultErrorLogHandler', () => {
  it('should log status and message of an HttpException', () => {
    const fields: LogFields = {};

    defaultErrorLogHandler(new ForbiddenException('Nope'), fields);

    expect(fields).toEqual({
      [LogFieldKey.HTTP_MESSAGE]: 'Nope',
      [LogFieldKey.HTTP_STATUS]: 403,
    });
  });

  it('should log a structured response body as the http message', () => {
    const body = { error_code: 42, error_message: 'common.error.some_message' };
    const fields: LogFields = {};

    defaultErrorLogHandler(newHttpError(undefined, 404, body), fields);

    expect(fields).toEqual({
      [LogFieldKey.HTTP_MESSAGE]: body,
      [LogFieldKey.HTTP_STATUS]: 404,
    });
  });

  it('should log the name and text of a token error', () => {
    const fields: LogFields = {};

    defaultErrorLogHandler(new JsonWebTokenError('invalid signature'), fields);

    expect(fields).toEqual({
      [LogFieldKey.JWT_ERROR]: 'JsonWebTokenError',
      [LogFieldKey.JWT_TEXT]: 'invalid signature',
    });
  });

  it('should log when an expired token expired', () => {
    const fields: LogFields = {};
    const expiredAt = new Date('2024-01-02T03:04:05.000Z');

    defaultErrorLogHandler(new TokenExpiredError('jwt expired', expiredAt), fields);

    expect(fields).toEqual({
      [LogFieldKey.JWT_ERROR]: 'TokenExpiredError',
      [LogFieldKey.JWT_TEXT]: 'jwt expired',
      [LogFieldKey.JWT_EXPIRED_AT]: '2024-01-02T03:04:05.000Z',
    });
  });

  it('should log when a token becomes valid', () => {
    const fields: LogFields = {};
    const date = new Date('2030-06-01T00:00:00.000Z');

    defaultErrorLogHandler(new NotBeforeError('jwt not active', date), fields);

    expect(fields[LogFieldKey.JWT_NOT_BEFORE]).toBe('2030-06-01T00:00:00.000Z');
  });

  it('should flag types it cannot read', () => {
    const fields: LogFields = {};

    defaultErrorLogHandler(new TypeError('x'), fields);

    expect(fields).toEqual({
      [UNHANDLED_ERROR_FIELD]:
        "defaultErrorLogHandler: don't know how to handle TypeError",
    });
  });
});

describe('registerDefaultErrorHandlers', () => {
  it('should cover HttpException subclasses and token errors in a chain', () => {
    const registry = new ErrorRegistry();
    registerDefaultErrorHandlers(registry);
    const fields: LogFields = {};

    unwrapError(
      newHttpError(
        new TokenExpiredError('jwt expired', new Date('2024-01-02T03:04:05.000Z')),
        401,
        'expired token',
      ),
      fields,
      registry,
    );

    expect(fields).toEqual({
      [LogFieldKey.ERROR_MESSAGE]: 'expired token',
      [LogFieldKey.HTTP_MESSAGE]: 'expired token',
      [LogFieldKey.HTTP_STATUS]: 401,
      [LogFieldKey.JWT_ERROR]: 'TokenExpiredError',
      [LogFieldKey.JWT_TEXT]: 'jwt expired',
      [LogFieldKey.JWT_EXPIRED_AT]: '2024-01-02T03:04:05.000Z',
    });
  });
});
