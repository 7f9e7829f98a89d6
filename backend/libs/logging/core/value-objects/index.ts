/**
 * Field names written into log records.
 * Downstream log consumers query by these, so spellings must stay stable.
 */
export enum LogFieldKey {
  ERROR_MESSAGE = 'error_message',
  ERROR_STACK = 'error_stack',
  ERROR_TYPE = 'error_type',
  LATENCY_MS = 'latency_ms',
  STATUS = 'status',
  HTTP_STATUS = 'http-status',
  HTTP_MESSAGE = 'http-message',
  JWT_ERROR = 'jwt-error',
  JWT_TEXT = 'jwt-text',
  JWT_EXPIRED_AT = 'jwt-expired-at',
  JWT_NOT_BEFORE = 'jwt-not-before',
  REQUEST_ID = 'request_id',
  REMOTE_ADDR = 'remote_addr',
  HOST = 'host',
  METHOD = 'method',
  URI = 'uri',
  ROUTER_PATH = 'router_path',
  SERVICE = 'service',
}

/** Prefix marking transient directives that never reach a record. */
export const PRIVATE_FIELD_PREFIX = '_';

/** Directive overriding the access record's message. */
export const MESSAGE_DIRECTIVE = '_msg';

export const DEFAULT_ACCESS_MESSAGE = 'access';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export const LOG_LEVEL_SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

export enum LogFormat {
  JSON = 'json',
  TEXT = 'text',
}
