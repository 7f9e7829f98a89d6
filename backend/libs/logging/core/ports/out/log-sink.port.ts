import { LogRecord, LogRecordEmitter } from '@logging/domain';

/**
 * LogSinkPort - Contract for where log records go.
 * Renders and writes; must not throw back into the request path.
 */
export abstract class LogSinkPort implements LogRecordEmitter {
  abstract emit(record: LogRecord): void;
}
