import { LogLevel } from '../value-objects';
import { LogFields } from './error-chain';

/**
 * LogRecord - One rendered-to-be log line: what the sink receives.
 */
export interface LogRecord {
  level: LogLevel;
  message: string;
  time: Date;
  fields: LogFields;
}

/**
 * Anything a LogEntry can hand its record to.
 */
export interface LogRecordEmitter {
  emit(record: LogRecord): void;
}
