import {
  LogFieldKey,
  LogLevel,
  PRIVATE_FIELD_PREFIX,
} from '../value-objects';
import { LogFields, rootCause, typeName } from './error-chain';
import { ErrorRegistry, errorRegistry } from './error-registry';
import { LogRecordEmitter } from './log-record';
import { unwrapError } from './unwrap-error';
import { RequestLogContext } from './request-context';

/**
 * LogEntry - Builder for a single structured log record.
 *
 * @example
 * ```typescript
 * loggingService.newEntry()
 *   .withFields({ job: 'reindex' })
 *   .withError(err)
 *   .error('Reindex failed');
 * ```
 */
export class LogEntry {
  readonly data: LogFields = {};

  constructor(
    private readonly emitter: LogRecordEmitter,
    private readonly registry: ErrorRegistry = errorRegistry,
  ) {}

  /**
   * Add fields to the record. Keys starting with `_` are directives for the
   * logging layer and are left out.
   */
  withFields(fields: LogFields): this {
    for (const [key, value] of Object.entries(fields)) {
      if (!key.startsWith(PRIVATE_FIELD_PREFIX)) {
        this.data[key] = value;
      }
    }
    return this;
  }

  /**
   * Add everything the error chain can tell, plus the root cause's type.
   */
  withError(err: unknown): this {
    if (err === null || err === undefined) {
      return this;
    }
    this.data[LogFieldKey.ERROR_TYPE] = typeName(rootCause(err));
    unwrapError(err, this.data, this.registry);
    return this;
  }

  /**
   * Add the fields collected for the current request.
   */
  withContext(context: RequestLogContext | undefined): this {
    if (!context) {
      return this;
    }
    return this.withFields(context.fields);
  }

  hasError(): boolean {
    return LogFieldKey.ERROR_MESSAGE in this.data;
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  warn(message: string): void {
    this.log(LogLevel.WARN, message);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  log(level: LogLevel, message: string): void {
    this.emitter.emit({
      level,
      message,
      time: new Date(),
      fields: { ...this.data },
    });
  }
}
