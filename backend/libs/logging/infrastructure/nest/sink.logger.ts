import { Injectable, LoggerService } from '@nestjs/common';
import { LogFields, errorMessage } from '@logging/domain';
import { LogSinkPort } from '@logging/out-ports';
import { LogFieldKey, LogLevel } from '@logging/value-objects';

const STACK_PATTERN = /^(.)+\n\s+at .+:\d+:\d+/;

export const LOGGER_CONTEXT_FIELD = 'context';

/**
 * SinkLogger - Routes Nest's own logs (bootstrap, routing, Logger instances)
 * through the same sink as access records.
 *
 * @example
 * ```typescript
 * const app = await NestFactory.create(AppModule, { bufferLogs: true });
 * app.useLogger(app.get(SinkLogger));
 * ```
 */
@Injectable()
export class SinkLogger implements LoggerService {
  constructor(private readonly sink: LogSinkPort) {}

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.INFO, message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.ERROR, message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.WARN, message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.DEBUG, message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.DEBUG, message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.ERROR, message, optionalParams);
  }

  /**
   * Nest passes the logger context last and, for errors, the stack first.
   * A lone error parameter is the stack only when it reads like one.
   */
  private write(level: LogLevel, message: unknown, params: unknown[]): void {
    const fields: LogFields = {};
    const rest = [...params];

    const last = rest[rest.length - 1];
    const loneStack =
      level === LogLevel.ERROR &&
      rest.length === 1 &&
      typeof last === 'string' &&
      STACK_PATTERN.test(last);
    if (!loneStack && typeof last === 'string') {
      fields[LOGGER_CONTEXT_FIELD] = last;
      rest.pop();
    }
    const [stack] = rest;
    if (level === LogLevel.ERROR && typeof stack === 'string') {
      fields[LogFieldKey.ERROR_STACK] = stack;
    }

    this.sink.emit({
      level,
      message: errorMessage(message),
      time: new Date(),
      fields,
    });
  }
}
