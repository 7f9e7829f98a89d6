import { LogRecord } from '@logging/domain';
import { LogSinkPort } from '@logging/out-ports';
import { LOG_LEVEL_SEVERITY, LogLevel } from '@logging/value-objects';
import { LogFormatter } from '../formatters';

/**
 * Anything lines can be written to, e.g. `process.stdout`.
 */
export interface LogWriter {
  write(chunk: string): unknown;
}

/**
 * StreamLogSink - Infrastructure layer implementation of LogSinkPort.
 * Formats records at or above the minimum level and writes them to a stream.
 * No business logic, no context construction - pure I/O.
 */
export class StreamLogSink extends LogSinkPort {
  constructor(
    protected readonly writer: LogWriter,
    protected readonly formatter: LogFormatter,
    protected readonly minLevel: LogLevel = LogLevel.INFO,
  ) {
    super();
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_SEVERITY[level] >= LOG_LEVEL_SEVERITY[this.minLevel];
  }

  override emit(record: LogRecord): void {
    if (!this.isLevelEnabled(record.level)) {
      return;
    }
    this.writer.write(this.formatter.format(record));
  }
}
