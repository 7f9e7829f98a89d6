import { Logger, OnModuleDestroy } from '@nestjs/common';
import { WriteStream, createWriteStream, mkdirSync } from 'fs';
import { dirname } from 'path';
import { LogLevel } from '@logging/value-objects';
import { LogFormatter } from '../formatters';
import { StreamLogSink } from '../stream/stream.log-sink';

/**
 * FileLogSink - Appends formatted records to a local file.
 *
 * Write failures are reported through Nest's Logger and never reach the
 * request that produced the record.
 */
export class FileLogSink extends StreamLogSink implements OnModuleDestroy {
  private readonly logger = new Logger(FileLogSink.name);
  private readonly stream: WriteStream;

  constructor(
    readonly filePath: string,
    formatter: LogFormatter,
    minLevel: LogLevel = LogLevel.INFO,
  ) {
    mkdirSync(dirname(filePath), { recursive: true });
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
    super(stream, formatter, minLevel);

    this.stream = stream;
    this.stream.on('error', (error) => {
      this.logger.error(
        `Failed to write log file ${filePath}: ${error.message}`,
        error.stack,
      );
    });
  }

  onModuleDestroy(): Promise<void> {
    return new Promise((resolve) => {
      this.stream.end(() => resolve());
    });
  }
}
