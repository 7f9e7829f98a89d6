import { ConfigService } from '@nestjs/config';
import { resolve } from 'path';
import { LogSinkPort } from '@logging/out-ports';
import { LogFormat, LogLevel } from '@logging/value-objects';
import { FileLogSink } from './file/file.log-sink';
import { JsonLogFormatter, LogFormatter, TextLogFormatter } from './formatters';
import { StreamLogSink } from './stream/stream.log-sink';

/**
 * Production defaults to JSON, everything else to the text format.
 */
export function createLogFormatter(configService: ConfigService): LogFormatter {
  const format =
    configService.get<LogFormat>('LOG_FORMAT') ??
    (configService.get<string>('NODE_ENV') === 'production'
      ? LogFormat.JSON
      : LogFormat.TEXT);
  return format === LogFormat.JSON
    ? new JsonLogFormatter()
    : new TextLogFormatter();
}

/**
 * File sink when `LOG_FILE_PATH` is set, stdout otherwise.
 * A relative path is taken from `paths.projectRoot` when that is loaded.
 */
export function createLogSink(configService: ConfigService): LogSinkPort {
  const formatter = createLogFormatter(configService);
  const level = configService.get<LogLevel>('LOG_LEVEL', LogLevel.INFO);
  const filePath = configService.get<string>('LOG_FILE_PATH');

  if (filePath) {
    const root = configService.get<string>('paths.projectRoot', process.cwd());
    return new FileLogSink(resolve(root, filePath), formatter, level);
  }
  return new StreamLogSink(process.stdout, formatter, level);
}
