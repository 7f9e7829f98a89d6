import { ConfigService } from '@nestjs/config';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileLogSink } from './file/file.log-sink';
import { JsonLogFormatter, TextLogFormatter } from './formatters';
import { createLogFormatter, createLogSink } from './log-sink.factory';
import { StreamLogSink } from './stream/stream.log-sink';

describe('createLogFormatter', () => {
  it('should honour LOG_FORMAT', () => {
    expect(
      createLogFormatter(new ConfigService({ LOG_FORMAT: 'json' })),
    ).toBeInstanceOf(JsonLogFormatter);
    expect(
      createLogFormatter(new ConfigService({ LOG_FORMAT: 'text' })),
    ).toBeInstanceOf(TextLogFormatter);
  });

  it('should use the text format outside production', () => {
    // Jest runs with NODE_ENV=test
    expect(createLogFormatter(new ConfigService({}))).toBeInstanceOf(
      TextLogFormatter,
    );
  });
});

describe('createLogSink', () => {
  it('should write to stdout without LOG_FILE_PATH', () => {
    const sink = createLogSink(new ConfigService({}));

    expect(sink).toBeInstanceOf(StreamLogSink);
    expect(sink).not.toBeInstanceOf(FileLogSink);
  });

  it('should resolve a relative LOG_FILE_PATH from the project root', async () => {
    const root = mkdtempSync(join(tmpdir(), 'log-sink-factory-'));
    const sink = createLogSink(
      new ConfigService({
        LOG_FILE_PATH: 'logs/app.log',
        paths: { projectRoot: root },
      }),
    );

    expect(sink).toBeInstanceOf(FileLogSink);
    if (sink instanceof FileLogSink) {
      expect(sink.filePath).toBe(join(root, 'logs', 'app.log'));
      await sink.onModuleDestroy();
    }
    rmSync(root, { recursive: true, force: true });
  });
});
