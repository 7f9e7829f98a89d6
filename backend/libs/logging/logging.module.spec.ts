import { ForbiddenException } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { LogRecord, errorRegistry, stackTracer } from '@logging/domain';
import { LogSinkPort } from '@logging/out-ports';
import { defaultErrorLogHandler } from '@logging/presentation';
import { LoggingService } from '@logging/service';
import { LogFieldKey, LogLevel } from '@logging/value-objects';
import { LoggingModule } from './logging.module';

describe('LoggingModule', () => {
  let module: TestingModule;
  let records: LogRecord[];

  beforeEach(async () => {
    records = [];
    errorRegistry.clear();
    module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ ignoreEnvFile: true, isGlobal: true }),
        LoggingModule.forRoot(),
      ],
    })
      .overrideProvider(LogSinkPort)
      .useValue({ emit: (record: LogRecord) => records.push(record) })
      .compile();
    await module.init();
  });

  afterEach(async () => {
    await module.close();
  });

  it('should provide the logging service', () => {
    expect(module.get(LoggingService)).toBeInstanceOf(LoggingService);
  });

  it('should register the default error handlers', () => {
    expect(errorRegistry.lookup(new ForbiddenException())).toBe(
      defaultErrorLogHandler,
    );
  });

  it('should send tracer diagnostics to the log sink', () => {
    stackTracer.trace(0);

    expect(records).toHaveLength(1);
    expect(records[0].level).toBe(LogLevel.ERROR);
    expect(records[0].message).toBe(
      '# FALSY VALUE PASSED TO trace (value is 0, type is number) #',
    );
    expect(typeof records[0].fields[LogFieldKey.ERROR_STACK]).toBe('string');
  });
});

describe('LoggingModule without default handlers', () => {
  it('should leave the registry alone', async () => {
    errorRegistry.clear();
    const module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ ignoreEnvFile: true, isGlobal: true }),
        LoggingModule.forRoot({ registerDefaultErrorHandlers: false }),
      ],
    })
      .overrideProvider(LogSinkPort)
      .useValue({ emit: jest.fn() })
      .compile();
    await module.init();

    expect(errorRegistry.lookup(new ForbiddenException())).toBeUndefined();
    await module.close();
  });
});
