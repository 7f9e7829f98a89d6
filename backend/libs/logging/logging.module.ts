import {
  DynamicModule,
  Global,
  Inject,
  Module,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  ErrorRegistry,
  LOGGING_MODULE_OPTIONS,
  LoggingModuleOptions,
  StackInhibitSet,
  StackTracer,
  errorRegistry,
  stackInhibitSet,
  stackTracer,
} from '@logging/domain';
import { LogSinkPort } from '@logging/out-ports';
import { ContextService, LoggingService } from '@logging/service';
import {
  LoggingInterceptor,
  registerDefaultErrorHandlers,
} from '@logging/presentation';
import { SinkLogger, createLogSink } from '@logging/infrastructure';

/**
 * LoggingModule - NestJS module for the logging library.
 *
 * This module is marked as @Global() so it can be imported once in AppModule
 * and used throughout the application without re-importing.
 *
 * The registry, inhibit set and tracer are the process-wide defaults, so the
 * free functions (`registerErrorLogHandler`, `inhibitStackTrace`, `trace`)
 * and the injected instances share one state.
 */
@Global()
@Module({})
export class LoggingModule implements OnModuleInit {
  constructor(
    private readonly configService: ConfigService,
    private readonly loggingService: LoggingService,
    private readonly registry: ErrorRegistry,
    private readonly tracer: StackTracer,
    @Inject(LOGGING_MODULE_OPTIONS)
    private readonly options: LoggingModuleOptions,
  ) {}

  static forRoot(options: LoggingModuleOptions = {}): DynamicModule {
    return {
      module: LoggingModule,
      imports: [ConfigModule],
      providers: [
        { provide: LOGGING_MODULE_OPTIONS, useValue: options },
        { provide: ErrorRegistry, useValue: errorRegistry },
        { provide: StackInhibitSet, useValue: stackInhibitSet },
        { provide: StackTracer, useValue: stackTracer },
        {
          provide: LogSinkPort,
          useFactory: createLogSink,
          inject: [ConfigService],
        },
        ContextService,
        LoggingService,
        LoggingInterceptor,
        SinkLogger,
      ],
      exports: [
        ErrorRegistry,
        StackInhibitSet,
        StackTracer,
        LogSinkPort,
        ContextService,
        LoggingService,
        LoggingInterceptor,
        SinkLogger,
      ],
    };
  }

  onModuleInit(): void {
    // Validated config holds a boolean, raw env a string
    const direct = this.configService.get<boolean | string>(
      'LOG_CALLSTACK_DIRECTLY',
    );
    this.tracer.logImmediately = direct === true || direct === 'true';
    this.tracer.setReporter((message, fields) =>
      this.loggingService.newEntry().withFields(fields).error(message),
    );

    if (this.options.registerDefaultErrorHandlers !== false) {
      registerDefaultErrorHandlers(this.registry);
    }
  }
}
