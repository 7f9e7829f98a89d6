/**
 * Public API exports for the logging library.
 * This allows clean imports: import { LoggingModule, trace } from '@logging'
 */

// Module
export { LoggingModule } from './logging.module';

// Error enrichment
export {
  ErrorRegistry,
  ErrorLogHandler,
  LogFields,
  LogFieldsProvider,
  LogEntry,
  StackInhibitSet,
  StackTracer,
  TracedError,
  ContextFieldCollector,
  LoggingModuleOptions,
  errorRegistry,
  getTracedError,
  inhibitStackTrace,
  registerErrorLogHandler,
  requestContextFields,
  trace,
  unwrapError,
} from './core/domain';
export { LogFieldKey, LogFormat, LogLevel } from './core/value-objects';

// Services
export { LoggingService } from './service/logging.service';
export { ContextService } from './service/context.service';

// Presentation
export {
  LoggingInterceptor,
  NoLog,
  Service,
  defaultErrorLogHandler,
  getInnerHttpError,
  newHttpError,
  registerDefaultErrorHandlers,
} from './presentation';

// Infrastructure
export { LogSinkPort } from './core/ports/out';
export { SinkLogger } from './infrastructure';
