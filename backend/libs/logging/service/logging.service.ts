import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LogSinkPort } from '@logging/out-ports';
import {
  ErrorRegistry,
  HttpRequestLike,
  HttpResponseLike,
  LOGGING_MODULE_OPTIONS,
  LogEntry,
  LogFields,
  LoggingModuleOptions,
  RequestLogContext,
  requestContextFields,
} from '@logging/domain';
import { LoggingUseCase, RequestOutcome } from '@logging/in-ports';
import {
  DEFAULT_ACCESS_MESSAGE,
  LogFieldKey,
  MESSAGE_DIRECTIVE,
} from '@logging/value-objects';
import { ContextService } from './context.service';

/**
 * LoggingService - Application layer service for access and error logging.
 * Builds entries from the request context and hands records to the sink.
 *
 * Implements LoggingUseCase to follow Hexagonal Architecture pattern.
 */
@Injectable()
export class LoggingService extends LoggingUseCase {
  constructor(
    private readonly contextService: ContextService,
    private readonly sink: LogSinkPort,
    private readonly registry: ErrorRegistry,
    private readonly configService: ConfigService,
    @Optional()
    @Inject(LOGGING_MODULE_OPTIONS)
    private readonly options: LoggingModuleOptions = {},
  ) {
    super();
  }

  /**
   * Initialize logging context for a new request.
   * Should be called at the start of each HTTP request.
   */
  override initializeContext(
    request: HttpRequestLike,
    response: HttpResponseLike,
    service?: string,
  ): RequestLogContext {
    const context = new RequestLogContext();
    const collectors = this.options.collectors ?? [requestContextFields];
    for (const collect of collectors) {
      context.enrich(collect(request, response));
    }

    const serviceName =
      service ??
      this.configService.get<string>('SERVICE_NAME') ??
      this.options.serviceName;
    if (serviceName) {
      context.enrich({ [LogFieldKey.SERVICE]: serviceName });
    }
    return context;
  }

  /**
   * Add fields to the current request's access record.
   *
   * @example
   * loggingService.addContextFields({ user_id: user.id });
   */
  override addContextFields(fields: LogFields): void {
    this.contextService.addFields(fields);
  }

  override setLogMessage(message: string): void {
    this.contextService.addFields({ [MESSAGE_DIRECTIVE]: message });
  }

  override newEntry(): LogEntry {
    return new LogEntry(this.sink, this.registry);
  }

  override entry(): LogEntry {
    return this.newEntry().withContext(this.contextService.getContext());
  }

  /**
   * Emit the access record of a finished request.
   * Level is error whenever the error chain produced an `error_message`.
   */
  override logRequest(context: RequestLogContext, outcome: RequestOutcome): void {
    const entry = this.newEntry()
      .withContext(context)
      .withFields({
        [LogFieldKey.LATENCY_MS]: outcome.latencyMs,
        [LogFieldKey.STATUS]: outcome.status,
      })
      .withError(outcome.error);

    const message = context.message ?? DEFAULT_ACCESS_MESSAGE;
    if (entry.hasError()) {
      entry.error(message);
    } else {
      entry.info(message);
    }
  }
}
