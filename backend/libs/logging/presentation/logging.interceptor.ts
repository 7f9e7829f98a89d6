import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Observable, throwError } from 'rxjs';
import { catchError, finalize, tap } from 'rxjs/operators';
import {
  HttpRequestLike,
  HttpResponseLike,
  RequestLogContext,
} from '@logging/domain';
import { ContextService, LoggingService } from '@logging/service';
import { NO_LOG_KEY } from './decorators';
import { getInnerHttpError, newHttpError } from './http-error';
import { SERVICE_METADATA_KEY } from './service.decorator';

/**
 * LoggingInterceptor - Writes one access record per HTTP request.
 *
 * Responsibilities:
 * - Collect context fields at request start and keep them in AsyncLocalStorage
 * - Track request duration
 * - Log requests that are cancelled before completing
 * - Turn a failure into the HttpException that answers the request
 * - Fold the whole error chain into the record
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  constructor(
    private readonly loggingService: LoggingService,
    private readonly contextService: ContextService,
    private readonly reflector: Reflector,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http' || this.isLoggingDisabled(context)) {
      return next.handle();
    }

    const http = context.switchToHttp();
    const request = http.getRequest<HttpRequestLike>();
    const response = http.getResponse<HttpResponseLike>();

    const service = this.reflector.getAllAndOverride<string | undefined>(
      SERVICE_METADATA_KEY,
      [context.getHandler(), context.getClass()],
    );
    const logContext = this.loggingService.initializeContext(
      request,
      response,
      service,
    );
    const startTime = Date.now();

    let written = false;
    const writeOnce = (status: number, error?: unknown): void => {
      if (written) return;
      written = true;
      this.logAccess(logContext, startTime, status, error);
    };

    // Subscribe inside the store so the handler sees the request context
    return new Observable<unknown>((subscriber) =>
      this.contextService.run(logContext, () =>
        next
          .handle()
          .pipe(
            tap({ complete: () => writeOnce(response.statusCode) }),
            catchError((error: unknown) => {
              const { httpError, logged } = this.toHttpError(error);
              writeOnce(httpError.getStatus(), logged);
              return throwError(() => httpError);
            }),
            // Unsubscribed before completing, e.g. the client disconnected
            finalize(() => writeOnce(response.statusCode)),
          )
          .subscribe(subscriber),
      ),
    );
  }

  private isLoggingDisabled(context: ExecutionContext): boolean {
    return (
      this.reflector.getAllAndOverride<boolean | undefined>(NO_LOG_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) === true
    );
  }

  /**
   * The innermost HttpException answers the request and the original error
   * is logged. Without one, a 500 wrapper does both.
   */
  private toHttpError(error: unknown): {
    httpError: HttpException;
    logged: unknown;
  } {
    const inner = getInnerHttpError(error);
    if (inner) {
      return { httpError: inner, logged: error };
    }
    const wrapper = newHttpError(error, HttpStatus.INTERNAL_SERVER_ERROR);
    return { httpError: wrapper, logged: wrapper };
  }

  private logAccess(
    logContext: RequestLogContext,
    startTime: number,
    status: number,
    error?: unknown,
  ): void {
    this.loggingService.logRequest(logContext, {
      latencyMs: Date.now() - startTime,
      status,
      error,
    });
  }
}
