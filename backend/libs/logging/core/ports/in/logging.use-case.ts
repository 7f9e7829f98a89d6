import {
  HttpRequestLike,
  HttpResponseLike,
  LogEntry,
  LogFields,
  RequestLogContext,
} from '@logging/domain';

/**
 * Outcome of a request, as seen by the access log.
 */
export interface RequestOutcome {
  latencyMs: number;
  status: number;
  error?: unknown;
}

/**
 * LoggingUseCase - Inbound port for access and error logging.
 *
 * Responsibilities:
 * - Collect per-request context fields
 * - Build log entries, optionally pre-filled with the request's context
 * - Emit the single access record of a request
 */
export abstract class LoggingUseCase {
  /**
   * Build the context of a new request by running the field collectors.
   *
   * @param service Logical service name, added as the `service` field when set
   */
  abstract initializeContext(
    request: HttpRequestLike,
    response: HttpResponseLike,
    service?: string,
  ): RequestLogContext;

  /**
   * Add fields to the current request's context. No-op outside a request.
   */
  abstract addContextFields(fields: LogFields): void;

  /**
   * Replace the message of the current request's access record.
   */
  abstract setLogMessage(message: string): void;

  /** A blank entry. */
  abstract newEntry(): LogEntry;

  /** An entry carrying the current request's context fields. */
  abstract entry(): LogEntry;

  /**
   * Emit the access record for a finished request.
   */
  abstract logRequest(context: RequestLogContext, outcome: RequestOutcome): void;
}
