import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import { LogFields, RequestLogContext } from '@logging/domain';

/**
 * ContextService - Manages request-scoped logging context using AsyncLocalStorage.
 * This ensures context is preserved across async boundaries.
 */
@Injectable()
export class ContextService {
  private readonly asyncLocalStorage =
    new AsyncLocalStorage<RequestLogContext>();

  /**
   * Run a function within a logging context.
   * This should be called at the start of each request.
   */
  run<T>(context: RequestLogContext, fn: () => T): T {
    return this.asyncLocalStorage.run(context, fn);
  }

  /**
   * Get the current logging context.
   * Returns undefined if called outside of a context.
   */
  getContext(): RequestLogContext | undefined {
    return this.asyncLocalStorage.getStore();
  }

  /**
   * Merge fields into the current context.
   * Returns false when there is no request in flight.
   */
  addFields(fields: LogFields): boolean {
    const context = this.getContext();
    if (!context) {
      return false;
    }
    context.enrich(fields);
    return true;
  }
}
