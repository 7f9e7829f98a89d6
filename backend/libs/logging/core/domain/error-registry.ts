import { ErrorIdentity, IdentityTable } from './error-identity';
import { LogFields } from './error-chain';

/**
 * Extracts structured fields from an error of a registered identity.
 * Handlers only insert fields; they receive the chain node as-is and narrow it
 * themselves.
 */
export type ErrorLogHandler = (err: unknown, fields: LogFields) => void;

/**
 * ErrorRegistry - Maps error identities to field-extracting handlers.
 *
 * Register handlers for error types you don't control. For your own errors,
 * implementing `setLogFields` is simpler and wins over any registration.
 *
 * @example
 * ```typescript
 * errorRegistry.register((err, fields) => {
 *   if (err instanceof QueryFailedError) {
 *     fields.db_query = err.query;
 *   }
 * }, QueryFailedError);
 * ```
 */
export class ErrorRegistry {
  private readonly handlers = new IdentityTable<ErrorLogHandler>();

  /**
   * Register `handler` for every identity. Classes match by type, anything
   * else by value; nullish identities are skipped.
   */
  register(
    handler: ErrorLogHandler,
    ...identities: (ErrorIdentity | null | undefined)[]
  ): void {
    for (const identity of identities) {
      this.handlers.set(identity, handler);
    }
  }

  lookup(err: unknown): ErrorLogHandler | undefined {
    return this.handlers.get(err);
  }

  clear(): void {
    this.handlers.clear();
  }
}

/** Process-wide registry, populated at startup. */
export const errorRegistry = new ErrorRegistry();

export function registerErrorLogHandler(
  handler: ErrorLogHandler,
  ...identities: (ErrorIdentity | null | undefined)[]
): void {
  errorRegistry.register(handler, ...identities);
}
