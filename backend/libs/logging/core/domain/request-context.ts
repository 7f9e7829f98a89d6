import { MESSAGE_DIRECTIVE } from '../value-objects';
import { LogFields } from './error-chain';

/**
 * RequestLogContext - Mutable per-request field set, enriched throughout the
 * request lifecycle and folded into the access record at the end.
 *
 * Keys starting with `_` are directives (e.g. `_msg`) that shape the record
 * without being written into it.
 */
export class RequestLogContext {
  public readonly fields: LogFields;

  constructor(fields: LogFields = {}) {
    this.fields = { ...fields };
  }

  /**
   * Merge fields into the context. Later values win.
   */
  enrich(fields: LogFields): void {
    Object.assign(this.fields, fields);
  }

  /** Message override set through the `_msg` directive. */
  get message(): string | undefined {
    const message = this.fields[MESSAGE_DIRECTIVE];
    return typeof message === 'string' ? message : undefined;
  }
}
