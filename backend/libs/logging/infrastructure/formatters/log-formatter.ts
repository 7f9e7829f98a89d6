import { LogRecord } from '@logging/domain';

/**
 * Renders one record as a newline-terminated chunk.
 */
export interface LogFormatter {
  format(record: LogRecord): string;
}
