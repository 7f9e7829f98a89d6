import { LogFields, LogRecord, errorMessage } from '@logging/domain';
import { LogLevel } from '@logging/value-objects';
import { LogFormatter } from './log-formatter';

const RESERVED_KEYS = new Set(['level', 'msg', 'time']);

/**
 * JsonLogFormatter - One JSON object per line.
 *
 * Record fields sit at the top level next to `level`, `msg` and `time`; a
 * field named like one of those is kept as `fields.<name>`.
 *
 * @example
 * {"request_id":"...","status":200,"latency_ms":3,"level":"info","msg":"access","time":"2024-05-01T10:00:00.000Z"}
 */
export class JsonLogFormatter implements LogFormatter {
  format(record: LogRecord): string {
    const data: LogFields = {};
    for (const [key, value] of Object.entries(record.fields)) {
      const name = RESERVED_KEYS.has(key) ? `fields.${key}` : key;
      data[name] = value instanceof Error ? value.message : value;
    }
    data.level = record.level;
    data.msg = record.message;
    data.time = record.time.toISOString();

    try {
      return `${JSON.stringify(data)}\n`;
    } catch (error) {
      // e.g. bigint or circular values
      return `${JSON.stringify({
        format_error: errorMessage(error),
        level: LogLevel.ERROR,
        msg: record.message,
        time: data.time,
      })}\n`;
    }
  }
}
