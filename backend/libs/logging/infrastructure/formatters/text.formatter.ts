import { LogRecord, errorMessage } from '@logging/domain';
import { LogFieldKey, LogLevel } from '@logging/value-objects';
import { LogFormatter } from './log-formatter';

const LEVEL_COLORS: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 37,
  [LogLevel.INFO]: 36,
  [LogLevel.WARN]: 33,
  [LogLevel.ERROR]: 31,
};

const BARE_VALUE = /^[a-zA-Z0-9\-._/@^+]*$/;

/**
 * TextLogFormatter - Colored single-line records for local development.
 *
 * `INFO[10:00:00] access  method=GET status=200`, with keys sorted and any
 * `error_stack` printed below the line.
 */
export class TextLogFormatter implements LogFormatter {
  format(record: LogRecord): string {
    const color = LEVEL_COLORS[record.level];
    const tag = record.level.toUpperCase().slice(0, 4);

    let out = `${this.paint(color, tag)}[${this.clock(record.time)}] ${record.message} `;

    const keys = Object.keys(record.fields)
      .filter((key) => key !== LogFieldKey.ERROR_STACK)
      .sort();
    for (const key of keys) {
      out += ` ${this.paint(color, key)}=${this.renderValue(record.fields[key])}`;
    }
    out += '\n';

    const stack = record.fields[LogFieldKey.ERROR_STACK];
    if (typeof stack === 'string') {
      out += `${this.paint(color, LogFieldKey.ERROR_STACK)}=\n`;
      for (const line of stack.split('\n')) {
        out += `${line}\n`;
      }
    }
    return out;
  }

  private paint(color: number, text: string): string {
    return `\x1b[${color}m${text}\x1b[0m`;
  }

  private clock(time: Date): string {
    return [time.getHours(), time.getMinutes(), time.getSeconds()]
      .map((part) => String(part).padStart(2, '0'))
      .join(':');
  }

  private renderValue(value: unknown): string {
    const text = this.stringify(value);
    return BARE_VALUE.test(text) ? text : JSON.stringify(text);
  }

  private stringify(value: unknown): string {
    if (typeof value === 'string') {
      return value;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (typeof value === 'object' && value !== null) {
      return errorMessage(value);
    }
    return String(value);
  }
}
