import { inspect } from 'node:util';

import type { Color, LogLevel, LogMessage, LoggerOptions, Transport } from '../interfaces';

const DEFAULT_COLORS: Record<LogLevel, Color> = {
  trace: 'gray',
  debug: 'blue',
  info: 'green',
  warn: 'yellow',
  error: 'red',
  fatal: 'magenta',
};

// ANSI Color Codes
const RESET = '\x1b[0m';
const COLORS: Record<Color, string> = {
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
};

export class ConsoleTransport implements Transport {
  constructor(private readonly options: LoggerOptions = {}) {}

  log(message: LogMessage): void {
    const format = this.options.format ?? (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');

    if (format === 'json') {
      this.logJson(message);
    } else {
      this.logPretty(message);
    }
  }

  private logJson(message: LogMessage): void {
    process.stdout.write(formatJsonLine(message) + '\n');
  }

  private logPretty(message: LogMessage): void {
    const { level, time, msg, context, err, ...rest } = message;

    const date = new Date(time);
    const timeStr = [date.getHours(), date.getMinutes(), date.getSeconds()].map(part => part.toString().padStart(2, '0')).join(':');

    const color = this.options.prettyOptions?.colors?.[level] ?? DEFAULT_COLORS[level];
    const levelCode = COLORS[color];
    const levelStr = `${levelCode}${level.toUpperCase().padEnd(5)}${RESET}`;
    const contextStr = context ? `[${COLORS.cyan}${context}${RESET}] ` : '';

    const line = `${COLORS.gray}${timeStr}${RESET} ${levelStr} ${contextStr}${levelCode}${msg}${RESET}`;
    const write = level === 'error' || level === 'fatal' ? console.error : console.log;

    write(line);

    if (err) {
      console.error(err);
    }

    if (Object.keys(rest).length > 0) {
      write(inspect(JSON.parse(formatJsonLine(rest)), { colors: true, depth: 2 }));
    }
  }
}

/**
 * Serializes a record, expanding errors into plain objects and `Loggable`s
 * into their `toLog()` output.
 */
export function formatJsonLine(record: object): string {
  return JSON.stringify(record, (_key: string, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack };
    }
    if (typeof value === 'object' && value !== null && 'toLog' in value && typeof value.toLog === 'function') {
      return value.toLog();
    }
    return value;
  });
}
