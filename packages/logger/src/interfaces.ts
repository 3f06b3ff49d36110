export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type Color = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';

export type LogMetadataPrimitive = string | number | boolean | null | undefined;

export interface Loggable {
  toLog(): LogMetadataRecord; // Custom serialization hook
}

export type LogMetadataLeaf = LogMetadataPrimitive | Error | Loggable;

export interface LogMetadataRecord {
  [key: string]: LogMetadataValue;
}

export type LogMetadataValue = LogMetadataLeaf | ReadonlyArray<LogMetadataLeaf> | LogMetadataRecord;

// Fields always present on a record; user metadata is merged at root level
export interface BaseLogMessage {
  level: LogLevel;
  msg: string;
  time: number;
  context?: string;
  err?: Error | Loggable;
}

export type LogMessage = BaseLogMessage & LogMetadataRecord;

export type LogArgument = LogMetadataRecord | Error | Loggable;

export interface LoggerOptions {
  /**
   * Minimum log level to print.
   * @default 'info'
   */
  level?: LogLevel;
  /**
   * Log format.
   * @default 'json' when NODE_ENV is 'production', 'pretty' otherwise
   */
  format?: 'pretty' | 'json';
  prettyOptions?: {
    colors?: Partial<Record<LogLevel, Color>>;
  };
}

export interface Transport {
  log(message: LogMessage): void;
}
