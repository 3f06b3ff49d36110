import type { LogArgument, Loggable, LoggerOptions, LogLevel, LogMessage, Transport } from './interfaces';
import { ConsoleTransport } from './transports/console';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

type LogContext = string | (abstract new (...args: never[]) => unknown) | object;

export class Logger {
  private static globalOptions: LoggerOptions = {
    level: 'info',
    format: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
  };
  private static transport: Transport = new ConsoleTransport(Logger.globalOptions);
  private static customTransport = false;

  private readonly context?: string;

  constructor(context?: LogContext) {
    if (typeof context === 'function') {
      this.context = context.name;
    } else if (typeof context === 'object' && context !== null) {
      this.context = context.constructor.name;
    } else if (typeof context === 'string') {
      this.context = context;
    }
  }

  static configure(options: LoggerOptions): void {
    this.globalOptions = { ...this.globalOptions, ...options };
    if (!this.customTransport) {
      this.transport = new ConsoleTransport(this.globalOptions);
    }
  }

  /**
   * Routes every record to `transport` instead of the console.
   * Passing nothing restores the console transport.
   */
  static useTransport(transport?: Transport): void {
    this.customTransport = transport !== undefined;
    this.transport = transport ?? new ConsoleTransport(this.globalOptions);
  }

  static isLevelEnabled(level: LogLevel): boolean {
    const configuredLevel = this.globalOptions.level ?? 'info';
    return LEVELS.indexOf(level) >= LEVELS.indexOf(configuredLevel);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Logging Methods                              */
  /* -------------------------------------------------------------------------- */

  trace(msg: string, ...args: LogArgument[]): void {
    this.log('trace', msg, args);
  }

  debug(msg: string, ...args: LogArgument[]): void {
    this.log('debug', msg, args);
  }

  info(msg: string, ...args: LogArgument[]): void {
    this.log('info', msg, args);
  }

  warn(msg: string, ...args: LogArgument[]): void {
    this.log('warn', msg, args);
  }

  error(msg: string, ...args: LogArgument[]): void {
    this.log('error', msg, args);
  }

  fatal(msg: string, ...args: LogArgument[]): void {
    this.log('fatal', msg, args);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Internal Logic                               */
  /* -------------------------------------------------------------------------- */

  private log(level: LogLevel, msg: string, args: LogArgument[]): void {
    if (!Logger.isLevelEnabled(level)) {
      return;
    }

    const logMessage: LogMessage = {
      level,
      msg,
      time: Date.now(),
    };
    if (this.context !== undefined) {
      logMessage.context = this.context;
    }

    for (const arg of args) {
      if (arg instanceof Error) {
        logMessage.err = arg;
      } else if (isLoggable(arg)) {
        Object.assign(logMessage, arg.toLog());
      } else {
        Object.assign(logMessage, arg);
      }
    }

    Logger.transport.log(logMessage);
  }
}

export function isLoggable(value: unknown): value is Loggable {
  return typeof value === 'object' && value !== null && 'toLog' in value && typeof value.toLog === 'function';
}
