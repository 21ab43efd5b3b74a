import { LOG_LEVELS } from './constants';
import { loadLoggerEnv } from './env';
import { isLoggable } from './helpers';
import type { LoggerOptions, Transport } from './interfaces';
import { getRequestId } from './request-context';
import { ConsoleTransport } from './transports/console';
import type { LogArgument, LogLevel, LogMessage } from './types';

export class Logger {
  private static globalOptions: LoggerOptions = loadLoggerEnv();
  private static transport: Transport = new ConsoleTransport(Logger.globalOptions);

  private readonly context?: string;

  constructor(context?: string | Function | object) {
    if (typeof context === 'function') {
      this.context = context.name;
    } else if (typeof context === 'object' && context !== null) {
      this.context = context.constructor.name;
    } else if (typeof context === 'string') {
      this.context = context;
    }
  }

  static configure(options: LoggerOptions) {
    this.globalOptions = { ...this.globalOptions, ...options };
    this.transport = new ConsoleTransport(this.globalOptions);
  }

  static useTransport(transport: Transport) {
    this.transport = transport;
  }

  /* -------------------------------------------------------------------------- */
  /*                               Logging Methods                              */
  /* -------------------------------------------------------------------------- */

  trace(msg: string, ...args: LogArgument[]) {
    this.log('trace', msg, ...args);
  }

  debug(msg: string, ...args: LogArgument[]) {
    this.log('debug', msg, ...args);
  }

  info(msg: string, ...args: LogArgument[]) {
    this.log('info', msg, ...args);
  }

  warn(msg: string, ...args: LogArgument[]) {
    this.log('warn', msg, ...args);
  }

  error(msg: string, ...args: LogArgument[]) {
    this.log('error', msg, ...args);
  }

  fatal(msg: string, ...args: LogArgument[]) {
    this.log('fatal', msg, ...args);
  }

  isLevelEnabled(level: LogLevel): boolean {
    const configuredLevel = Logger.globalOptions.level ?? 'info';

    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(configuredLevel);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Internal Logic                               */
  /* -------------------------------------------------------------------------- */

  private log(level: LogLevel, msg: string, ...args: LogArgument[]) {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const logMessage: LogMessage = {
      level,
      msg,
      time: Date.now(),
      context: this.context,
      reqId: getRequestId(),
    };

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
