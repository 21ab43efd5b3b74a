import type { Color, LogFormat, LogLevel, LogMessage, LogMetadataRecord } from './types';

// Base fields always present
export interface BaseLogMessage {
  level: LogLevel;
  msg: string;
  time: number;
  context?: string;
  reqId?: string;
  err?: Error | Loggable;
}

export interface Loggable {
  toLog(): LogMetadataRecord; // Custom serialization hook
}

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
  format?: LogFormat;
  prettyOptions?: {
    colors?: Partial<Record<LogLevel, Color>>;
  };
}

export interface Transport {
  log(message: LogMessage): void;
}

export interface RequestScope {
  reqId: string;
}
