import { inspect } from 'node:util';

import { isLoggable } from '../helpers';
import type { LoggerOptions, Transport } from '../interfaces';
import type { Color, LogLevel, LogMessage, LogMetadataValue } from '../types';

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
    if (this.options.format === 'json') {
      this.logJson(message);
    } else {
      this.logPretty(message);
    }
  }

  private logJson(message: LogMessage): void {
    const replacer = (_key: string, value: unknown) => {
      if (value instanceof Error) {
        const { name, message, stack, ...rest } = value;

        return {
          name,
          message,
          stack,
          ...rest,
        };
      }
      if (isLoggable(value)) {
        return value.toLog();
      }

      return value;
    };

    process.stdout.write(JSON.stringify(message, replacer) + '\n');
  }

  private logPretty(message: LogMessage): void {
    const { level, time, msg, context, reqId, err, ...rest } = message;

    // 1. Time
    const date = new Date(time);
    const timeStr = [date.getHours(), date.getMinutes(), date.getSeconds()]
      .map((part) => part.toString().padStart(2, '0'))
      .join(':');
    const timeColored = `${COLORS.gray}${timeStr}${RESET}`;

    // 2. Level
    const color = this.options.prettyOptions?.colors?.[level] ?? DEFAULT_COLORS[level];
    const levelCode = COLORS[color];
    const levelStr = `${levelCode}${level.toUpperCase().padEnd(5)}${RESET}`;

    // 3. Metadata (ReqId, Context)
    let metaStr = '';
    if (reqId) {
      metaStr += `[${reqId}] `;
    }
    if (context) {
      metaStr += `[${COLORS.cyan}${context}${RESET}] `;
    }

    // 4. Build Line
    const line = `${timeColored} ${levelStr} ${metaStr}${levelCode}${msg}${RESET}`;

    if (level === 'error' || level === 'fatal') {
      console.error(line);
    } else {
      console.log(line);
    }

    // 5. Error Stack
    if (err) {
      console.error(isLoggable(err) ? err.toLog() : err);
    }

    // 6. Additional Data
    if (Object.keys(rest).length > 0) {
      const processedRest: Record<string, LogMetadataValue> = {};
      for (const [key, val] of Object.entries(rest)) {
        processedRest[key] = isLoggable(val) ? val.toLog() : val;
      }
      console.log(inspect(processedRest, { colors: true, depth: 2 }));
    }
  }
}
