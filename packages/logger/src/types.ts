import type { LOG_FORMATS, LOG_LEVELS } from './constants';
import type { BaseLogMessage, Loggable } from './interfaces';

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFormat = (typeof LOG_FORMATS)[number];

export type Color = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';

export type LogMetadataPrimitive = string | number | boolean | null | undefined;

export type LogMetadataLeaf = LogMetadataPrimitive | Error | Loggable;

export interface LogMetadataRecord {
  [key: string]: LogMetadataValue;
}

export type LogMetadataValue = LogMetadataLeaf | ReadonlyArray<LogMetadataValue> | LogMetadataRecord;

export type LogMessage = BaseLogMessage & LogMetadataRecord;

export type LogArgument = LogMetadataRecord | Error | Loggable;
