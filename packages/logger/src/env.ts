import { z } from 'zod';

import { LOG_FORMATS, LOG_LEVELS } from './constants';
import type { LogFormat, LogLevel } from './types';

export interface LoggerEnv {
  level: LogLevel;
  format: LogFormat;
}

const envSchema = z
  .object({
    NODE_ENV: z.string().optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    LOG_FORMAT: z.enum(LOG_FORMATS).optional(),
  })
  .transform(
    (raw): LoggerEnv => ({
      level: raw.LOG_LEVEL,
      format: raw.LOG_FORMAT ?? (raw.NODE_ENV === 'production' ? 'json' : 'pretty'),
    }),
  );

/**
 * Reads logger defaults from the environment.
 * Throws when `LOG_LEVEL` or `LOG_FORMAT` hold an unknown value.
 */
export function loadLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnv {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');

    throw new Error(`Invalid logger environment: ${details}`);
  }

  return parsed.data;
}
