import { z } from 'zod';

import type { LogFormat, LogLevel } from './logger';
import type { ErrorPolicy } from './transcoder';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface QuarryConfig {
  logLevel: LogLevel;
  logFormat: LogFormat;
  recordsPerBlock: number;
  onError: ErrorPolicy;
}

const envSchema = z.object({
  QUARRY_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  QUARRY_LOG_FORMAT: z.enum(['text', 'json']).default('text'),
  QUARRY_RECORDS_PER_BLOCK: z.coerce.number().int().min(1).default(1),
  QUARRY_ON_ERROR: z.enum(['abort', 'skip']).default('abort'),
});

/**
 * Read configuration from environment variables. Unset variables take their
 * defaults; set but invalid ones fail the whole load.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): QuarryConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    logLevel: parsed.QUARRY_LOG_LEVEL,
    logFormat: parsed.QUARRY_LOG_FORMAT,
    recordsPerBlock: parsed.QUARRY_RECORDS_PER_BLOCK,
    onError: parsed.QUARRY_ON_ERROR,
  };
}
