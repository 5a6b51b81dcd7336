/**
 * Logger configuration from environment variables
 *
 * FIXTUREKIT_ENV        test | development | production
 * FIXTUREKIT_LOG_LEVEL  debug | info | warn | error | fatal
 */

import { z } from 'zod';
import type { LoggerConfig } from './types.js';

const envSchema = z.object({
  FIXTUREKIT_ENV: z.enum(['test', 'development', 'production']).optional(),
  FIXTUREKIT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
});

export class LoggerConfigError extends Error {
  constructor(
    message: string,
    public variable: string,
  ) {
    super(message);
    this.name = 'LoggerConfigError';
  }
}

export function loggerConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): LoggerConfig {
  // Empty variables count as unset
  const parsed = envSchema.safeParse({
    FIXTUREKIT_ENV: env.FIXTUREKIT_ENV || undefined,
    FIXTUREKIT_LOG_LEVEL: env.FIXTUREKIT_LOG_LEVEL || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = String(issue?.path[0] ?? 'environment');
    throw new LoggerConfigError(`Invalid ${variable}: ${issue?.message ?? 'unknown issue'}`, variable);
  }

  const config: LoggerConfig = {};
  if (parsed.data.FIXTUREKIT_ENV) {
    config.environment = parsed.data.FIXTUREKIT_ENV;
  }
  if (parsed.data.FIXTUREKIT_LOG_LEVEL) {
    config.minLevel = parsed.data.FIXTUREKIT_LOG_LEVEL;
  }
  return config;
}
