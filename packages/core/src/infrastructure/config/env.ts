/**
 * @fileoverview Environment Configuration - zod-Validated Settings
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/config
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * | Variable | Default | Meaning |
 * |----------|---------|---------|
 * | `TESSERA_LOG_LEVEL` | `info` | pino level, or `silent` |
 * | `TESSERA_SERVICE_NAME` | `tessera` | `service` field on every log line |
 *
 * @version 1.0.0
 */

import { z } from 'zod';

import { ConfigurationError } from '../../domain/errors';
import { type LoggerConfig, LogLevel } from '../logging';

export { z } from 'zod';

/**
 * Parse environment variables with a zod schema.
 *
 * @throws ConfigurationError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = parseEnv(z.object({ PORT: z.coerce.number().int() }));
 * ```
 */
export function parseEnv<T extends z.ZodRawShape>(
  schema: z.ZodObject<T>,
  env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
  const result = schema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigurationError('Environment validation failed:', problems);
  }

  return result.data;
}

/**
 * Schema for the logging variables.
 */
export const LoggingEnvSchema = z.object({
  TESSERA_LOG_LEVEL: z
    .enum([
      LogLevel.TRACE,
      LogLevel.DEBUG,
      LogLevel.INFO,
      LogLevel.WARN,
      LogLevel.ERROR,
      LogLevel.FATAL,
      LogLevel.SILENT,
    ])
    .default(LogLevel.INFO),
  TESSERA_SERVICE_NAME: z.string().min(1).default('tessera'),
});

export type LoggingEnv = z.infer<typeof LoggingEnvSchema>;

/**
 * Read the logger configuration from the environment.
 *
 * @throws ConfigurationError when a variable is invalid
 */
export function loadLoggingConfig(
  env: Record<string, string | undefined> = process.env,
): LoggerConfig {
  const parsed = parseEnv(LoggingEnvSchema, env);

  return {
    level: parsed.TESSERA_LOG_LEVEL,
    serviceName: parsed.TESSERA_SERVICE_NAME,
  };
}
