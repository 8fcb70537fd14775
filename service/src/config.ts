/**
 * Service Configuration
 *
 * Settings come from environment variables and are validated once at startup.
 */

import { z } from 'zod';

/** Validated service settings */
export interface ServiceConfig {
  /** SQLite database file, or `:memory:` */
  metaserverUri: string;
  /** Root directory databases are created under */
  storageRoot: string;
  port: number;
  host: string;
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
}

/** Configuration that failed validation */
export class ConfigError extends Error {
  constructor(readonly problems: readonly string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const envSchema = z.object({
  METASERVER_URI: z.string().trim().min(1, 'is required'),
  METASERVER_STORE: z.string().trim().min(1, 'is required'),
  PORT: z.coerce.number().int().min(1).max(65535).default(4100),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

/**
 * Read the service configuration from the environment.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServiceConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigError(problems);
  }

  const parsed = result.data;
  return {
    metaserverUri: parsed.METASERVER_URI,
    storageRoot: parsed.METASERVER_STORE,
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
  };
}
