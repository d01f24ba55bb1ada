import { z } from 'zod';
import type { DatabaseConfig } from './db.js';

const databaseEnvSchema = z.object({
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .url('DATABASE_URL must be a connection URL'),
  DATABASE_MAX_CONNECTIONS: z.coerce
    .number()
    .int('DATABASE_MAX_CONNECTIONS must be an integer')
    .positive('DATABASE_MAX_CONNECTIONS must be positive')
    .default(10),
});

/**
 * Read database settings from environment variables.
 *
 * @throws Error listing every invalid variable
 *
 * @example
 * ```ts
 * const { db } = createDatabase(loadDatabaseConfig());
 * ```
 */
export function loadDatabaseConfig(
  env: Record<string, string | undefined> = process.env
): Required<DatabaseConfig> {
  const result = databaseEnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => issue.message).join('; ');
    throw new Error(`Invalid database configuration: ${problems}`);
  }

  return {
    connectionString: result.data.DATABASE_URL,
    maxConnections: result.data.DATABASE_MAX_CONNECTIONS,
  };
}
