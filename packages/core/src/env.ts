import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

/**
 * Parses the `"true"` / `"false"` strings environment variables carry;
 * coerce.boolean treats any non-empty string as true
 */
export const zBooleanString = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true')

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error'])
    .default('info'),
})

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 * @param source - Variables to validate, `process.env` unless given
 * @returns Validated environment variables
 */
export function loadEnvVariables<T extends z.ZodTypeAny>(
  schema: T,
  envPath?: string,
  source: NodeJS.ProcessEnv = process.env,
): z.infer<T> {
  // Load environment variables from .env file
  if (source === process.env) {
    dotenvConfig({ path: envPath })
  }

  return schema.parse(source)
}

/**
 * Create a complete environment schema by extending the base schema
 * @param additionalSchema - Additional schema to extend the base schema with
 * @returns Combined schema
 */
export function createEnvSchema<T extends z.ZodRawShape>(additionalSchema: T) {
  return baseEnvSchema.extend(additionalSchema)
}
