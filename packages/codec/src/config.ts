import { createEnvSchema, loadEnvVariables, zBooleanString } from '@keelson/core'
import type { CodecConfig } from '@keelson/types'
import { DEFAULT_CODEC_CONFIG } from '@keelson/types'
import { z } from 'zod'

export const codecEnvSchema = createEnvSchema({
  KEELSON_MAX_DATA_SIZE: z.coerce.number().int().positive().optional(),
  KEELSON_ALLOW_TRAILING_BYTES: zBooleanString.optional(),
})

export type CodecEnv = z.infer<typeof codecEnvSchema>

export interface LoadCodecConfigOptions {
  /** Path of a .env file to load into `process.env` first */
  envPath?: string
  /** Variables to read instead of `process.env` */
  env?: NodeJS.ProcessEnv
  /** Values that win over the environment */
  overrides?: Partial<CodecConfig>
}

/**
 * Resolve the codec configuration: overrides, then environment, then
 * defaults
 */
export function loadCodecConfig(
  options: LoadCodecConfigOptions = {},
): CodecConfig {
  const env = loadEnvVariables(codecEnvSchema, options.envPath, options.env)

  return {
    maxDataSize:
      options.overrides?.maxDataSize ??
      env.KEELSON_MAX_DATA_SIZE ??
      DEFAULT_CODEC_CONFIG.maxDataSize,
    allowTrailingBytes:
      options.overrides?.allowTrailingBytes ??
      env.KEELSON_ALLOW_TRAILING_BYTES ??
      DEFAULT_CODEC_CONFIG.allowTrailingBytes,
  }
}
