/**
 * Codec Entry Points
 *
 * `encode(schema, value)` and `decode(schema, bytes)` for whole payloads.
 * Record coders that prepend their own discriminator call these for the
 * payload portion only.
 */

import { logger } from '@keelson/core'
import type { Codec, CodecConfig, Safe } from '@keelson/types'
import {
  DEFAULT_CODEC_CONFIG,
  FormatError,
  safeError,
  safeResult,
  ValueError,
} from '@keelson/types'

function resolveConfig(config: Partial<CodecConfig>): CodecConfig {
  return { ...DEFAULT_CODEC_CONFIG, ...config }
}

function describeError(error: Error): Record<string, string> {
  return { name: error.name, message: error.message }
}

/**
 * Encode a value with the given schema codec
 */
export function encode<T>(
  codec: Codec<T>,
  value: T,
  config: Partial<CodecConfig> = {},
): Safe<Uint8Array> {
  const { maxDataSize } = resolveConfig(config)

  const [error, encoded] = codec.encode(value)
  if (error) {
    logger.error('Encoding failed', describeError(error), { kind: codec.kind })
    return safeError(error)
  }
  if (encoded.length > maxDataSize) {
    const sizeError = new ValueError(
      `Encoded size ${encoded.length} exceeds maximum ${maxDataSize}`,
    )
    logger.error('Encoding failed', describeError(sizeError), {
      kind: codec.kind,
    })
    return safeError(sizeError)
  }

  logger.debug('Data encoded', {
    kind: codec.kind,
    encodedSize: encoded.length,
  })
  return safeResult(encoded)
}

/**
 * Decode a whole payload with the given schema codec
 */
export function decode<T>(
  codec: Codec<T>,
  data: Uint8Array,
  config: Partial<CodecConfig> = {},
): Safe<T> {
  const { maxDataSize, allowTrailingBytes } = resolveConfig(config)

  if (data.length > maxDataSize) {
    const sizeError = new FormatError(
      `Input size ${data.length} exceeds maximum ${maxDataSize}`,
    )
    logger.error('Decoding failed', describeError(sizeError), {
      kind: codec.kind,
    })
    return safeError(sizeError)
  }

  const [error, decoded] = codec.decode(data)
  if (error) {
    logger.error('Decoding failed', describeError(error), { kind: codec.kind })
    return safeError(error)
  }
  if (!allowTrailingBytes && decoded.remaining.length > 0) {
    const trailingError = new FormatError(
      `${decoded.remaining.length} trailing bytes after decoded value`,
    )
    logger.error('Decoding failed', describeError(trailingError), {
      kind: codec.kind,
    })
    return safeError(trailingError)
  }

  logger.debug('Data decoded', {
    kind: codec.kind,
    consumed: decoded.consumed,
    trailing: decoded.remaining.length,
  })
  return safeResult(decoded.value)
}
