export interface DecodingResult<T> {
  value: T
  remaining: Uint8Array
  consumed: number
}

/**
 * Integer widths supported by the fixed-width integer codecs, in bytes
 */
export type IntegerByteLength = 1 | 2 | 4 | 8 | 16

export type FloatByteLength = 4 | 8
