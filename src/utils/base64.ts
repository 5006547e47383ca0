/**
 * Base64 Encoding Utilities
 *
 * Used for opaque continuation tokens. Decoding is strict: anything
 * outside the standard alphabet, or a length that cannot come from
 * encodeBase64, is rejected instead of being read as zero bits.
 *
 * @module utils/base64
 */

const BASE64_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/'

const BASE64_LOOKUP: ReadonlyMap<string, number> = new Map(
  Array.from(BASE64_CHARS, (ch, i) => [ch, i] as const)
)

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/

/**
 * Encode a Uint8Array to base64 string
 */
export function encodeBase64(bytes: Uint8Array): string {
  let result = ''
  const len = bytes.length

  for (let i = 0; i < len; i += 3) {
    const b1 = bytes[i]!
    const b2 = i + 1 < len ? bytes[i + 1]! : 0
    const b3 = i + 2 < len ? bytes[i + 2]! : 0

    result += BASE64_CHARS[(b1 >> 2) & 0x3f]
    result += BASE64_CHARS[((b1 << 4) | (b2 >> 4)) & 0x3f]
    result += i + 1 < len ? BASE64_CHARS[((b2 << 2) | (b3 >> 6)) & 0x3f] : '='
    result += i + 2 < len ? BASE64_CHARS[b3 & 0x3f] : '='
  }

  return result
}

/**
 * Check whether a string is well-formed padded base64
 */
export function isBase64(value: string): boolean {
  return value.length % 4 === 0 && BASE64_PATTERN.test(value)
}

/**
 * Decode a base64 string to Uint8Array
 *
 * @throws {RangeError} If the input is not well-formed padded base64
 */
export function decodeBase64(base64: string): Uint8Array {
  if (!isBase64(base64)) {
    throw new RangeError('Input is not valid base64')
  }

  const cleaned = base64.replace(/=/g, '')
  const sextet = (index: number): number => BASE64_LOOKUP.get(cleaned[index] ?? 'A') ?? 0

  const bytes: number[] = []
  for (let i = 0; i < cleaned.length; i += 4) {
    const c1 = sextet(i)
    const c2 = sextet(i + 1)
    const c3 = sextet(i + 2)
    const c4 = sextet(i + 3)

    bytes.push(((c1 << 2) | (c2 >> 4)) & 0xff)
    if (i + 2 < cleaned.length) {
      bytes.push(((c2 << 4) | (c3 >> 2)) & 0xff)
    }
    if (i + 3 < cleaned.length) {
      bytes.push(((c3 << 6) | c4) & 0xff)
    }
  }

  return new Uint8Array(bytes)
}

/**
 * Encode a UTF-8 string to base64
 */
export function stringToBase64(str: string): string {
  return encodeBase64(new TextEncoder().encode(str))
}

/**
 * Decode a base64 string to a UTF-8 string
 *
 * @throws {RangeError} If the input is not valid base64
 */
export function base64ToString(base64: string): string {
  return new TextDecoder().decode(decodeBase64(base64))
}
