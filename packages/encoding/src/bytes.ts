/**
 * Byte helpers
 */

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Check that a string has no unpaired surrogate halves.
 */
export function isWellFormedUtf16(str: string): boolean {
  return !LONE_SURROGATE.test(str);
}

/**
 * Encode a string as UTF-8 bytes.
 *
 * Lone surrogates are replaced with U+FFFD (see isWellFormedUtf16).
 */
export function utf8Encode(str: string): Uint8Array {
  return textEncoder.encode(str);
}

/**
 * Decode UTF-8 bytes to a string.
 *
 * @throws TypeError if the bytes are not valid UTF-8
 */
export function utf8Decode(bytes: Uint8Array): string {
  return textDecoder.decode(bytes);
}

/**
 * Concatenate byte arrays in order, with no separators.
 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  let length = 0;
  for (const part of parts) {
    length += part.length;
  }

  const result = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}
