/**
 * Base64 encoding/decoding (RFC 4648 Section 4)
 *
 * Standard alphabet (+ and /) with = padding.
 */

const BASE64_REGEX = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Encode bytes to a padded Base64 string.
 *
 * @param bytes - Bytes to encode
 * @returns Base64 encoded string
 */
export function base64Encode(bytes: Uint8Array): string {
  let binary = "";
  for (const byte of bytes) {
    binary += String.fromCharCode(byte);
  }
  return btoa(binary);
}

/**
 * Decode a padded Base64 string to bytes.
 *
 * @param str - Base64 encoded string
 * @returns Decoded bytes
 * @throws Error if the string is not canonical padded Base64
 */
export function base64Decode(str: string): Uint8Array {
  if (!isValidBase64(str)) {
    throw new Error("Invalid Base64 string");
  }

  const binary = atob(str);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

/**
 * Check if a string is padded standard Base64.
 */
export function isValidBase64(str: string): boolean {
  return BASE64_REGEX.test(str);
}
