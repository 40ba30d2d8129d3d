/**
 * @rtc-token/encoding
 *
 * Byte-level codecs shared by the token pipeline.
 *
 * @packageDocumentation
 */

export { base64Decode, base64Encode, isValidBase64 } from "./base64.ts";
export { concatBytes, isWellFormedUtf16, utf8Decode, utf8Encode } from "./bytes.ts";
export { crc32 } from "./crc32.ts";
export { bytesToHex, hexToBytes } from "./hex.ts";
