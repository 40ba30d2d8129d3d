/**
 * Access Token constants
 *
 * Token string: "006" + appId + base64(content)
 *
 * Content layout (all integers unsigned LE):
 *   signature_length u16 | signature | crc32(channel) u32 | crc32(identity) u32
 *   | message_length u16 | message
 *
 * Message layout:
 *   salt u32 | ts u32 | count u16 | { privilege u16 | expires_at u32 } * count
 */

/**
 * Version tag at the start of every token
 */
export const TOKEN_VERSION = "006";

/**
 * HMAC-SHA256 digest size in bytes
 */
export const SIGNATURE_SIZE = 32;

/**
 * Default lifetime of a token issued by newToken (24 hours)
 */
export const DEFAULT_TTL_SECONDS = 24 * 3600;

export const MAX_UINT16 = 0xffff;
export const MAX_UINT32 = 0xffffffff;

/**
 * Field sizes in bytes
 */
export const SIZES = {
  /** Fixed message header: salt + ts + count */
  MESSAGE_HEADER: 10,
  /** One grant: privilege code + expires_at */
  GRANT: 6,
  /** Length prefix of signature and message */
  LENGTH_PREFIX: 2,
  CRC: 4,
} as const;

/**
 * Field offsets in the message
 */
export const MESSAGE_OFFSETS = {
  /** Salt (u32 LE) */
  SALT: 0,
  /** Token expiry (u32 LE, Unix seconds) */
  TS: 4,
  /** Grant count (u16 LE) */
  COUNT: 8,
  /** First grant */
  GRANTS: 10,
} as const;

/**
 * Field offsets within one grant
 */
export const GRANT_OFFSETS = {
  /** Privilege code (u16 LE) */
  CODE: 0,
  /** Expiry (u32 LE, Unix seconds) */
  EXPIRES_AT: 2,
} as const;
