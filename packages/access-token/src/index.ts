/**
 * @rtc-token/access-token
 *
 * Signed access tokens (version 006) for real-time channels.
 * Token = "006" + appId + base64(signature, checksums, message).
 *
 * @packageDocumentation
 */

// ============================================================================
// Constants
// ============================================================================

export {
  DEFAULT_TTL_SECONDS,
  GRANT_OFFSETS,
  MESSAGE_OFFSETS,
  SIGNATURE_SIZE,
  SIZES,
  TOKEN_VERSION,
} from "./constants.ts";

// ============================================================================
// Types
// ============================================================================

export type {
  AccessTokenMessage,
  Clock,
  DecodedAccessToken,
  EncodeAccessTokenInput,
  PrivilegeGrant,
  RandomSource,
} from "./types.ts";

// ============================================================================
// Errors
// ============================================================================

export { AccessTokenError, type AccessTokenErrorCode } from "./errors.ts";

// ============================================================================
// Privileges
// ============================================================================

export {
  isPrivilege,
  PRIVILEGE_CODES,
  PRIVILEGES,
  type Privilege,
  privilegeCode,
  privilegeFromCode,
  privileges,
} from "./privileges.ts";

// ============================================================================
// Identity
// ============================================================================

export {
  canonicalIdentity,
  emptyIdentity,
  type Identity,
  type IdentityInput,
  toIdentity,
} from "./identity.ts";

// ============================================================================
// Encoding
// ============================================================================

export { buildMessage, messageSize } from "./message.ts";
export { sign, signingPayload } from "./sign.ts";
export { encodeAccessToken } from "./encode.ts";

// ============================================================================
// Decoding
// ============================================================================

export { decodeAccessToken, decodeMessage } from "./decode.ts";

// ============================================================================
// Issuance
// ============================================================================

export { issueToken, type NewTokenOptions, newToken, randomSalt } from "./issue.ts";
export { type AccessTokenConfig, loadAccessTokenConfig } from "./config.ts";
export {
  IdentitySchema,
  PrivilegeSchema,
  parseTokenRequest,
  type TokenRequest,
  TokenRequestSchema,
} from "./schema.ts";
