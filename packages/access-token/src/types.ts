/**
 * Access Token type definitions
 */

import type { IdentityInput } from "./identity.ts";
import type { Privilege } from "./privileges.ts";

/**
 * A privilege with its own expiry
 */
export type PrivilegeGrant = {
  privilege: Privilege;
  /** Unix seconds (u32) */
  expiresAt: number;
};

/**
 * Input for encoding a token with explicit salt and expiry
 */
export type EncodeAccessTokenInput = {
  appId: string;
  /** HMAC key; must not be empty */
  appCertificate: string;
  /**
   * Signed as UTF-8. Lone surrogates become U+FFFD, so the signed bytes would
   * differ from the string; TokenRequestSchema rejects such strings.
   */
  channelName: string;
  /** Same UTF-8 caveat as channelName for text identities */
  identity: IdentityInput;
  /** Serialized in the given order */
  grants: readonly PrivilegeGrant[];
  /** Random salt (u32) */
  salt: number;
  /** Token expiry, Unix seconds (u32) */
  ts: number;
};

/**
 * Parsed message section of a token
 */
export type AccessTokenMessage = {
  salt: number;
  ts: number;
  grants: PrivilegeGrant[];
};

/**
 * Structural view of a token. Nothing in it has been verified.
 */
export type DecodedAccessToken = {
  version: string;
  appId: string;
  /** HMAC-SHA256 (32 bytes) */
  signature: Uint8Array;
  crcChannelName: number;
  crcIdentity: number;
  /** Raw message bytes, exactly as signed */
  messageBytes: Uint8Array;
  message: AccessTokenMessage;
};

/**
 * Milliseconds since the Unix epoch
 */
export type Clock = () => number;

/**
 * Returns a u32 salt
 */
export type RandomSource = () => number;
