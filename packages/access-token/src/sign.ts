/**
 * HMAC-SHA256 signing
 */

import { hmac } from "@noble/hashes/hmac";
import { sha256 } from "@noble/hashes/sha256";
import { concatBytes, utf8Encode } from "@rtc-token/encoding";
import { AccessTokenError } from "./errors.ts";

/**
 * HMAC-SHA256 of data under key
 *
 * @returns 32-byte digest
 * @throws AccessTokenError("invalid_key") if the key is empty
 */
export function sign(key: Uint8Array, data: Uint8Array): Uint8Array {
  if (key.length === 0) {
    throw new AccessTokenError("invalid_key", "Signing key must not be empty");
  }
  return hmac(sha256, key, data);
}

/**
 * The signed region: appId | channelName | identity | message
 *
 * No separators or length prefixes. Verifiers rebuild exactly these bytes,
 * so the order must not change.
 */
export function signingPayload(
  appId: string,
  channelName: string,
  identity: string,
  message: Uint8Array
): Uint8Array {
  return concatBytes(utf8Encode(appId), utf8Encode(channelName), utf8Encode(identity), message);
}
