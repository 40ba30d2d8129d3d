/**
 * Access Token decoding
 *
 * Structural parse only: the signature and the expiry are not checked.
 */

import { base64Decode } from "@rtc-token/encoding";
import { GRANT_OFFSETS, MESSAGE_OFFSETS, SIZES, TOKEN_VERSION } from "./constants.ts";
import { AccessTokenError } from "./errors.ts";
import { messageSize } from "./message.ts";
import { privilegeFromCode } from "./privileges.ts";
import type { AccessTokenMessage, DecodedAccessToken, PrivilegeGrant } from "./types.ts";

function invalid(message: string): AccessTokenError {
  return new AccessTokenError("invalid_token", message);
}

/**
 * Parse the binary message section
 *
 * @throws AccessTokenError("invalid_token") on size mismatch or unknown privilege code
 */
export function decodeMessage(bytes: Uint8Array): AccessTokenMessage {
  if (bytes.length < SIZES.MESSAGE_HEADER) {
    throw invalid(
      `Message too short: expected at least ${SIZES.MESSAGE_HEADER} bytes, got ${bytes.length}`
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const salt = view.getUint32(MESSAGE_OFFSETS.SALT, true);
  const ts = view.getUint32(MESSAGE_OFFSETS.TS, true);
  const count = view.getUint16(MESSAGE_OFFSETS.COUNT, true);

  if (bytes.length !== messageSize(count)) {
    throw invalid(
      `Invalid message size for ${count} privileges: expected ${messageSize(count)} bytes, got ${bytes.length}`
    );
  }

  const grants: PrivilegeGrant[] = [];
  for (let i = 0; i < count; i++) {
    const offset = MESSAGE_OFFSETS.GRANTS + i * SIZES.GRANT;
    const code = view.getUint16(offset + GRANT_OFFSETS.CODE, true);
    const privilege = privilegeFromCode(code);
    if (privilege === undefined) {
      throw invalid(`Unknown privilege code: ${code}`);
    }
    grants.push({ privilege, expiresAt: view.getUint32(offset + GRANT_OFFSETS.EXPIRES_AT, true) });
  }

  return { salt, ts, grants };
}

/**
 * Decode a token issued for appId
 *
 * The app id is not length-prefixed in the token, so the caller supplies it.
 *
 * @throws AccessTokenError("invalid_token") if the token is malformed
 */
export function decodeAccessToken(token: string, appId: string): DecodedAccessToken {
  const prefix = TOKEN_VERSION + appId;
  if (!token.startsWith(prefix)) {
    throw invalid(`Token must start with version ${TOKEN_VERSION} followed by app id ${appId}`);
  }

  let content: Uint8Array;
  try {
    content = base64Decode(token.slice(prefix.length));
  } catch (e) {
    throw invalid(e instanceof Error ? e.message : "Invalid token content");
  }

  const view = new DataView(content.buffer, content.byteOffset, content.byteLength);
  let offset = 0;

  const need = (size: number, field: string): void => {
    if (offset + size > content.length) {
      throw invalid(`Token content truncated in ${field}`);
    }
  };

  need(SIZES.LENGTH_PREFIX, "signature length");
  const signatureLength = view.getUint16(offset, true);
  offset += SIZES.LENGTH_PREFIX;

  need(signatureLength, "signature");
  const signature = content.slice(offset, offset + signatureLength);
  offset += signatureLength;

  need(SIZES.CRC * 2, "checksums");
  const crcChannelName = view.getUint32(offset, true);
  offset += SIZES.CRC;
  const crcIdentity = view.getUint32(offset, true);
  offset += SIZES.CRC;

  need(SIZES.LENGTH_PREFIX, "message length");
  const messageLength = view.getUint16(offset, true);
  offset += SIZES.LENGTH_PREFIX;

  need(messageLength, "message");
  const messageBytes = content.slice(offset, offset + messageLength);
  offset += messageLength;

  if (offset !== content.length) {
    throw invalid(`Unexpected ${content.length - offset} trailing bytes in token content`);
  }

  return {
    version: TOKEN_VERSION,
    appId,
    signature,
    crcChannelName,
    crcIdentity,
    messageBytes,
    message: decodeMessage(messageBytes),
  };
}
