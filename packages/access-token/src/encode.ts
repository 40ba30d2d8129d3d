/**
 * Access Token encoding
 *
 * "006" + appId + base64(
 *   signature_length u16 | signature | crc32(channel) u32 | crc32(identity) u32
 *   | message_length u16 | message
 * )
 */

import { base64Encode, crc32, utf8Encode } from "@rtc-token/encoding";
import { MAX_UINT16, SIZES, TOKEN_VERSION } from "./constants.ts";
import { assertUint } from "./errors.ts";
import { canonicalIdentity, toIdentity } from "./identity.ts";
import { buildMessage } from "./message.ts";
import { sign, signingPayload } from "./sign.ts";
import type { EncodeAccessTokenInput } from "./types.ts";

type SignedContentParts = {
  signature: Uint8Array;
  crcChannelName: number;
  crcIdentity: number;
  message: Uint8Array;
};

function packSignedContent(parts: SignedContentParts): Uint8Array {
  const { signature, crcChannelName, crcIdentity, message } = parts;
  assertUint("message length", message.length, MAX_UINT16);

  const buffer = new Uint8Array(
    SIZES.LENGTH_PREFIX + signature.length + SIZES.CRC * 2 + SIZES.LENGTH_PREFIX + message.length
  );
  const view = new DataView(buffer.buffer);

  let offset = 0;
  view.setUint16(offset, signature.length, true);
  offset += SIZES.LENGTH_PREFIX;
  buffer.set(signature, offset);
  offset += signature.length;

  view.setUint32(offset, crcChannelName, true);
  offset += SIZES.CRC;
  view.setUint32(offset, crcIdentity, true);
  offset += SIZES.CRC;

  view.setUint16(offset, message.length, true);
  offset += SIZES.LENGTH_PREFIX;
  buffer.set(message, offset);

  return buffer;
}

/**
 * Encode a signed Access Token
 *
 * Deterministic: the same input always yields the same token.
 *
 * @param input - Token parameters, including explicit salt and ts
 * @returns Token string
 * @throws AccessTokenError on unknown privilege, out-of-range field,
 *   invalid identity or empty certificate
 */
export function encodeAccessToken(input: EncodeAccessTokenInput): string {
  const identity = canonicalIdentity(toIdentity(input.identity));
  const message = buildMessage(input.salt, input.ts, input.grants);

  const signature = sign(
    utf8Encode(input.appCertificate),
    signingPayload(input.appId, input.channelName, identity, message)
  );

  const content = packSignedContent({
    signature,
    crcChannelName: crc32(utf8Encode(input.channelName)),
    crcIdentity: crc32(utf8Encode(identity)),
    message,
  });

  return TOKEN_VERSION + input.appId + base64Encode(content);
}
