/**
 * Message serialization
 *
 * salt u32 | ts u32 | count u16 | { privilege u16 | expires_at u32 } * count
 */

import { GRANT_OFFSETS, MAX_UINT16, MAX_UINT32, MESSAGE_OFFSETS, SIZES } from "./constants.ts";
import { assertUint } from "./errors.ts";
import { privilegeCode } from "./privileges.ts";
import type { PrivilegeGrant } from "./types.ts";

/**
 * Byte length of a message carrying `count` grants
 */
export function messageSize(count: number): number {
  return SIZES.MESSAGE_HEADER + SIZES.GRANT * count;
}

/**
 * Serialize salt, expiry and grants into the binary message
 *
 * Grants are written in input order with no dedup or sorting.
 *
 * @throws AccessTokenError("unknown_privilege") if a grant names an unknown privilege
 * @throws AccessTokenError("field_overflow") if a value does not fit its field
 */
export function buildMessage(salt: number, ts: number, grants: readonly PrivilegeGrant[]): Uint8Array {
  assertUint("salt", salt, MAX_UINT32);
  assertUint("ts", ts, MAX_UINT32);
  assertUint("privilege count", grants.length, MAX_UINT16);

  const buffer = new Uint8Array(messageSize(grants.length));
  const view = new DataView(buffer.buffer);

  view.setUint32(MESSAGE_OFFSETS.SALT, salt, true);
  view.setUint32(MESSAGE_OFFSETS.TS, ts, true);
  view.setUint16(MESSAGE_OFFSETS.COUNT, grants.length, true);

  let offset = MESSAGE_OFFSETS.GRANTS;
  for (const grant of grants) {
    const code = privilegeCode(grant.privilege);
    assertUint(`expiresAt of ${grant.privilege}`, grant.expiresAt, MAX_UINT32);

    view.setUint16(offset + GRANT_OFFSETS.CODE, code, true);
    view.setUint32(offset + GRANT_OFFSETS.EXPIRES_AT, grant.expiresAt, true);
    offset += SIZES.GRANT;
  }

  return buffer;
}
