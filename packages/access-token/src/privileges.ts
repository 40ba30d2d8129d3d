/**
 * Privilege registry
 *
 * Closed mapping from privilege symbols to their wire codes. Codes are
 * fixed by the verifying service and must never be renumbered.
 */

import { AccessTokenError } from "./errors.ts";

export const PRIVILEGE_CODES = Object.freeze({
  join_channel: 1,
  publish_audio: 2,
  publish_video: 3,
  publish_data: 4,
  publish_audio_cdn: 5,
  publish_video_cdn: 6,
  request_publish_audio: 7,
  request_publish_video: 8,
  request_publish_data: 9,
  invite_publish_audio: 10,
  invite_publish_video: 11,
  invite_publish_data: 12,
  administrate_channel: 101,
  rtm_login: 1000,
} as const);

export type Privilege = keyof typeof PRIVILEGE_CODES;

/**
 * Names the verifying service uses for each privilege
 */
const WIRE_NAMES: Record<Privilege, string> = {
  join_channel: "kJoinChannel",
  publish_audio: "kPublishAudioStream",
  publish_video: "kPublishVideoStream",
  publish_data: "kPublishDataStream",
  publish_audio_cdn: "kPublishAudioCdn",
  publish_video_cdn: "kPublishVideoCdn",
  request_publish_audio: "kRequestPublishAudioStream",
  request_publish_video: "kRequestPublishVideoStream",
  request_publish_data: "kRequestPublishDataStream",
  invite_publish_audio: "kInvitePublishAudioStream",
  invite_publish_video: "kInvitePublishVideoStream",
  invite_publish_data: "kInvitePublishDataStream",
  administrate_channel: "kAdministrateChannel",
  rtm_login: "kRtmLogin",
};

export function isPrivilege(name: string): name is Privilege {
  return Object.prototype.hasOwnProperty.call(PRIVILEGE_CODES, name);
}

/**
 * All privilege symbols, in code order
 */
export const PRIVILEGES: readonly Privilege[] = Object.freeze(
  Object.keys(PRIVILEGE_CODES).filter(isPrivilege)
);

const BY_CODE = new Map<number, Privilege>(PRIVILEGES.map((name) => [PRIVILEGE_CODES[name], name]));

/**
 * Get the wire code of a privilege
 *
 * @example privilegeCode("join_channel") → 1
 * @example privilegeCode("rtm_login") → 1000
 * @throws AccessTokenError("unknown_privilege") for any other name
 */
export function privilegeCode(name: string): number {
  if (!isPrivilege(name)) {
    throw new AccessTokenError("unknown_privilege", `Unknown privilege: ${name}`);
  }
  return PRIVILEGE_CODES[name];
}

/**
 * Reverse lookup, undefined for codes outside the registry
 */
export function privilegeFromCode(code: number): Privilege | undefined {
  return BY_CODE.get(code);
}

/**
 * Wire-level privilege names mapped to their codes
 *
 * @example privileges().get("kRtmLogin") → 1000
 */
export function privileges(): ReadonlyMap<string, number> {
  return new Map(PRIVILEGES.map((name) => [WIRE_NAMES[name], PRIVILEGE_CODES[name]]));
}
