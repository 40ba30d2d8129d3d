/**
 * Token issuance
 *
 * Convenience entry points that pick the salt and expiry. The clock and the
 * random source are injectable; defaults are Date.now and node:crypto.
 */

import { randomBytes } from "node:crypto";
import { type AccessTokenConfig, loadAccessTokenConfig } from "./config.ts";
import { encodeAccessToken } from "./encode.ts";
import type { IdentityInput } from "./identity.ts";
import type { Privilege } from "./privileges.ts";
import type { TokenRequest } from "./schema.ts";
import type { Clock, RandomSource } from "./types.ts";

export type NewTokenOptions = {
  /** Lifetime in seconds (default: config.ttlSeconds) */
  ttlSeconds?: number;
  /** Default: loaded from the environment on first use */
  config?: AccessTokenConfig;
  clock?: Clock;
  random?: RandomSource;
};

/**
 * Uniformly random u32 from node:crypto
 */
export const randomSalt: RandomSource = () => randomBytes(4).readUInt32LE(0);

let environmentConfig: AccessTokenConfig | undefined;

function defaultConfig(): AccessTokenConfig {
  environmentConfig ??= loadAccessTokenConfig();
  return environmentConfig;
}

function expiryFrom(
  clock: Clock,
  ttlSeconds: number | undefined,
  config: AccessTokenConfig | undefined
): number {
  const ttl = ttlSeconds ?? (config ?? defaultConfig()).ttlSeconds;
  return Math.floor(clock() / 1000) + ttl;
}

/**
 * Issue a token where every privilege expires together with the token
 *
 * @example
 * newToken(appId, appCertificate, "lobby", 12345, ["join_channel", "publish_audio"])
 */
export function newToken(
  appId: string,
  appCertificate: string,
  channelName: string,
  identity: IdentityInput,
  privileges: readonly Privilege[],
  options: NewTokenOptions = {}
): string {
  const { clock = Date.now, random = randomSalt } = options;
  const ts = expiryFrom(clock, options.ttlSeconds, options.config);

  return encodeAccessToken({
    appId,
    appCertificate,
    channelName,
    identity,
    grants: privileges.map((privilege) => ({ privilege, expiresAt: ts })),
    salt: random(),
    ts,
  });
}

/**
 * Issue a token from a validated request, honouring explicit salt and ts
 */
export function issueToken(request: TokenRequest, options: NewTokenOptions = {}): string {
  const { clock = Date.now, random = randomSalt } = options;
  const ts =
    request.ts ?? expiryFrom(clock, request.ttlSeconds ?? options.ttlSeconds, options.config);

  return encodeAccessToken({
    appId: request.appId,
    appCertificate: request.appCertificate,
    channelName: request.channelName,
    identity: request.identity,
    grants: request.privileges.map((privilege) => ({ privilege, expiresAt: ts })),
    salt: request.salt ?? random(),
    ts,
  });
}
