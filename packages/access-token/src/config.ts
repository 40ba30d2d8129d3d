/**
 * Access Token configuration
 *
 * Environment variables:
 * - ACCESS_TOKEN_TTL: lifetime in seconds of tokens issued by newToken (default: 86400)
 */

import { DEFAULT_TTL_SECONDS, MAX_UINT32 } from "./constants.ts";

export type AccessTokenConfig = {
  ttlSeconds: number;
};

const parseTtl = (raw: string | undefined): number => {
  if (raw === undefined || raw === "") {
    return DEFAULT_TTL_SECONDS;
  }

  const value = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  if (!(value > 0 && value <= MAX_UINT32)) {
    console.warn(
      `[access-token] ACCESS_TOKEN_TTL="${raw}" is not a positive number of seconds, using ${DEFAULT_TTL_SECONDS}`
    );
    return DEFAULT_TTL_SECONDS;
  }
  return value;
};

export const loadAccessTokenConfig = (
  env: Record<string, string | undefined> = process.env
): AccessTokenConfig => ({
  ttlSeconds: parseTtl(env.ACCESS_TOKEN_TTL),
});
