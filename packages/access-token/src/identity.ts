/**
 * Identity canonicalization
 *
 * A numeric identity of zero means "no identity" and signs as the empty
 * string. The text "0" is NOT canonicalized: verifiers rely on that
 * asymmetry, so text("0") and numeric(0) produce different tokens.
 */

import { AccessTokenError } from "./errors.ts";

export type Identity =
  | { kind: "empty" }
  | { kind: "numeric"; value: bigint }
  | { kind: "text"; value: string };

/**
 * Anything accepted where an identity is expected
 */
export type IdentityInput = Identity | string | number | bigint;

const MAX_UINT64 = (1n << 64n) - 1n;

export const emptyIdentity: Identity = Object.freeze({ kind: "empty" });

function numericIdentity(value: bigint): Identity {
  if (value < 0n || value > MAX_UINT64) {
    throw new AccessTokenError(
      "invalid_identity",
      `Numeric identity out of range: ${value} (must be 0-${MAX_UINT64})`
    );
  }
  return { kind: "numeric", value };
}

/**
 * Normalize caller input into an Identity
 *
 * Strings become text identities unchanged; numbers and bigints become
 * numeric identities and must be non-negative integers within u64.
 */
export function toIdentity(input: IdentityInput): Identity {
  if (typeof input === "string") {
    return { kind: "text", value: input };
  }
  if (typeof input === "bigint") {
    return numericIdentity(input);
  }
  if (typeof input === "number") {
    if (!Number.isSafeInteger(input)) {
      throw new AccessTokenError(
        "invalid_identity",
        `Numeric identity must be a safe integer, got ${input}`
      );
    }
    return numericIdentity(BigInt(input));
  }
  switch (input.kind) {
    case "empty":
      return emptyIdentity;
    case "numeric":
      if (typeof input.value === "bigint") {
        return numericIdentity(input.value);
      }
      break;
    case "text":
      if (typeof input.value === "string") {
        return { kind: "text", value: input.value };
      }
      break;
  }
  throw new AccessTokenError(
    "invalid_identity",
    `Invalid identity: ${JSON.stringify(input, jsonSafe)}`
  );
}

function jsonSafe(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? `${value}n` : value;
}

/**
 * The string that gets signed and checksummed for an identity
 */
export function canonicalIdentity(identity: Identity): string {
  switch (identity.kind) {
    case "empty":
      return "";
    case "numeric":
      return identity.value === 0n ? "" : identity.value.toString(10);
    case "text":
      return identity.value;
  }
}
