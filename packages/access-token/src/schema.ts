/**
 * Token request schema
 *
 * Zod schema for untyped issuance requests (HTTP bodies, job payloads).
 */

import { isWellFormedUtf16 } from "@rtc-token/encoding";
import { z } from "zod";
import { MAX_UINT32 } from "./constants.ts";
import { AccessTokenError } from "./errors.ts";
import { isPrivilege, type Privilege } from "./privileges.ts";

export const PrivilegeSchema = z.custom<Privilege>(
  (value) => typeof value === "string" && isPrivilege(value),
  { message: "Unknown privilege" }
);

/**
 * String that encodes to UTF-8 without replacement characters
 */
const LONE_SURROGATE = { message: "String contains a lone surrogate" };
const SignedStringSchema = z.string().refine(isWellFormedUtf16, LONE_SURROGATE);

const Uint32Schema = z.number().int().min(0).max(MAX_UINT32);

/**
 * Identity: any string, or a non-negative integer
 */
export const IdentitySchema = z.union([
  SignedStringSchema,
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
]);

export const TokenRequestSchema = z.object({
  appId: z.string().min(1).refine(isWellFormedUtf16, LONE_SURROGATE),
  /** Signing key */
  appCertificate: z.string().min(1).refine(isWellFormedUtf16, LONE_SURROGATE),
  channelName: SignedStringSchema,
  /** Defaults to no identity */
  identity: IdentitySchema.default(""),
  privileges: z.array(PrivilegeSchema),
  /** Explicit salt (default: random) */
  salt: Uint32Schema.optional(),
  /** Explicit token expiry in Unix seconds (default: now + ttlSeconds) */
  ts: Uint32Schema.optional(),
  /** Lifetime when ts is not given (default: configured TTL) */
  ttlSeconds: z.number().int().positive().max(MAX_UINT32).optional(),
});
export type TokenRequest = z.infer<typeof TokenRequestSchema>;

/**
 * Validate an untyped token request
 *
 * @throws AccessTokenError("invalid_request") listing every failing field
 */
export function parseTokenRequest(input: unknown): TokenRequest {
  const result = TokenRequestSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new AccessTokenError("invalid_request", `Invalid token request: ${details}`);
  }
  return result.data;
}
