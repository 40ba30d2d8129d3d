/**
 * Access Token errors
 */

export type AccessTokenErrorCode =
  | "unknown_privilege"
  | "field_overflow"
  | "invalid_key"
  | "invalid_identity"
  | "invalid_token"
  | "invalid_request";

export class AccessTokenError extends Error {
  constructor(
    public readonly code: AccessTokenErrorCode,
    message: string
  ) {
    super(message);
    this.name = "AccessTokenError";
  }
}

/**
 * Throw field_overflow unless value is an integer in [0, max]
 */
export function assertUint(field: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new AccessTokenError(
      "field_overflow",
      `${field} out of range: ${value} (must be an integer 0-${max})`
    );
  }
}
