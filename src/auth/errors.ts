// src/auth/errors.ts

/**
 * Expected failure outcomes of the credential flows. These are returned, never thrown;
 * thrown errors are reserved for infrastructure faults (db/redis down, etc).
 */
export type CredentialErrorKind =
  | "WeakPassword"
  | "InvalidCode"
  | "CodeExpired"
  | "CodeNotFound"
  | "InvalidCredentials"
  | "Unauthenticated"
  | "TokenExpired"
  | "TokenInvalid"
  | "EmailAlreadyRegistered"
  | "DeliveryFailed";

export type CredentialError<K extends CredentialErrorKind = CredentialErrorKind> = {
  kind: K;
  message: string;
};

export type PolicyViolation = CredentialError<"WeakPassword">;
export type TokenError = CredentialError<"TokenExpired" | "TokenInvalid">;

/** Code redemption failures; CodeMismatch never leaves the orchestrator as-is. */
export type CodeError =
  | CredentialError<"CodeNotFound" | "CodeExpired">
  | { kind: "CodeMismatch"; message: string };

export type Result<T, E = CredentialError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok(): Result<void, never>;
export function ok<T>(value: T): Result<T, never>;
export function ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}

export function fail<K extends CredentialErrorKind>(kind: K, message: string): Result<never, CredentialError<K>> {
  return { ok: false, error: { kind, message } };
}

/** HTTP status used by the route layer for each kind. */
export const ERROR_STATUS: Record<CredentialErrorKind, number> = {
  WeakPassword: 400,
  InvalidCode: 400,
  CodeExpired: 400,
  CodeNotFound: 400,
  EmailAlreadyRegistered: 400,
  InvalidCredentials: 401,
  Unauthenticated: 401,
  TokenExpired: 401,
  TokenInvalid: 401,
  DeliveryFailed: 503,
};
