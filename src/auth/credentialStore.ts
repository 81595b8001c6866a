// src/auth/credentialStore.ts

export type CodePurpose = "signup" | "password_reset";

export type Account = Readonly<{
  id: string;
  email: string;
  name: string;
  passwordHash: string;
  createdAt: Date;
}>;

export type VerificationCode = Readonly<{
  email: string;
  purpose: CodePurpose;
  code: string;
  issuedAt: Date;
  expiresAt: Date;
  consumed: boolean;
}>;

export type NewAccount = {
  email: string;
  name: string;
  passwordHash: string;
};

export type CodeIssue = {
  email: string;
  purpose: CodePurpose;
  code: string;
  issuedAt: Date;
  expiresAt: Date;
};

/**
 * Persistence seam for accounts and verification codes. Emails reaching the store are
 * already normalized. Implementations must make `upsertCode` and `consumeCode` atomic.
 */
export interface CredentialStore {
  findAccount(email: string): Promise<Account | null>;
  /** Resolves null when an account with that email already exists. */
  createAccount(input: NewAccount): Promise<Account | null>;
  updatePasswordHash(email: string, passwordHash: string): Promise<boolean>;

  /** The unconsumed code for (email, purpose), expired or not. */
  findActiveCode(email: string, purpose: CodePurpose): Promise<VerificationCode | null>;
  /** Replaces whatever code exists for (email, purpose). */
  upsertCode(input: CodeIssue): Promise<VerificationCode>;
  /**
   * Check-and-set: marks exactly this issuance consumed if it still is unconsumed.
   * Resolves true only for the caller that flipped the flag.
   */
  consumeCode(code: VerificationCode): Promise<boolean>;
}

export function normalizeEmail(email: string) {
  return email.trim().toLowerCase();
}
