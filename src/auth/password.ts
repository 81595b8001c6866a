// src/auth/password.ts
import bcrypt from "bcryptjs";
import { fail, ok, PolicyViolation, Result } from "./errors";

export type PasswordPolicy = {
  minLength: number;
  maxLength: number;
  requireLetter: boolean;
  requireDigit: boolean;
};

export const DEFAULT_PASSWORD_POLICY: PasswordPolicy = {
  minLength: 6,
  // bcrypt ignores everything past 72 bytes
  maxLength: 72,
  requireLetter: true,
  requireDigit: true,
};

/** Returns the first rule the password breaks, in the order below. */
export function validatePassword(
  password: string,
  policy: PasswordPolicy = DEFAULT_PASSWORD_POLICY
): Result<void, PolicyViolation> {
  // count code points, not UTF-16 units
  if ([...password].length < policy.minLength) {
    return fail("WeakPassword", `Password must be at least ${policy.minLength} characters long.`);
  }
  if (Buffer.byteLength(password, "utf8") > policy.maxLength) {
    return fail("WeakPassword", `Password must be at most ${policy.maxLength} bytes long.`);
  }
  if (policy.requireLetter && !/[A-Za-z]/.test(password)) {
    return fail("WeakPassword", "Password must contain at least one letter.");
  }
  if (policy.requireDigit && !/\d/.test(password)) {
    return fail("WeakPassword", "Password must contain at least one number.");
  }
  return ok();
}

export class PasswordHasher {
  constructor(private readonly rounds: number = 10) {}

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  async verify(password: string, hash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(password, hash);
    } catch {
      // malformed stored hash counts as a mismatch
      return false;
    }
  }
}
