// src/auth/verificationCodes.ts
import crypto from "crypto";
import { CodePurpose, CredentialStore, VerificationCode } from "./credentialStore";
import { CodeError, Result, fail, ok } from "./errors";
import { Clock, systemClock } from "../utils/clock";

export const CODE_LENGTH = 6;

export type VerificationCodeOptions = {
  ttlMs: number;
  now?: Clock;
  /** Override for tests; defaults to a CSPRNG numeric code. */
  generate?: () => string;
};

export function generateNumericCode(length: number = CODE_LENGTH) {
  return crypto.randomInt(0, 10 ** length).toString().padStart(length, "0");
}

function sameCode(a: string, b: string) {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}

/**
 * One active code per (email, purpose). Issuing replaces, redeeming consumes.
 */
export class VerificationCodes {
  private readonly ttlMs: number;
  private readonly now: Clock;
  private readonly generate: () => string;

  constructor(private readonly store: CredentialStore, options: VerificationCodeOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? systemClock;
    this.generate = options.generate ?? (() => generateNumericCode());
  }

  async issue(email: string, purpose: CodePurpose): Promise<VerificationCode> {
    const issuedAt = this.now();
    return this.store.upsertCode({
      email,
      purpose,
      code: this.generate(),
      issuedAt,
      expiresAt: new Date(issuedAt.getTime() + this.ttlMs),
    });
  }

  async redeem(email: string, purpose: CodePurpose, code: string): Promise<Result<VerificationCode, CodeError>> {
    const active = await this.store.findActiveCode(email, purpose);
    if (!active) {
      return fail("CodeNotFound", "No verification code found for this email");
    }

    if (this.now().getTime() >= active.expiresAt.getTime()) {
      // burn it so a late retry reports "not found" rather than looping on "expired"
      await this.store.consumeCode(active);
      return fail("CodeExpired", "Verification code has expired");
    }

    if (!sameCode(active.code, code)) {
      return { ok: false, error: { kind: "CodeMismatch", message: "Verification code does not match" } };
    }

    const won = await this.store.consumeCode(active);
    if (!won) {
      return fail("CodeNotFound", "No verification code found for this email");
    }
    return ok({ ...active, consumed: true });
  }
}
