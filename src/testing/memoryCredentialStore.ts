import crypto from "crypto";
import {
  Account,
  CodeIssue,
  CodePurpose,
  CredentialStore,
  NewAccount,
  VerificationCode,
} from "../auth/credentialStore";

const codeKey = (email: string, purpose: CodePurpose) => `${purpose}:${email}`;

/** In-process CredentialStore; single-threaded JS makes each method atomic. */
export class MemoryCredentialStore implements CredentialStore {
  readonly accounts = new Map<string, Account>();
  readonly codes = new Map<string, VerificationCode>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async findAccount(email: string) {
    return this.accounts.get(email) ?? null;
  }

  async createAccount(input: NewAccount) {
    if (this.accounts.has(input.email)) return null;
    const account: Account = Object.freeze({
      id: crypto.randomUUID(),
      email: input.email,
      name: input.name,
      passwordHash: input.passwordHash,
      createdAt: this.now(),
    });
    this.accounts.set(account.email, account);
    return account;
  }

  async updatePasswordHash(email: string, passwordHash: string) {
    const existing = this.accounts.get(email);
    if (!existing) return false;
    this.accounts.set(email, Object.freeze({ ...existing, passwordHash }));
    return true;
  }

  async findActiveCode(email: string, purpose: CodePurpose) {
    const code = this.codes.get(codeKey(email, purpose));
    return code && !code.consumed ? code : null;
  }

  async upsertCode(input: CodeIssue) {
    const code: VerificationCode = Object.freeze({ ...input, consumed: false });
    this.codes.set(codeKey(input.email, input.purpose), code);
    return code;
  }

  async consumeCode(code: VerificationCode) {
    const key = codeKey(code.email, code.purpose);
    const current = this.codes.get(key);
    if (
      !current ||
      current.consumed ||
      current.code !== code.code ||
      current.issuedAt.getTime() !== code.issuedAt.getTime()
    ) {
      return false;
    }
    this.codes.set(key, Object.freeze({ ...current, consumed: true }));
    return true;
  }
}
