// src/auth/credentialService.ts
import crypto from "crypto";
import type { Logger } from "pino";
import { Account, CredentialStore, normalizeEmail } from "./credentialStore";
import { Result, fail, ok } from "./errors";
import { DEFAULT_PASSWORD_POLICY, PasswordHasher, PasswordPolicy, validatePassword } from "./password";
import { SessionMeta, SessionStore } from "./refreshStore";
import { VerificationCodes } from "./verificationCodes";
import { Mailer } from "../mailer/resend";
import { Clock, systemClock } from "../utils/clock";
import { DecodedToken, Identity, SessionTokens } from "../utils/jwt";

export type AccountProfile = {
  id: string;
  email: string;
  name: string;
  createdAt: Date;
};

export type AuthSession = {
  account: AccountProfile;
  accessToken: string;
  accessExpiresAt: Date;
  refreshToken: string;
  refreshExpiresAt: Date;
};

/** The authenticated caller; passed explicitly into every operation that needs one. */
export type AuthContext = {
  account: AccountProfile;
  token: DecodedToken;
};

export type CredentialServiceDeps = {
  store: CredentialStore;
  sessions: SessionStore;
  tokens: SessionTokens;
  codes: VerificationCodes;
  hasher: PasswordHasher;
  mailer: Mailer;
  logger: Logger;
  policy?: PasswordPolicy;
  now?: Clock;
};

export type SignupInput = { email: string; name: string; password: string; code: string };
export type LoginInput = { email: string; password: string };
export type ResetInput = { email: string; code: string; newPassword: string };

const INVALID_LOGIN = "Invalid email or password";
const INVALID_RESET = "Invalid email or code";

function toProfile(account: Account): AccountProfile {
  return { id: account.id, email: account.email, name: account.name, createdAt: account.createdAt };
}

/**
 * Signup, login, password reset and session handling on top of the stores.
 * Expected failures come back as Result errors; only infrastructure faults throw.
 */
export class CredentialService {
  private readonly store: CredentialStore;
  private readonly sessions: SessionStore;
  private readonly tokens: SessionTokens;
  private readonly codes: VerificationCodes;
  private readonly hasher: PasswordHasher;
  private readonly mailer: Mailer;
  private readonly log: Logger;
  private readonly policy: PasswordPolicy;
  private readonly now: Clock;
  private decoyHash: Promise<string> | null = null;
  private readonly pendingMail = new Set<Promise<void>>();

  constructor(deps: CredentialServiceDeps) {
    this.store = deps.store;
    this.sessions = deps.sessions;
    this.tokens = deps.tokens;
    this.codes = deps.codes;
    this.hasher = deps.hasher;
    this.mailer = deps.mailer;
    this.log = deps.logger.child({ module: "credentials" });
    this.policy = deps.policy ?? DEFAULT_PASSWORD_POLICY;
    this.now = deps.now ?? systemClock;
  }

  async requestSignupCode(rawEmail: string, name: string): Promise<Result<{ email: string }>> {
    const email = normalizeEmail(rawEmail);
    if (await this.store.findAccount(email)) {
      return fail("EmailAlreadyRegistered", "Email already registered");
    }

    const issued = await this.codes.issue(email, "signup");
    const sent = await this.mailer.sendVerificationCode({ to: email, name, code: issued.code, expiresAt: issued.expiresAt });
    if (!sent.success) {
      return fail("DeliveryFailed", "Failed to send verification email");
    }

    this.log.info({ email }, "signup code issued");
    return ok({ email });
  }

  async signup(input: SignupInput, meta: SessionMeta = {}): Promise<Result<AuthSession>> {
    const email = normalizeEmail(input.email);

    const strength = validatePassword(input.password, this.policy);
    if (!strength.ok) return strength;

    if (await this.store.findAccount(email)) {
      return fail("EmailAlreadyRegistered", "Email already registered");
    }

    const redeemed = await this.codes.redeem(email, "signup", input.code);
    if (!redeemed.ok) {
      const { error } = redeemed;
      if (error.kind === "CodeMismatch") return fail("InvalidCode", "Invalid verification code");
      return fail(error.kind, error.message);
    }

    const passwordHash = await this.hasher.hash(input.password);
    const account = await this.store.createAccount({ email, name: input.name.trim(), passwordHash });
    if (!account) {
      return fail("EmailAlreadyRegistered", "Email already registered");
    }

    this.log.info({ accountId: account.id }, "account created");
    return ok(await this.startSession(account, meta));
  }

  async login(input: LoginInput, meta: SessionMeta = {}): Promise<Result<AuthSession>> {
    const account = await this.store.findAccount(normalizeEmail(input.email));
    if (!account) {
      // burn a comparable bcrypt round so unknown emails aren't faster to reject
      await this.hasher.verify(input.password, await this.getDecoyHash());
      return fail("InvalidCredentials", INVALID_LOGIN);
    }

    const match = await this.hasher.verify(input.password, account.passwordHash);
    if (!match) return fail("InvalidCredentials", INVALID_LOGIN);

    return ok(await this.startSession(account, meta));
  }

  /**
   * Same result whether or not the email is registered. The reset code is issued and
   * mailed after this resolves, so response time does not depend on the account existing.
   */
  async forgotPassword(rawEmail: string): Promise<Result<void, never>> {
    const email = normalizeEmail(rawEmail);
    const account = await this.store.findAccount(email);
    if (!account) {
      this.log.debug("password reset requested for unknown email");
      return ok();
    }

    this.deferMail(this.sendResetCode(account));
    return ok();
  }

  /** Resolves once every deferred email has been handed to the mailer. */
  async settled(): Promise<void> {
    await Promise.all([...this.pendingMail]);
  }

  async resetPassword(input: ResetInput): Promise<Result<void>> {
    const email = normalizeEmail(input.email);

    const strength = validatePassword(input.newPassword, this.policy);
    if (!strength.ok) return strength;

    const account = await this.store.findAccount(email);
    if (!account) return fail("InvalidCode", INVALID_RESET);

    const redeemed = await this.codes.redeem(email, "password_reset", input.code);
    if (!redeemed.ok) {
      if (redeemed.error.kind === "CodeExpired") return fail("CodeExpired", "Reset code has expired");
      return fail("InvalidCode", INVALID_RESET);
    }

    await this.store.updatePasswordHash(email, await this.hasher.hash(input.newPassword));
    await this.sessions.deleteAllRefreshSessions(account.id);

    this.log.info({ accountId: account.id }, "password reset");
    return ok();
  }

  async authenticate(accessToken: string | undefined): Promise<Result<AuthContext>> {
    if (!accessToken) return fail("Unauthenticated", "Not authenticated");

    const decoded = this.tokens.decode(accessToken, "access");
    if (!decoded.ok) return decoded;

    if (await this.sessions.isAccessTokenBlocked(decoded.value.jti)) {
      return fail("Unauthenticated", "Token revoked");
    }

    const account = await this.store.findAccount(decoded.value.email);
    if (!account || account.id !== decoded.value.accountId) {
      return fail("Unauthenticated", "Account not found");
    }

    return ok({ account: toProfile(account), token: decoded.value });
  }

  currentAccount(ctx: AuthContext): AccountProfile {
    return ctx.account;
  }

  async refresh(refreshToken: string | undefined, meta: SessionMeta = {}): Promise<Result<AuthSession>> {
    if (!refreshToken) return fail("Unauthenticated", "Missing refresh token");

    const decoded = this.tokens.decode(refreshToken, "refresh");
    if (!decoded.ok) return decoded;
    const { accountId, jti, email } = decoded.value;

    // rotate: the presented refresh token is single-use, so only the caller whose delete
    // removed the session may continue
    if (!(await this.sessions.deleteRefreshSession(accountId, jti))) {
      return fail("Unauthenticated", "Refresh session invalid");
    }

    const account = await this.store.findAccount(email);
    if (!account || account.id !== accountId) {
      return fail("Unauthenticated", "Account not found");
    }

    return ok(await this.startSession(account, meta));
  }

  async logout(ctx: AuthContext, refreshToken?: string): Promise<Result<void, never>> {
    await this.revokeAccess(ctx.token);

    if (refreshToken) {
      const decoded = this.tokens.decode(refreshToken, "refresh");
      if (decoded.ok && decoded.value.accountId === ctx.account.id) {
        await this.sessions.deleteRefreshSession(ctx.account.id, decoded.value.jti);
      }
    }
    return ok();
  }

  async logoutAll(ctx: AuthContext): Promise<Result<void, never>> {
    await this.revokeAccess(ctx.token);
    await this.sessions.deleteAllRefreshSessions(ctx.account.id);
    this.log.info({ accountId: ctx.account.id }, "all sessions revoked");
    return ok();
  }

  private async revokeAccess(token: DecodedToken) {
    const ttlSec = Math.ceil((token.expiresAt.getTime() - this.now().getTime()) / 1000);
    await this.sessions.blockAccessToken(token.jti, ttlSec);
  }

  private async startSession(account: Account, meta: SessionMeta): Promise<AuthSession> {
    const identity: Identity = { accountId: account.id, email: account.email };
    const access = this.tokens.issue(identity, "access");
    const refresh = this.tokens.issue(identity, "refresh");
    await this.sessions.storeRefreshSession(
      account.id,
      refresh.jti,
      meta,
      Math.ceil(this.tokens.ttlMs("refresh") / 1000)
    );

    return {
      account: toProfile(account),
      accessToken: access.token,
      accessExpiresAt: access.expiresAt,
      refreshToken: refresh.token,
      refreshExpiresAt: refresh.expiresAt,
    };
  }

  private async sendResetCode(account: Account) {
    const issued = await this.codes.issue(account.email, "password_reset");
    const sent = await this.mailer.sendPasswordResetCode({
      to: account.email,
      name: account.name,
      code: issued.code,
      expiresAt: issued.expiresAt,
    });
    if (!sent.success) {
      this.log.error({ accountId: account.id, error: sent.error }, "password reset email failed");
    }
  }

  private deferMail(task: Promise<void>) {
    const tracked: Promise<void> = task
      .catch((err: unknown) => {
        this.log.error({ err }, "password reset delivery crashed");
      })
      .finally(() => {
        this.pendingMail.delete(tracked);
      });
    this.pendingMail.add(tracked);
  }

  private getDecoyHash() {
    this.decoyHash ??= this.hasher.hash(crypto.randomBytes(18).toString("base64"));
    return this.decoyHash;
  }
}
