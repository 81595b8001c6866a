import pino from "pino";
import { CredentialService } from "../auth/credentialService";
import { PasswordHasher } from "../auth/password";
import { VerificationCodes } from "../auth/verificationCodes";
import { CodeEmailPayload, MailResult, Mailer } from "../mailer/resend";
import { SessionTokens } from "../utils/jwt";
import { MemoryCredentialStore } from "./memoryCredentialStore";
import { MemoryRateCounter, MemorySessionStore } from "./memorySessionStore";

export const TEST_SECRETS = {
  accessSecret: "test-access-secret",
  refreshSecret: "test-refresh-secret",
};

export const MINUTE = 60_000;

/** Clock the test advances by hand. */
export class ManualClock {
  private current: number;

  constructor(start: string | Date = "2025-01-01T00:00:00.000Z") {
    this.current = new Date(start).getTime();
  }

  now = () => new Date(this.current);

  advance(ms: number) {
    this.current += ms;
  }
}

type SentMail = CodeEmailPayload & { kind: "verification" | "password_reset" };

export class RecordingMailer implements Mailer {
  readonly sent: SentMail[] = [];
  failNext = false;
  private gate: Promise<void> | null = null;

  /** Holds deliveries until the returned function is called. */
  hold(): () => void {
    let release = () => {};
    this.gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    return () => {
      this.gate = null;
      release();
    };
  }

  async sendVerificationCode(payload: CodeEmailPayload) {
    return this.record({ ...payload, kind: "verification" });
  }

  async sendPasswordResetCode(payload: CodeEmailPayload) {
    return this.record({ ...payload, kind: "password_reset" });
  }

  lastCodeFor(email: string): string | undefined {
    return [...this.sent].reverse().find((m) => m.to === email)?.code;
  }

  private async record(mail: SentMail): Promise<MailResult> {
    if (this.gate) await this.gate;
    if (this.failNext) {
      this.failNext = false;
      return { success: false, error: "smtp down" };
    }
    this.sent.push(mail);
    return { success: true };
  }
}

export function buildTestContext(options: { clock?: ManualClock; codeTtlMs?: number } = {}) {
  const clock = options.clock ?? new ManualClock();
  const logger = pino({ level: "silent" });
  const store = new MemoryCredentialStore(clock.now);
  const sessions = new MemorySessionStore(clock.now);
  const rateCounter = new MemoryRateCounter(clock.now);
  const mailer = new RecordingMailer();
  const tokens = new SessionTokens({ ...TEST_SECRETS, accessTtl: "15m", refreshTtl: "7d", now: clock.now });
  const codes = new VerificationCodes(store, { ttlMs: options.codeTtlMs ?? 10 * MINUTE, now: clock.now });
  // lowest bcrypt cost keeps the suite quick
  const hasher = new PasswordHasher(4);

  const credentials = new CredentialService({
    store,
    sessions,
    tokens,
    codes,
    hasher,
    mailer,
    logger,
    now: clock.now,
  });

  return { clock, logger, store, sessions, rateCounter, mailer, tokens, codes, hasher, credentials };
}

export type TestContext = ReturnType<typeof buildTestContext>;
