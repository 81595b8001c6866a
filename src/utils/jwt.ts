// src/utils/jwt.ts
import jwt from "jsonwebtoken";
import ms from "ms";
import crypto from "crypto";
import { z } from "zod";
import { Result, TokenError, fail, ok } from "../auth/errors";
import { Clock, systemClock } from "./clock";

export type TokenKind = "access" | "refresh";

/** What a session token asserts: who, and nothing else. */
export type Identity = {
  accountId: string;
  email: string;
};

export type IssuedToken = {
  token: string;
  jti: string;
  expiresAt: Date;
};

export type DecodedToken = Identity & {
  kind: TokenKind;
  jti: string;
  issuedAt: Date;
  expiresAt: Date;
};

export type SessionTokenOptions = {
  accessSecret: string;
  refreshSecret: string;
  /** ms-style duration ("15m") or milliseconds */
  accessTtl: string | number;
  refreshTtl: string | number;
  now?: Clock;
};

const claimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().min(1),
  typ: z.enum(["access", "refresh"]),
  jti: z.string().min(1),
  iat: z.number(),
  exp: z.number(),
});

/**
 * Helper to generate jti
 */
export function newJti(bytes: number = 16) {
  return crypto.randomBytes(bytes).toString("hex");
}

/** Parses "15m" / "7d" / raw ms into milliseconds; throws on garbage config. */
export function durationMs(value: string | number): number {
  const parsed = typeof value === "number" ? value : ms(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid duration: ${String(value)}`);
  }
  return parsed;
}

/**
 * HS256 signer/verifier for access and refresh tokens. Each kind has its own secret,
 * and the `typ` claim is checked too so a refresh token is never accepted as access.
 */
export class SessionTokens {
  private readonly secrets: Record<TokenKind, string>;
  private readonly ttlSec: Record<TokenKind, number>;
  private readonly now: Clock;

  constructor(options: SessionTokenOptions) {
    if (!options.accessSecret || !options.refreshSecret) {
      throw new Error("JWT secrets must be configured");
    }
    this.secrets = { access: options.accessSecret, refresh: options.refreshSecret };
    this.ttlSec = {
      access: Math.floor(durationMs(options.accessTtl) / 1000),
      refresh: Math.floor(durationMs(options.refreshTtl) / 1000),
    };
    this.now = options.now ?? systemClock;
  }

  ttlMs(kind: TokenKind) {
    return this.ttlSec[kind] * 1000;
  }

  issue(identity: Identity, kind: TokenKind = "access"): IssuedToken {
    const jti = newJti();
    const iat = Math.floor(this.now().getTime() / 1000);
    const token = jwt.sign(
      { sub: identity.accountId, email: identity.email, typ: kind, jti, iat },
      this.secrets[kind],
      { algorithm: "HS256", expiresIn: this.ttlSec[kind] }
    );
    return { token, jti, expiresAt: new Date((iat + this.ttlSec[kind]) * 1000) };
  }

  decode(token: string, kind: TokenKind = "access"): Result<DecodedToken, TokenError> {
    let raw: unknown;
    try {
      raw = jwt.verify(token, this.secrets[kind], {
        algorithms: ["HS256"],
        clockTimestamp: Math.floor(this.now().getTime() / 1000),
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        return fail("TokenExpired", "Token has expired");
      }
      if (err instanceof jwt.JsonWebTokenError) {
        return fail("TokenInvalid", "Could not validate credentials");
      }
      throw err;
    }

    const claims = claimsSchema.safeParse(raw);
    if (!claims.success || claims.data.typ !== kind) {
      return fail("TokenInvalid", "Invalid token type");
    }

    const { sub, email, typ, jti, iat, exp } = claims.data;
    return ok({
      accountId: sub,
      email,
      kind: typ,
      jti,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    });
  }
}
