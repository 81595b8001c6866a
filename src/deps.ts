import type { Redis } from 'ioredis';
import env, { Env } from './config/env';
import logger from './middleware/requestLogger';
import { AppDeps } from './app';
import { CredentialService } from './auth/credentialService';
import { MongoCredentialStore } from './auth/mongoCredentialStore';
import { DEFAULT_PASSWORD_POLICY, PasswordHasher } from './auth/password';
import { RedisSessionStore } from './auth/refreshStore';
import { VerificationCodes } from './auth/verificationCodes';
import { LogMailer, Mailer, ResendMailer } from './mailer/resend';
import { RedisRateCounter } from './middleware/rateLimit';
import { SessionTokens, durationMs } from './utils/jwt';

function buildMailer(config: Env): Mailer {
  const log = logger.child({ module: 'mailer' });
  if (!config.RESEND_API_KEY) {
    log.warn('RESEND_API_KEY not set, verification codes will only be logged');
    return new LogMailer(log);
  }
  return new ResendMailer(config.RESEND_API_KEY, config.MAIL_FROM, config.APP_NAME, log);
}

/** Production wiring: mongoose for accounts/codes, Redis for sessions and rate limits. */
export function createAppDeps(redis: Redis, config: Env = env): AppDeps {
  const store = new MongoCredentialStore();
  const tokens = new SessionTokens({
    accessSecret: config.JWT_ACCESS_SECRET,
    refreshSecret: config.JWT_REFRESH_SECRET,
    accessTtl: config.JWT_ACCESS_EXPIRES,
    refreshTtl: config.JWT_REFRESH_EXPIRES,
  });

  const credentials = new CredentialService({
    store,
    sessions: new RedisSessionStore(redis),
    tokens,
    codes: new VerificationCodes(store, { ttlMs: durationMs(config.VERIFICATION_CODE_TTL) }),
    hasher: new PasswordHasher(config.BCRYPT_ROUNDS),
    mailer: buildMailer(config),
    logger,
    policy: { ...DEFAULT_PASSWORD_POLICY, minLength: config.PASSWORD_MIN_LENGTH },
  });

  return {
    credentials,
    cookies: {
      accessName: config.ACCESS_COOKIE_NAME,
      refreshName: config.REFRESH_COOKIE_NAME,
      secure: config.COOKIE_SECURE,
      sameSite: config.COOKIE_SAMESITE,
      domain: config.COOKIE_DOMAIN,
    },
    rateCounter: new RedisRateCounter(redis),
    rateLimit: { windowSec: config.RATE_LIMIT_WINDOW_SEC, max: config.RATE_LIMIT_MAX },
    logger,
    trustProxy: config.NODE_ENV === 'production' ? 1 : undefined,
  };
}
