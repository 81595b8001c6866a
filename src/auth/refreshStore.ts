import type { Redis } from "ioredis";
import { RKeys } from "../redis/keys";

export type SessionMeta = {
  ua?: string;
  ip?: string;
};

/**
 * Server-side session state: live refresh sessions, and access tokens revoked before
 * their natural expiry. TTLs are in seconds.
 */
export interface SessionStore {
  storeRefreshSession(accountId: string, jti: string, meta: SessionMeta, ttlSec: number): Promise<void>;
  /** Resolves true only for the caller that actually removed a live session. */
  deleteRefreshSession(accountId: string, jti: string): Promise<boolean>;
  deleteAllRefreshSessions(accountId: string): Promise<void>;
  blockAccessToken(jti: string, ttlSec: number): Promise<void>;
  isAccessTokenBlocked(jti: string): Promise<boolean>;
}

export class RedisSessionStore implements SessionStore {
  constructor(private readonly redis: Redis) {}

  async storeRefreshSession(accountId: string, jti: string, meta: SessionMeta, ttlSec: number) {
    const key = RKeys.rtSession(accountId, jti);
    await this.redis.set(key, JSON.stringify(meta), "EX", Math.max(ttlSec, 1));
  }

  async deleteRefreshSession(accountId: string, jti: string) {
    const removed = await this.redis.del(RKeys.rtSession(accountId, jti));
    return removed === 1;
  }

  async deleteAllRefreshSessions(accountId: string) {
    const keys = await this.redis.keys(RKeys.rtSessionsOf(accountId));
    if (keys.length) await this.redis.del(keys);
  }

  async blockAccessToken(jti: string, ttlSec: number) {
    // already-expired tokens need no denylist entry
    if (ttlSec <= 0) return;
    await this.redis.set(RKeys.atBlock(jti), "1", "EX", ttlSec);
  }

  async isAccessTokenBlocked(jti: string) {
    const blocked = await this.redis.get(RKeys.atBlock(jti));
    return blocked !== null;
  }
}
