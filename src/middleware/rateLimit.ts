import { Request, Response, NextFunction, RequestHandler } from "express";
import type { Redis } from "ioredis";
import { RKeys } from "../redis/keys";
import logger from "./requestLogger";

/** Fixed-window counter: increments `key` and reports the count and seconds left. */
export interface RateCounter {
  hit(key: string, windowSec: number): Promise<{ count: number; ttl: number }>;
}

export class RedisRateCounter implements RateCounter {
  constructor(private readonly redis: Redis) {}

  async hit(key: string, windowSec: number) {
    const redisKey = RKeys.rlBucket(key);
    // NX: the first hit opens the window, later hits leave its expiry alone (Redis >= 7)
    const tx = this.redis.multi();
    tx.incr(redisKey);
    tx.expire(redisKey, windowSec, "NX");
    tx.ttl(redisKey);
    const results = await tx.exec();
    if (!results) throw new Error("rate limit transaction aborted");

    const [[, countRaw], , [, ttlRaw]] = results;
    const ttl = Number(ttlRaw);
    return { count: Number(countRaw), ttl: ttl < 0 ? windowSec : ttl };
  }
}

type RLOpts = {
  counter: RateCounter;
  windowSec: number;
  max: number;
  bucket?: (req: Request) => string;
};

export function rateLimit(opts: RLOpts): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = opts.bucket ? opts.bucket(req) : (req.ip || "ip:unknown");
      const { count, ttl } = await opts.counter.hit(id, opts.windowSec);

      res.setHeader("X-RateLimit-Limit", String(opts.max));
      res.setHeader("X-RateLimit-Remaining", String(Math.max(0, opts.max - count)));
      res.setHeader("X-RateLimit-Reset", String(ttl));

      if (count > opts.max) {
        res.status(429).json({ error: { message: "Too many requests. Please slow down." } });
        return;
      }
    } catch (e) {
      // fail open, but log it
      logger.error({ err: e }, "rate limiter unavailable");
    }
    next();
  };
}
