import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AppConfig } from '../config.js';
import { ServiceError, replyWithAppError } from '../errors.js';
import { msg } from '../lib/error-messages.js';

interface TokenBucket {
  tokens: number;
  lastRefill: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  retryAfter?: number; // seconds
}

const SWEEP_INTERVAL_MS = 60_000;

export class RateLimiter {
  private buckets = new Map<string, TokenBucket>();
  private lastSweep: number;

  constructor(
    private maxTokens: number,
    private refillRate: number, // tokens per minute
    private now: () => number = Date.now
  ) {
    this.lastSweep = now();
  }

  /** Number of clients currently tracked. */
  get size(): number {
    return this.buckets.size;
  }

  // A bucket that has refilled completely is the same as no bucket.
  private sweep(now: number): void {
    this.lastSweep = now;
    for (const [key, bucket] of this.buckets) {
      const refilled = Math.floor(((now - bucket.lastRefill) / 60000) * this.refillRate);
      if (bucket.tokens + refilled >= this.maxTokens) {
        this.buckets.delete(key);
      }
    }
  }

  private getBucket(key: string): TokenBucket {
    const now = this.now();
    let bucket = this.buckets.get(key);

    if (!bucket) {
      bucket = { tokens: this.maxTokens, lastRefill: now };
      this.buckets.set(key, bucket);
    }

    // Refill tokens based on time passed
    const timePassed = (now - bucket.lastRefill) / 60000; // minutes
    const tokensToAdd = Math.floor(timePassed * this.refillRate);

    if (tokensToAdd > 0) {
      bucket.tokens = Math.min(this.maxTokens, bucket.tokens + tokensToAdd);
      bucket.lastRefill = now;
    }

    return bucket;
  }

  tryConsume(key: string): RateLimitResult {
    const now = this.now();
    if (now - this.lastSweep >= SWEEP_INTERVAL_MS) this.sweep(now);

    const bucket = this.getBucket(key);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, remaining: bucket.tokens };
    }

    // Time until next token
    return { allowed: false, retryAfter: Math.ceil(60 / this.refillRate), remaining: 0 };
  }
}

export class RateLimitError extends ServiceError {
  constructor(readonly retryAfter: number) {
    super('RATE_LIMIT', msg('RATE_LIMIT'), { fields: { retryAfter } });
    this.name = 'RateLimitError';
  }
}

/** Submission limit per client: `x-client-id` when given, the remote address otherwise. */
export function rateLimit(config: AppConfig['rateLimit'], limiter = new RateLimiter(config.burst, config.sustainedPerMin)) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!config.enabled) {
      return;
    }

    const clientId = request.headers['x-client-id'];
    const key = typeof clientId === 'string' && clientId.length > 0 ? `client:${clientId}` : `ip:${request.ip}`;
    const result = limiter.tryConsume(key);

    reply.header('X-RateLimit-Limit', String(config.burst));
    reply.header('X-RateLimit-Remaining', String(result.remaining));

    if (!result.allowed) {
      const retryAfter = result.retryAfter ?? 1;
      reply.header('Retry-After', String(retryAfter));
      return replyWithAppError(reply, new RateLimitError(retryAfter));
    }
  };
}
