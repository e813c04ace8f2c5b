/**
 * Token Bucket Rate Limiter
 *
 * Cooperative request gate for quota-limited audit sources. Callers await
 * `acquire()` before each request; when the bucket is empty the call blocks
 * until enough tokens have been refilled. There is no cancellation.
 *
 * @module @auditlineage/core/rate-limiter
 */

import { componentLogger, type Logger } from './logger/index.js';

/**
 * Rate limiter configuration
 */
export interface RateLimiterConfig {
  /** Maximum tokens (burst capacity) */
  readonly maxTokens: number;
  /** Token refill rate per second */
  readonly refillRate: number;
  /** Name used in log entries */
  readonly name: string;
}

/**
 * @example
 * ```typescript
 * const limiter = TokenBucketRateLimiter.perMinute('audit-logs', 60);
 *
 * await limiter.acquire();
 * const entries = source.fetch(filter, pageSize);
 * ```
 */
export class TokenBucketRateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly logger: Logger;
  private tokens: number;
  private lastRefillTime: number;

  constructor(config: RateLimiterConfig, logger?: Logger) {
    if (config.maxTokens <= 0 || config.refillRate <= 0) {
      throw new RangeError('Rate limiter requires positive maxTokens and refillRate');
    }
    this.config = config;
    this.logger = logger ?? componentLogger('rate-limiter');
    this.tokens = config.maxTokens;
    this.lastRefillTime = Date.now();
  }

  /**
   * Limiter allowing `requestsPerMinute` calls per 60 second period
   */
  static perMinute(name: string, requestsPerMinute: number, logger?: Logger): TokenBucketRateLimiter {
    return new TokenBucketRateLimiter(
      { name, maxTokens: requestsPerMinute, refillRate: requestsPerMinute / 60 },
      logger
    );
  }

  /**
   * Try to acquire a token
   */
  tryAcquire(count = 1): boolean {
    this.refill();

    if (this.tokens >= count) {
      this.tokens -= count;
      return true;
    }

    return false;
  }

  /**
   * Wait until a token is available
   */
  async acquire(count = 1): Promise<void> {
    while (!this.tryAcquire(count)) {
      const tokensNeeded = count - this.tokens;
      const waitTimeMs = (tokensNeeded / this.config.refillRate) * 1000;
      this.logger.debug(
        { limiter: this.config.name, waitTimeMs: Math.ceil(waitTimeMs) },
        'Rate limit reached, waiting for tokens'
      );
      await new Promise((resolve) => setTimeout(resolve, Math.max(10, waitTimeMs)));
    }
  }

  /**
   * Refill tokens based on elapsed time
   */
  private refill(): void {
    const now = Date.now();
    const elapsedSeconds = (now - this.lastRefillTime) / 1000;
    const tokensToAdd = elapsedSeconds * this.config.refillRate;

    this.tokens = Math.min(this.config.maxTokens, this.tokens + tokensToAdd);
    this.lastRefillTime = now;
  }
}
