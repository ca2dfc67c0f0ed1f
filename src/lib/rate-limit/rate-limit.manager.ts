/**
 * Rate Limit Manager
 * In-memory sliding window limiter guarding the third-party chat site
 */

import { RateLimitConfig, RateLimitResult, RateLimitStats } from './rate-limit.types';

interface MemoryLimitEntry {
  timestamps: number[];
  resetTime: number;
}

export class RateLimitManager {
  private memoryLimits: Map<string, MemoryLimitEntry> = new Map();
  private stats = {
    totalRequests: 0,
    blockedRequests: 0,
  };
  private cleanupInterval?: NodeJS.Timeout;

  constructor(cleanupIntervalMs: number = 60000) {
    this.cleanupInterval = setInterval(() => {
      this.cleanupExpiredEntries();
    }, cleanupIntervalMs);
    // Never keep the process alive just for cleanup
    this.cleanupInterval.unref();
  }

  /**
   * Check if request is within rate limit, counting it when allowed
   */
  checkLimit(key: string, config: RateLimitConfig, now: number = Date.now()): RateLimitResult {
    this.stats.totalRequests++;

    const windowStart = now - config.windowMs;
    const resetTime = now + config.windowMs;
    const entry = this.memoryLimits.get(key) ?? { timestamps: [], resetTime };

    // Remove old timestamps outside window
    entry.timestamps = entry.timestamps.filter(ts => ts > windowStart);
    entry.resetTime = resetTime;
    this.memoryLimits.set(key, entry);

    if (entry.timestamps.length >= config.maxRequests) {
      this.stats.blockedRequests++;
      return {
        allowed: false,
        remaining: 0,
        resetTime: entry.timestamps[0] + config.windowMs,
        totalRequests: entry.timestamps.length,
      };
    }

    entry.timestamps.push(now);

    return {
      allowed: true,
      remaining: Math.max(0, config.maxRequests - entry.timestamps.length),
      resetTime,
      totalRequests: entry.timestamps.length,
    };
  }

  resetLimit(key: string): void {
    this.memoryLimits.delete(key);
  }

  getStats(): RateLimitStats {
    return {
      totalRequests: this.stats.totalRequests,
      blockedRequests: this.stats.blockedRequests,
      activeKeys: this.memoryLimits.size,
    };
  }

  /**
   * Cleanup expired entries from memory
   */
  private cleanupExpiredEntries(): void {
    const now = Date.now();
    for (const [key, entry] of this.memoryLimits.entries()) {
      if (entry.resetTime < now) {
        this.memoryLimits.delete(key);
      }
    }
  }

  clear(): void {
    this.memoryLimits.clear();
    this.stats = {
      totalRequests: 0,
      blockedRequests: 0,
    };
  }

  /**
   * Cleanup on shutdown
   */
  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
  }
}

// Export singleton instance
export const rateLimitManager = new RateLimitManager();
