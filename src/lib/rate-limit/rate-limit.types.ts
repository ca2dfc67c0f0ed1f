/**
 * Rate Limit Types
 */

import type { Request } from 'express';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  windowMs: number;                          // Time window in milliseconds
  maxRequests: number;                       // Maximum requests per window
  keyGenerator?: (req: Request) => string;   // Custom key generator function
  message?: string;                          // Custom error message
  standardHeaders?: boolean;                 // Include RateLimit-* headers
  legacyHeaders?: boolean;                   // Include X-RateLimit-* headers
}

/**
 * Rate limit result
 */
export interface RateLimitResult {
  allowed: boolean;                    // Whether request is allowed
  remaining: number;                   // Remaining requests in window
  resetTime: number;                   // Timestamp when limit resets
  totalRequests: number;               // Total requests in current window
}

export interface RateLimitStats {
  totalRequests: number;
  blockedRequests: number;
  activeKeys: number;
}
