/**
 * Rate Limit Types
 * Type definitions for the outbound request limiter
 */

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  windowMs: number;                    // Time window in milliseconds
  maxRequests: number;                 // Maximum requests per window
}

/**
 * Rate limit result
 */
export interface RateLimitResult {
  allowed: boolean;                    // Whether the request may start now
  remaining: number;                   // Remaining slots in window
  retryAfter: number;                  // Milliseconds until a slot frees up (0 when allowed)
  totalRequests: number;               // Requests in current window
}

/**
 * Rate limit statistics
 */
export interface RateLimitStats {
  totalRequests: number;
  delayedRequests: number;
  totalWaitTime: number;
}
