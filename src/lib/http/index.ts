export { TokenBucketRateLimiter } from "./rate-limiter.js";
export type { RateLimiterConfig, RateLimiterStats } from "./rate-limiter.js";
