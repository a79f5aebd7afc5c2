// In-memory fixed-window limiter keyed by client IP. Per process only.

type Bucket = { count: number; resetAt: number };
const buckets = new Map<string, Bucket>();

export type RateLimitResult = { allowed: true } | { allowed: false; retryAfter: number };

export function clientIp(req: Request) {
  const xf = req.headers.get("x-forwarded-for") || "";
  const xr = req.headers.get("x-real-ip") || "";
  return (xf.split(",")[0] || xr || "").trim() || "unknown";
}

export function rateLimit(req: Request, keyPrefix: string, limit = 10, windowMs = 60_000, now = Date.now()): RateLimitResult {
  const key = `${keyPrefix}:${clientIp(req)}`;
  let b = buckets.get(key);
  if (!b || b.resetAt <= now) {
    b = { count: 0, resetAt: now + windowMs };
    buckets.set(key, b);
  }
  b.count++;
  if (b.count > limit) return { allowed: false, retryAfter: Math.max(0, Math.ceil((b.resetAt - now) / 1000)) };
  return { allowed: true };
}

/** Test hook. */
export function resetRateLimits() {
  buckets.clear();
}
