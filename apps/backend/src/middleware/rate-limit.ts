import type { NextFunction, Request, RequestHandler, Response } from "express"
import type { ApiErrorBody } from "@murmur/types"
import { FixedWindowLimiter } from "../lib/fixed-window"

interface RateLimitOptions {
  name: string
  windowMs: number
  max: number
  key: (req: Request) => string
  skip?: (req: Request) => boolean
  now?: () => number
}

interface RateLimiterSet {
  globalBaseline: RequestHandler
  messageCreate: RequestHandler
}

function parsePositiveEnvInt(name: string, fallback: number): number {
  const value = process.env[name]
  if (!value) return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

function getClientIp(req: Request): string {
  const xff = req.headers["x-forwarded-for"]
  if (typeof xff === "string" && xff.length > 0) {
    const first = xff.split(",")[0]?.trim()
    if (first) return first
  }
  return req.ip || "unknown"
}

function setRateLimitHeaders(res: Response, max: number, remaining: number, resetAt: number, now: number): void {
  const secondsUntilReset = Math.max(0, Math.ceil((resetAt - now) / 1000))
  res.setHeader("RateLimit-Limit", String(max))
  res.setHeader("RateLimit-Remaining", String(Math.max(0, remaining)))
  res.setHeader("RateLimit-Reset", String(secondsUntilReset))
}

export function createRateLimit(options: RateLimitOptions): RequestHandler {
  const now = options.now ?? Date.now
  const limiter = new FixedWindowLimiter({ windowMs: options.windowMs, max: options.max, now })

  return function rateLimitMiddleware(req: Request, res: Response, next: NextFunction): void {
    if (options.skip?.(req)) {
      return next()
    }

    const decision = limiter.take(`${options.name}:${options.key(req)}`)
    setRateLimitHeaders(res, options.max, decision.remaining, decision.resetAt, now())

    if (!decision.allowed) {
      const body: ApiErrorBody = {
        error: {
          code: "RATE_LIMITED",
          message: "Rate limit exceeded",
          details: { limit: options.max, windowMs: options.windowMs },
        },
      }
      res.status(429).json(body)
      return
    }

    next()
  }
}

function userScopeKey(req: Request): string {
  return req.userId || getClientIp(req)
}

export function createRateLimiters(): RateLimiterSet {
  const globalMax = parsePositiveEnvInt("GLOBAL_RATE_LIMIT_MAX", 300)

  return {
    // Baseline abuse protection across all API endpoints.
    globalBaseline: createRateLimit({
      name: "global",
      windowMs: 60_000,
      max: globalMax,
      key: (req) => getClientIp(req),
      skip: (req) => req.path === "/health",
    }),

    // Each send takes the conversation's counter lock and writes two outbox rows.
    messageCreate: createRateLimit({
      name: "message-create",
      windowMs: 60_000,
      max: parsePositiveEnvInt("MESSAGE_RATE_LIMIT_MAX", 120),
      key: userScopeKey,
    }),
  }
}
