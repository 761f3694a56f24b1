import { logger } from "./logger"

const DEV_JWT_SECRET = "dev-secret"

export interface RealtimeConfig {
  heartbeatSec: number
  idleTimeoutMs: number
  handshakeTimeoutMs: number
  maxCommandBytes: number
  rateLimitWindowMs: number
  rateLimitMaxCommands: number
  maxSubscriptions: number
  maxIdsPerSubscribe: number
  maxBufferedBytes: number
}

export interface OutboxConfig {
  pollIntervalMs: number
  batchSize: number
  baseBackoffMs: number
  maxBackoffMs: number
}

export interface Config {
  port: number
  databaseUrl: string
  isProduction: boolean
  jwtSecret: string
  /** Empty means any origin (development only) */
  corsAllowedOrigins: string[]
  realtime: RealtimeConfig
  outbox: OutboxConfig
}

function parsePositiveInt(name: string, fallback: number): number {
  const value = process.env[name]
  if (!value) return fallback
  const parsed = Number(value)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback
}

function parseCsv(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
}

export function loadConfig(): Config {
  const isProduction = process.env.NODE_ENV === "production"

  const databaseUrl = process.env.DATABASE_URL
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required")
  }

  const jwtSecret = process.env.JWT_SECRET
  if (isProduction && !jwtSecret) {
    throw new Error("JWT_SECRET is required in production")
  }

  const corsAllowedOrigins = parseCsv(process.env.CORS_ALLOWED_ORIGINS)
  if (isProduction && corsAllowedOrigins.length === 0) {
    throw new Error("CORS_ALLOWED_ORIGINS is required in production")
  }

  const config: Config = {
    port: parsePositiveInt("PORT", 3001),
    databaseUrl,
    isProduction,
    jwtSecret: jwtSecret || DEV_JWT_SECRET,
    corsAllowedOrigins,
    realtime: {
      heartbeatSec: parsePositiveInt("WS_HEARTBEAT_SEC", 25),
      idleTimeoutMs: parsePositiveInt("WS_IDLE_TIMEOUT_SEC", 60) * 1000,
      handshakeTimeoutMs: parsePositiveInt("WS_HANDSHAKE_TIMEOUT_MS", 10_000),
      maxCommandBytes: parsePositiveInt("WS_MAX_COMMAND_BYTES", 4096),
      rateLimitWindowMs: parsePositiveInt("WS_RATE_LIMIT_WINDOW_SEC", 10) * 1000,
      rateLimitMaxCommands: parsePositiveInt("WS_RATE_LIMIT_MAX_COMMANDS", 30),
      maxSubscriptions: parsePositiveInt("WS_MAX_SUBSCRIPTIONS", 100),
      maxIdsPerSubscribe: parsePositiveInt("WS_MAX_IDS_PER_SUBSCRIBE", 50),
      maxBufferedBytes: parsePositiveInt("WS_MAX_BUFFERED_BYTES", 1024 * 1024),
    },
    outbox: {
      pollIntervalMs: parsePositiveInt("OUTBOX_POLL_INTERVAL_MS", 250),
      batchSize: parsePositiveInt("OUTBOX_BATCH_SIZE", 100),
      baseBackoffMs: parsePositiveInt("OUTBOX_BASE_BACKOFF_MS", 500),
      maxBackoffMs: parsePositiveInt("OUTBOX_MAX_BACKOFF_MS", 30_000),
    },
  }

  if (!jwtSecret) {
    logger.warn("JWT_SECRET not set, using development secret - NOT FOR PRODUCTION")
  }

  return config
}
