import express, { type Express } from "express"
import cors from "cors"
import pinoHttp from "pino-http"
import { randomUUID } from "crypto"
import { createCorsOriginChecker } from "./lib/cors"
import { logger } from "./lib/logger"

interface AppOptions {
  corsAllowedOrigins: string[]
}

export function createApp({ corsAllowedOrigins }: AppOptions): Express {
  const app = express()

  app.use(cors({ origin: createCorsOriginChecker(corsAllowedOrigins) }))
  app.use(express.json({ limit: "64kb" }))

  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === "/health",
      },
      customLogLevel: (_req, res, err) => {
        if (res.statusCode >= 500 || err) return "error"
        if (res.statusCode >= 400) return "warn"
        return "silent"
      },
      genReqId: (req) => {
        const header = req.headers["x-request-id"]
        return typeof header === "string" && header.length > 0 ? header : randomUUID()
      },
      redact: {
        paths: ["req.headers.authorization"],
        censor: "[REDACTED]",
      },
      customSuccessMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,
      customErrorMessage: (req, res, err) => `${req.method} ${req.url} ${res.statusCode} - ${err?.message || "Error"}`,
    })
  )

  app.get("/health", (_, res) => res.json({ status: "ok" }))

  return app
}
