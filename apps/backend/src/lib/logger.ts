import pino from "pino"

const isProduction = process.env.NODE_ENV === "production"
const isTest = process.env.VITEST === "true" || process.env.NODE_ENV === "test"

const prettyTransport = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "HH:MM:ss",
    ignore: "pid,hostname",
  },
}

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? "silent" : "info"),
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err, // Properly serialize Error objects
  },
  // Test runs log nowhere by default; no transport worker to leave behind
  transport: isProduction || isTest ? undefined : prettyTransport,
})
