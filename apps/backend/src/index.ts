import { startServer } from "./server"
import { logger } from "./lib/logger"

const { stop } = await startServer()

// Prevent multiple shutdown attempts
let isShuttingDown = false
async function shutdown(code: number) {
  if (isShuttingDown) return
  isShuttingDown = true
  try {
    await stop()
  } catch (err) {
    logger.error({ err }, "Error during shutdown")
    code = code || 1
  }
  process.exit(code)
}

// Handle graceful shutdown
process.on("SIGTERM", () => void shutdown(0))
process.on("SIGINT", () => void shutdown(0))
process.on("SIGHUP", () => void shutdown(0))

// Last-ditch cleanup on crashes
process.on("uncaughtException", (err) => {
  logger.fatal({ err }, "Uncaught exception")
  void shutdown(1)
})

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection")
  void shutdown(1)
})
