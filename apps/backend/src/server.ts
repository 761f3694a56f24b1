import { createServer, type Server } from "http"
import type { Pool } from "pg"
import { createApp } from "./app"
import { registerRoutes } from "./routes"
import { registerSocketHandlers } from "./socket"
import { createDatabasePool } from "./db"
import { createMigrator } from "./db/migrations"
import { JwtCredentialVerifier } from "./features/auth"
import { PostgresMembershipChecker } from "./features/conversations"
import { MessageService } from "./features/messaging"
import { OutboxDispatcher } from "./lib/outbox"
import { ConnectionRegistry, Publisher } from "./lib/realtime"
import { loadConfig } from "./lib/env"
import { logger } from "./lib/logger"

export interface ServerInstance {
  server: Server
  pool: Pool
  registry: ConnectionRegistry
  port: number
  stop: () => Promise<void>
}

export async function startServer(): Promise<ServerInstance> {
  const config = loadConfig()

  const pool = createDatabasePool(config.databaseUrl)
  // The LISTEN connection is held for the dispatcher's lifetime
  const listenPool = createDatabasePool(config.databaseUrl, { max: 1 })

  const migrator = createMigrator(pool)
  await migrator.up()
  logger.info("Database migrations complete")

  const registry = new ConnectionRegistry({
    maxSubscriptionsPerConnection: config.realtime.maxSubscriptions,
  })
  const verifier = new JwtCredentialVerifier(config.jwtSecret)
  const membership = new PostgresMembershipChecker(pool)
  const messageService = new MessageService(pool, membership)

  const app = createApp({ corsAllowedOrigins: config.corsAllowedOrigins })
  registerRoutes(app, { verifier, messageService })

  const server = createServer(app)
  const gateway = registerSocketHandlers(server, {
    registry,
    verifier,
    membership,
    config: config.realtime,
  })

  const dispatcher = new OutboxDispatcher({
    pool,
    listenPool,
    publisher: new Publisher(registry),
    pollIntervalMs: config.outbox.pollIntervalMs,
    batchSize: config.outbox.batchSize,
    baseBackoffMs: config.outbox.baseBackoffMs,
    maxBackoffMs: config.outbox.maxBackoffMs,
  })
  await dispatcher.start()

  await new Promise<void>((resolve) => {
    server.listen(config.port, () => {
      logger.info({ port: config.port }, "Server started")
      resolve()
    })
  })

  const stop = async () => {
    logger.info("Shutting down server...")
    await dispatcher.stop()

    logger.info("Closing realtime connections...")
    await gateway.close()

    logger.info("Closing HTTP server...")
    if (server.listening) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()))
      })
    }
    logger.info("Closing database pools...")
    await listenPool.end()
    await pool.end()
    logger.info("Server stopped")
  }

  return { server, pool, registry, port: config.port, stop }
}
