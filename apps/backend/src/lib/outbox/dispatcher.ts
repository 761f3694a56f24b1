import type { Pool } from "pg"
import { calculateBackoffMs } from "../backoff"
import { logger } from "../logger"
import { OUTBOX_CHANNEL, OutboxRepository, type OutboxEvent } from "./repository"

const MAX_ERROR_LENGTH = 1000

/**
 * Whatever turns an outbox row into pushes. Throwing marks the row for retry;
 * returning (even with nobody listening) marks it published.
 */
export interface EventPublisher {
  deliver(event: OutboxEvent): Promise<unknown>
}

/**
 * The part of a pg pool client the LISTEN connection uses.
 */
export interface ListenClient {
  query(text: string): Promise<unknown>
  on(event: "notification", listener: () => void): unknown
  on(event: "error", listener: (err: Error) => void): unknown
  removeAllListeners(event: string): unknown
  release(destroy?: boolean): void
}

export interface ListenSource {
  connect(): Promise<ListenClient>
}

export interface OutboxDispatcherConfig {
  /** Pool used for the select and the per-row bookkeeping updates */
  pool: Pool
  publisher: EventPublisher
  /**
   * Optional pool for the LISTEN connection (held indefinitely). When given, a
   * NOTIFY from a committed write triggers an early cycle.
   */
  listenPool?: ListenSource
  pollIntervalMs?: number
  batchSize?: number
  baseBackoffMs?: number
  maxBackoffMs?: number
  /** Interval for keepalive queries on the LISTEN connection */
  keepaliveMs?: number
  /** Injectable for tests */
  random?: () => number
}

const DEFAULT_CONFIG = {
  pollIntervalMs: 250,
  batchSize: 100,
  baseBackoffMs: 500,
  maxBackoffMs: 30_000,
  keepaliveMs: 30_000,
}

export function truncateError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error)
  return message.slice(0, MAX_ERROR_LENGTH)
}

/**
 * Polls the realtime outbox and hands due rows to the Publisher.
 *
 * - One active loop per instance; cycles never overlap
 * - A full batch schedules the next cycle immediately, otherwise after the poll interval
 * - NOTIFY (when a listen pool is configured) wakes the loop early; polling stays the source of truth
 * - Publisher failures become retry bookkeeping on the row, never dropped
 *
 * @example
 * ```ts
 * const dispatcher = new OutboxDispatcher({ pool, listenPool, publisher })
 * await dispatcher.start()
 * ```
 */
export class OutboxDispatcher {
  private readonly pool: Pool
  private readonly publisher: EventPublisher
  private readonly listenPool: ListenSource | null
  private readonly pollIntervalMs: number
  private readonly batchSize: number
  private readonly baseBackoffMs: number
  private readonly maxBackoffMs: number
  private readonly keepaliveMs: number
  private readonly random: () => number

  private running = false
  private startPromise: Promise<void> | null = null
  private inFlight: Promise<void> | null = null
  private wakeRequested = false
  private cycleTimer: ReturnType<typeof setTimeout> | null = null
  private listenClient: ListenClient | null = null
  private keepaliveTimer: ReturnType<typeof setInterval> | null = null
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null

  constructor(config: OutboxDispatcherConfig) {
    this.pool = config.pool
    this.publisher = config.publisher
    this.listenPool = config.listenPool ?? null
    this.pollIntervalMs = config.pollIntervalMs ?? DEFAULT_CONFIG.pollIntervalMs
    this.batchSize = config.batchSize ?? DEFAULT_CONFIG.batchSize
    this.baseBackoffMs = config.baseBackoffMs ?? DEFAULT_CONFIG.baseBackoffMs
    this.maxBackoffMs = config.maxBackoffMs ?? DEFAULT_CONFIG.maxBackoffMs
    this.keepaliveMs = config.keepaliveMs ?? DEFAULT_CONFIG.keepaliveMs
    this.random = config.random ?? Math.random
  }

  get isRunning(): boolean {
    return this.running
  }

  async start(): Promise<void> {
    if (this.running) return

    if (this.startPromise) {
      return this.startPromise
    }

    this.startPromise = this.doStart()

    try {
      await this.startPromise
    } finally {
      this.startPromise = null
    }
  }

  private async doStart(): Promise<void> {
    this.running = true

    if (this.listenPool) {
      await this.setupListener()
    }

    this.scheduleCycle(0)

    logger.info(
      {
        pollIntervalMs: this.pollIntervalMs,
        batchSize: this.batchSize,
        listening: this.listenPool !== null,
      },
      "OutboxDispatcher started"
    )
  }

  /**
   * Stops scheduling and waits for the cycle in flight, if any.
   */
  async stop(): Promise<void> {
    if (!this.running && !this.inFlight) return
    this.running = false

    if (this.listenClient) {
      try {
        await this.listenClient.query(`UNLISTEN ${OUTBOX_CHANNEL}`)
      } catch (err) {
        logger.debug({ err }, "UNLISTEN failed during stop")
      }
    }

    this.cleanup()

    if (this.inFlight) {
      await this.inFlight
    }

    logger.info("OutboxDispatcher stopped")
  }

  /**
   * Runs one cycle and resolves with the number of rows handled. Waits for a
   * cycle already in flight first, so cycles never overlap.
   */
  async processOnce(): Promise<number> {
    while (this.inFlight) {
      await this.inFlight
    }

    const cycle = this.runBatch()
    const tracked = cycle.then(
      () => undefined,
      () => undefined
    )
    this.inFlight = tracked

    try {
      return await cycle
    } finally {
      if (this.inFlight === tracked) {
        this.inFlight = null
      }
    }
  }

  private async runBatch(): Promise<number> {
    const events = await OutboxRepository.fetchDue(this.pool, this.batchSize)

    for (const event of events) {
      await this.dispatchEvent(event)
    }

    return events.length
  }

  private async dispatchEvent(event: OutboxEvent): Promise<void> {
    let failed = false
    let failure: unknown
    let outcome: unknown

    try {
      outcome = await this.publisher.deliver(event)
    } catch (err) {
      failed = true
      failure = err
    }

    if (!failed) {
      await OutboxRepository.markPublished(this.pool, event.id)
      logger.debug({ eventId: event.eventId, conversationId: event.conversationId, outcome }, "Outbox event published")
      return
    }

    const attempts = event.attempts + 1
    const delayMs = calculateBackoffMs({
      baseMs: this.baseBackoffMs,
      attempts,
      maxMs: this.maxBackoffMs,
      random: this.random,
    })

    await OutboxRepository.markFailed(this.pool, event.id, {
      attempts,
      delayMs,
      lastError: truncateError(failure),
    })

    logger.warn(
      { err: failure, eventId: event.eventId, conversationId: event.conversationId, attempts, delayMs },
      "Outbox event delivery failed, scheduled retry"
    )
  }

  private scheduleCycle(delayMs: number): void {
    if (!this.running) return

    if (this.cycleTimer) {
      clearTimeout(this.cycleTimer)
    }

    this.cycleTimer = setTimeout(() => {
      this.cycleTimer = null
      void this.runCycle()
    }, delayMs)
  }

  private async runCycle(): Promise<void> {
    let handled = 0

    try {
      handled = await this.processOnce()
    } catch (err) {
      logger.error({ err }, "Outbox dispatch cycle failed")
    }

    if (!this.running) return

    const immediate = handled >= this.batchSize || this.wakeRequested
    this.wakeRequested = false
    this.scheduleCycle(immediate ? 0 : this.pollIntervalMs)
  }

  /**
   * Called on NOTIFY. Pulls the next cycle forward, or marks the current one to
   * be followed immediately.
   */
  private wake(): void {
    if (!this.running) return

    if (this.inFlight) {
      this.wakeRequested = true
      return
    }

    this.scheduleCycle(0)
  }

  private cleanup(): void {
    if (this.cycleTimer) {
      clearTimeout(this.cycleTimer)
      this.cycleTimer = null
    }

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer)
      this.reconnectTimer = null
    }

    this.releaseListener()
  }

  private releaseListener(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer)
      this.keepaliveTimer = null
    }

    if (this.listenClient) {
      const client = this.listenClient
      this.listenClient = null
      client.removeAllListeners("notification")
      client.removeAllListeners("error")
      // Destroy rather than return to the pool: the connection may still be LISTENing
      client.release(true)
    }
  }

  private async setupListener(): Promise<void> {
    if (!this.listenPool) return

    try {
      const client = await this.listenPool.connect()
      this.listenClient = client

      client.on("notification", () => {
        this.wake()
      })

      client.on("error", (err: Error) => {
        if (!this.running) return
        logger.error({ err }, "LISTEN client error, reconnecting...")
        this.releaseListener()
        this.scheduleReconnect()
      })

      await client.query(`LISTEN ${OUTBOX_CHANNEL}`)
      this.startKeepalive()
      logger.debug("LISTEN connection established")
    } catch (err) {
      logger.error({ err }, "Failed to setup LISTEN connection, relying on polling")
      this.releaseListener()
      this.scheduleReconnect()
    }
  }

  private startKeepalive(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer)
    }

    this.keepaliveTimer = setInterval(() => {
      const client = this.listenClient
      if (!client || !this.running) return

      // A failure surfaces through the client's error handler, which reconnects
      client.query("SELECT 1").catch((err: unknown) => {
        logger.debug({ err }, "Keepalive query failed")
      })
    }, this.keepaliveMs)
  }

  private scheduleReconnect(): void {
    if (!this.running || this.reconnectTimer) return

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null
      if (this.running) {
        void this.setupListener()
      }
    }, 1000)
  }
}
