import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"
import { EventEmitter } from "events"
import { Pool } from "pg"
import { OutboxDispatcher, truncateError, type EventPublisher, type ListenClient } from "./dispatcher"
import { OutboxRepository, type OutboxEvent } from "./repository"

class FakeListenClient extends EventEmitter implements ListenClient {
  readonly queries: string[] = []
  released: boolean | null = null

  async query(text: string): Promise<unknown> {
    this.queries.push(text)
    return { rows: [] }
  }

  release(destroy?: boolean): void {
    this.released = destroy ?? false
  }
}

function listenSource(...clients: FakeListenClient[]) {
  const connect = vi.fn(async (): Promise<ListenClient> => {
    const client = clients.shift()
    if (!client) throw new Error("connect ECONNREFUSED")
    return client
  })
  return { connect }
}

function outboxEvent(id: number, attempts = 0): OutboxEvent {
  return {
    id: BigInt(id),
    eventId: `evt_${id}`,
    eventType: "message.created",
    conversationId: "cnv_1",
    payload: {},
    createdAt: new Date("2026-01-01T00:00:00.000Z"),
    publishedAt: null,
    attempts,
    nextAttemptAt: new Date("2026-01-01T00:00:00.000Z"),
    lastError: null,
  }
}

function recordingPublisher(failing: Set<string> = new Set()) {
  const delivered: string[] = []
  const publisher: EventPublisher = {
    async deliver(event) {
      if (failing.has(event.eventId)) {
        throw new Error(`boom ${event.eventId}`)
      }
      delivered.push(event.eventId)
    },
  }
  return { publisher, delivered }
}

describe("truncateError", () => {
  test("keeps the first 1000 characters of the message", () => {
    expect(truncateError(new Error("x".repeat(1500)))).toBe("x".repeat(1000))
  })

  test("stringifies non-errors", () => {
    expect(truncateError("plain")).toBe("plain")
    expect(truncateError(42)).toBe("42")
  })
})

describe("OutboxDispatcher", () => {
  const pool = new Pool()

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe("processOnce", () => {
    test("publishes due events in order and marks them published", async () => {
      vi.spyOn(OutboxRepository, "fetchDue").mockResolvedValue([outboxEvent(1), outboxEvent(2), outboxEvent(3)])
      const markPublished = vi.spyOn(OutboxRepository, "markPublished").mockResolvedValue(undefined)
      const markFailed = vi.spyOn(OutboxRepository, "markFailed").mockResolvedValue(undefined)
      const { publisher, delivered } = recordingPublisher()

      const dispatcher = new OutboxDispatcher({ pool, publisher, batchSize: 10 })
      const handled = await dispatcher.processOnce()

      expect(handled).toBe(3)
      expect(delivered).toEqual(["evt_1", "evt_2", "evt_3"])
      expect(markPublished.mock.calls.map(([, id]) => id)).toEqual([1n, 2n, 3n])
      expect(markFailed).not.toHaveBeenCalled()
      expect(OutboxRepository.fetchDue).toHaveBeenCalledWith(pool, 10)
    })

    test("schedules a retry with backoff when delivery fails", async () => {
      vi.spyOn(OutboxRepository, "fetchDue").mockResolvedValue([outboxEvent(1, 2), outboxEvent(2)])
      const markPublished = vi.spyOn(OutboxRepository, "markPublished").mockResolvedValue(undefined)
      const markFailed = vi.spyOn(OutboxRepository, "markFailed").mockResolvedValue(undefined)
      const { publisher, delivered } = recordingPublisher(new Set(["evt_1"]))

      const dispatcher = new OutboxDispatcher({ pool, publisher, baseBackoffMs: 500, random: () => 0 })
      await dispatcher.processOnce()

      expect(markFailed).toHaveBeenCalledTimes(1)
      expect(markFailed).toHaveBeenCalledWith(pool, 1n, { attempts: 3, delayMs: 2000, lastError: "boom evt_1" })
      // A failed row does not hold back the rest of the batch
      expect(delivered).toEqual(["evt_2"])
      expect(markPublished.mock.calls.map(([, id]) => id)).toEqual([2n])
    })

    test("caps the retry delay", async () => {
      vi.spyOn(OutboxRepository, "fetchDue").mockResolvedValue([outboxEvent(1, 20)])
      const markFailed = vi.spyOn(OutboxRepository, "markFailed").mockResolvedValue(undefined)
      const { publisher } = recordingPublisher(new Set(["evt_1"]))

      const dispatcher = new OutboxDispatcher({ pool, publisher, maxBackoffMs: 30_000, random: () => 0.5 })
      await dispatcher.processOnce()

      expect(markFailed).toHaveBeenCalledWith(pool, 1n, { attempts: 21, delayMs: 30_000, lastError: "boom evt_1" })
    })

    test("cycles never overlap", async () => {
      let release: (events: OutboxEvent[]) => void = () => undefined
      const fetchDue = vi
        .spyOn(OutboxRepository, "fetchDue")
        .mockImplementationOnce(
          () =>
            new Promise<OutboxEvent[]>((resolve) => {
              release = resolve
            })
        )
        .mockResolvedValue([])
      vi.spyOn(OutboxRepository, "markPublished").mockResolvedValue(undefined)
      const { publisher } = recordingPublisher()

      const dispatcher = new OutboxDispatcher({ pool, publisher })
      const first = dispatcher.processOnce()
      const second = dispatcher.processOnce()

      expect(fetchDue).toHaveBeenCalledTimes(1)

      release([outboxEvent(1)])
      await expect(first).resolves.toBe(1)
      await expect(second).resolves.toBe(0)
      expect(fetchDue).toHaveBeenCalledTimes(2)
    })
  })

  describe("polling loop", () => {
    beforeEach(() => {
      vi.useFakeTimers()
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    test("a full batch is followed immediately, otherwise it waits the poll interval", async () => {
      const fetchDue = vi
        .spyOn(OutboxRepository, "fetchDue")
        .mockResolvedValueOnce([outboxEvent(1), outboxEvent(2)])
        .mockResolvedValue([])
      vi.spyOn(OutboxRepository, "markPublished").mockResolvedValue(undefined)
      const { publisher, delivered } = recordingPublisher()

      const dispatcher = new OutboxDispatcher({ pool, publisher, batchSize: 2, pollIntervalMs: 250 })
      await dispatcher.start()
      expect(dispatcher.isRunning).toBe(true)

      await vi.advanceTimersByTimeAsync(1)
      expect(fetchDue).toHaveBeenCalledTimes(2)
      expect(delivered).toEqual(["evt_1", "evt_2"])

      await vi.advanceTimersByTimeAsync(250)
      expect(fetchDue).toHaveBeenCalledTimes(3)

      await dispatcher.stop()
      await vi.advanceTimersByTimeAsync(1_000)
      expect(fetchDue).toHaveBeenCalledTimes(3)
      expect(dispatcher.isRunning).toBe(false)
    })

    test("a failed cycle is logged and polling continues", async () => {
      const fetchDue = vi
        .spyOn(OutboxRepository, "fetchDue")
        .mockRejectedValueOnce(new Error("connection terminated"))
        .mockResolvedValue([])
      const { publisher } = recordingPublisher()

      const dispatcher = new OutboxDispatcher({ pool, publisher, pollIntervalMs: 250 })
      await dispatcher.start()

      await vi.advanceTimersByTimeAsync(1)
      expect(fetchDue).toHaveBeenCalledTimes(1)

      await vi.advanceTimersByTimeAsync(250)
      expect(fetchDue).toHaveBeenCalledTimes(2)

      await dispatcher.stop()
    })

    test("a notification pulls the next cycle forward", async () => {
      const fetchDue = vi.spyOn(OutboxRepository, "fetchDue").mockResolvedValue([])
      const { publisher } = recordingPublisher()
      const client = new FakeListenClient()

      const dispatcher = new OutboxDispatcher({
        pool,
        publisher,
        listenPool: listenSource(client),
        pollIntervalMs: 10_000,
      })
      await dispatcher.start()
      expect(client.queries).toEqual(["LISTEN realtime_outbox"])

      await vi.advanceTimersByTimeAsync(1)
      expect(fetchDue).toHaveBeenCalledTimes(1)

      client.emit("notification", { channel: "realtime_outbox" })
      await vi.advanceTimersByTimeAsync(1)
      expect(fetchDue).toHaveBeenCalledTimes(2)

      await dispatcher.stop()
      expect(client.queries).toEqual(["LISTEN realtime_outbox", "UNLISTEN realtime_outbox"])
      expect(client.released).toBe(true)
      expect(client.listenerCount("notification")).toBe(0)
    })

    test("a notification during a cycle is followed by another cycle", async () => {
      let release: (events: OutboxEvent[]) => void = () => undefined
      const fetchDue = vi
        .spyOn(OutboxRepository, "fetchDue")
        .mockImplementationOnce(
          () =>
            new Promise<OutboxEvent[]>((resolve) => {
              release = resolve
            })
        )
        .mockResolvedValue([])
      const { publisher } = recordingPublisher()
      const client = new FakeListenClient()

      const dispatcher = new OutboxDispatcher({
        pool,
        publisher,
        listenPool: listenSource(client),
        pollIntervalMs: 10_000,
      })
      await dispatcher.start()
      await vi.advanceTimersByTimeAsync(1)
      expect(fetchDue).toHaveBeenCalledTimes(1)

      client.emit("notification", { channel: "realtime_outbox" })
      release([])
      await vi.advanceTimersByTimeAsync(1)
      expect(fetchDue).toHaveBeenCalledTimes(2)

      await dispatcher.stop()
    })

    test("keepalive queries the listen connection", async () => {
      vi.spyOn(OutboxRepository, "fetchDue").mockResolvedValue([])
      const { publisher } = recordingPublisher()
      const client = new FakeListenClient()

      const dispatcher = new OutboxDispatcher({
        pool,
        publisher,
        listenPool: listenSource(client),
        pollIntervalMs: 60_000,
        keepaliveMs: 5_000,
      })
      await dispatcher.start()

      await vi.advanceTimersByTimeAsync(10_000)
      expect(client.queries).toEqual(["LISTEN realtime_outbox", "SELECT 1", "SELECT 1"])

      await dispatcher.stop()
    })

    test("a listen connection error reconnects after a second", async () => {
      vi.spyOn(OutboxRepository, "fetchDue").mockResolvedValue([])
      const { publisher } = recordingPublisher()
      const first = new FakeListenClient()
      const second = new FakeListenClient()
      const source = listenSource(first, second)

      const dispatcher = new OutboxDispatcher({ pool, publisher, listenPool: source, pollIntervalMs: 60_000 })
      await dispatcher.start()

      first.emit("error", new Error("Connection terminated unexpectedly"))
      expect(first.released).toBe(true)

      await vi.advanceTimersByTimeAsync(999)
      expect(source.connect).toHaveBeenCalledTimes(1)

      await vi.advanceTimersByTimeAsync(1)
      expect(source.connect).toHaveBeenCalledTimes(2)
      expect(second.queries).toEqual(["LISTEN realtime_outbox"])

      await dispatcher.stop()
      expect(second.released).toBe(true)
    })

    test("keeps polling when the listen connection cannot be set up", async () => {
      const fetchDue = vi.spyOn(OutboxRepository, "fetchDue").mockResolvedValue([])
      const { publisher } = recordingPublisher()
      const client = new FakeListenClient()
      const source = listenSource()

      const dispatcher = new OutboxDispatcher({ pool, publisher, listenPool: source, pollIntervalMs: 250 })
      await dispatcher.start()
      expect(dispatcher.isRunning).toBe(true)

      await vi.advanceTimersByTimeAsync(1)
      expect(fetchDue).toHaveBeenCalledTimes(1)

      await vi.advanceTimersByTimeAsync(250)
      expect(fetchDue).toHaveBeenCalledTimes(2)

      // The retry one second after the failed attempt gets a connection
      source.connect.mockResolvedValueOnce(client)
      await vi.advanceTimersByTimeAsync(750)
      expect(source.connect).toHaveBeenCalledTimes(2)
      expect(client.queries).toEqual(["LISTEN realtime_outbox"])

      await dispatcher.stop()
    })

    test("start is idempotent", async () => {
      const fetchDue = vi.spyOn(OutboxRepository, "fetchDue").mockResolvedValue([])
      const { publisher } = recordingPublisher()

      const dispatcher = new OutboxDispatcher({ pool, publisher })
      await Promise.all([dispatcher.start(), dispatcher.start()])
      await dispatcher.start()

      await vi.advanceTimersByTimeAsync(1)
      expect(fetchDue).toHaveBeenCalledTimes(1)

      await dispatcher.stop()
    })
  })
})
